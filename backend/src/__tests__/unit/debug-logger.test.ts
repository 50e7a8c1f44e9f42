import { DebugLogger } from '../../utils/debug-logger';

describe('DebugLogger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('stays silent when disabled', () => {
    const logger = new DebugLogger(false);

    const stepId = logger.stepStart('INTENT', 'Classifying message');
    logger.stepFinish(stepId);
    logger.info('INTENT', 'info');
    logger.warn('INTENT', 'warn');
    logger.stepError(null, 'INTENT', 'failed', new Error('boom'));

    expect(stepId).toBe('');
    expect(logger.isEnabled()).toBe(false);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('tracks steps from start to finish', () => {
    const logger = new DebugLogger(true);

    const first = logger.stepStart('AGGREGATE', 'Collecting candidates', { topic: 'nasa' });
    const second = logger.stepStart('EXTRACT', 'Extracting article text');

    expect(first).toBe('AGGREGATE_1');
    expect(second).toBe('EXTRACT_2');
    expect(logger.pendingSteps().map(s => s.stepId)).toEqual(['AGGREGATE_1', 'EXTRACT_2']);
    expect(String(logSpy.mock.calls[0][0])).toContain('Collecting candidates');
    expect(String(logSpy.mock.calls[0][0])).toContain('{"topic":"nasa"}');

    logger.stepFinish(first, { total: 2 });
    expect(logger.pendingSteps().map(s => s.category)).toEqual(['EXTRACT']);

    logger.stepError(second, 'EXTRACT', 'Extraction failed', new Error('HTTP 404'));
    expect(logger.pendingSteps()).toEqual([]);
    expect(logSpy.mock.calls.some(call => String(call[0]).includes('HTTP 404'))).toBe(true);
  });

  it('warns about finishing an unknown step', () => {
    const logger = new DebugLogger(true);
    logger.stepFinish('NOPE_9');
    expect(String(warnSpy.mock.calls[0][0])).toContain('Unknown step: NOPE_9');
  });
});
