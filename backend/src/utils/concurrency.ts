import { debugLogger } from './debug-logger';

export interface ConcurrencyOptions {
  /** Maximum number of concurrent operations. Default: 3 */
  concurrency?: number;
  /** Label for logging purposes */
  label?: string;
}

export type Settled<R> = { ok: true; value: R } | { ok: false; error: Error };

/**
 * Run fn over items with at most `concurrency` calls in flight.
 * Results come back in input order; a rejected call yields `{ ok: false }`
 * at its own index instead of failing the batch.
 *
 * @example
 * const summaries = await mapConcurrently(
 *   candidates,
 *   async (candidate) => summarizer.summarize(candidate.articleText, candidate.headline, message),
 *   { concurrency: 3, label: 'Summaries' }
 * );
 */
export async function mapConcurrently<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<Array<Settled<R>>> {
  const { concurrency = 3, label = 'Operation' } = options;

  if (items.length === 0) {
    return [];
  }

  const stepId = debugLogger.stepStart('CONCURRENCY', `${label} (${items.length} items, concurrency: ${concurrency})`, {
    itemCount: items.length,
    concurrency,
  });

  const results: Array<Settled<R>> = new Array(items.length);
  let next = 0;
  let failed = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { ok: true, value: await fn(items[index], index) };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        debugLogger.warn('CONCURRENCY', `${label}: Item ${index + 1}/${items.length} failed`, {
          error: err.message,
        });
        results[index] = { ok: false, error: err };
        failed++;
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);

  debugLogger.stepFinish(stepId, { successful: items.length - failed, failed });

  return results;
}

/**
 * Settle with the task's value, or with `fallback` if the task has not
 * resolved within `ms`. A rejected task also settles with the fallback.
 * The timer is always cleared, so nothing is left pending.
 */
export function resolveBefore<T>(task: Promise<T>, ms: number, fallback: T): Promise<T> {
  return new Promise<T>(resolve => {
    const timer = setTimeout(() => {
      debugLogger.warn('CONCURRENCY', `Deadline of ${ms}ms reached, using fallback`);
      resolve(fallback);
    }, ms);

    task.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        debugLogger.warn('CONCURRENCY', 'Task failed before deadline, using fallback', {
          error: error instanceof Error ? error.message : String(error),
        });
        resolve(fallback);
      }
    );
  });
}
