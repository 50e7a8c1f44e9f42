/**
 * Debug Logger - step-by-step tracing of a chat turn when DEBUG mode is enabled
 *
 * Usage:
 *   Set DEBUG=true (or DEBUG=1) to enable.
 *   Wrap each pipeline stage in stepStart/stepFinish (or stepError) so the
 *   console shows what ran, in which order, and how long it took.
 */

import chalk from 'chalk';

interface StepTimer {
  category: string;
  description: string;
  startTime: number;
}

// Category color mapping for visual distinction
const categoryColors: Record<string, chalk.Chalk> = {
  // Request/Response flow
  CHAT_REQUEST: chalk.bgCyan.black.bold,
  CHAT: chalk.bgCyan.black.bold,

  // Routing
  INTENT: chalk.bgMagenta.white.bold,
  FOLLOWUP: chalk.bgMagenta.white.bold,
  ASSISTANT: chalk.bgMagenta.white.bold,

  // Retrieval
  AGGREGATE: chalk.bgBlue.white.bold,
  SHEET: chalk.bgGreen.black.bold,
  RSS_FETCH: chalk.bgCyan.black.bold,
  SEARCH_FALLBACK: chalk.bgBlue.white.bold,
  RATE_LIMIT: chalk.bgYellow.black.bold,
  EXTRACT: chalk.bgBlue.white.bold,

  // Storage & state
  HISTORY: chalk.bgGreen.black.bold,
  CONV_CACHE: chalk.bgYellow.black.bold,

  // LLM
  LLM: chalk.bgRed.white.bold,
  SUMMARIZE: chalk.bgRed.white.bold,

  // System
  CONCURRENCY: chalk.bgWhite.black.bold,
  SYSTEM: chalk.bgWhite.black.bold,
};

function label(category: string): string {
  const colorFn = categoryColors[category] || chalk.bgGray.white.bold;
  return colorFn(` ${category} `);
}

function formatData(data?: Record<string, unknown>): string {
  if (!data || Object.keys(data).length === 0) return '';
  return chalk.dim(` │ ${JSON.stringify(data)}`);
}

export class DebugLogger {
  private readonly enabled: boolean;
  private readonly activeSteps = new Map<string, StepTimer>();
  private stepCounter = 0;

  constructor(enabled = process.env.DEBUG === 'true' || process.env.DEBUG === '1') {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log the start of a pipeline stage.
   * @returns stepId to hand to stepFinish/stepError ('' when disabled)
   */
  stepStart(category: string, description: string, metadata?: Record<string, unknown>): string {
    if (!this.enabled) return '';

    const stepId = `${category}_${++this.stepCounter}`;
    this.activeSteps.set(stepId, { category, description, startTime: Date.now() });

    console.log(`${chalk.cyan('▶')} ${label(category)} ${chalk.white(description)}${formatData(metadata)}`);
    return stepId;
  }

  stepFinish(stepId: string, result?: Record<string, unknown>): void {
    if (!this.enabled || !stepId) return;

    const step = this.activeSteps.get(stepId);
    if (!step) {
      console.warn(chalk.yellow(`⚠ Unknown step: ${stepId}`));
      return;
    }
    this.activeSteps.delete(stepId);

    const duration = Date.now() - step.startTime;
    const durationColor = duration > 1000 ? chalk.yellow : duration > 500 ? chalk.cyan : chalk.green;
    console.log(
      `${chalk.green('✓')} ${label(step.category)} ${chalk.white(step.description)} ${durationColor(`(${duration}ms)`)}${formatData(result)}`
    );
  }

  /**
   * Log a failed stage. stepId may be empty when the failure happened
   * outside a started step.
   */
  stepError(stepId: string | null, category: string, description: string, error: unknown): void {
    if (!this.enabled) return;

    const step = stepId ? this.activeSteps.get(stepId) : undefined;
    if (stepId) this.activeSteps.delete(stepId);

    const durationStr = step ? chalk.dim(` (${Date.now() - step.startTime}ms)`) : '';
    const errorMsg = error instanceof Error ? error.message : String(error);

    console.log(
      `${chalk.red('✗')} ${label(step?.category || category)} ${chalk.white(description)}${durationStr} ${chalk.red('│')} ${chalk.red(errorMsg)}`
    );

    if (error instanceof Error && error.stack) {
      console.log(chalk.dim(`  └─ ${error.stack.split('\n')[1]?.trim() || error.stack}`));
    }
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled) return;
    console.log(`${chalk.blue('ℹ')} ${label(category)} ${chalk.white(message)}${formatData(data)}`);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled) return;
    console.log(`${chalk.yellow('⚠')} ${label(category)} ${chalk.yellow(message)}${formatData(data)}`);
  }

  /**
   * Steps started but never finished, oldest first.
   */
  pendingSteps(): Array<{ stepId: string; category: string; elapsedMs: number }> {
    const now = Date.now();
    return Array.from(this.activeSteps.entries()).map(([stepId, step]) => ({
      stepId,
      category: step.category,
      elapsedMs: now - step.startTime,
    }));
  }
}

// Export singleton instance
export const debugLogger = new DebugLogger();
