/* eslint-disable no-restricted-syntax -- BenchmarkLogger is the canonical console output wrapper, must use console.log internally */
import chalk from 'chalk';
import ora from 'ora';

import type { Ora } from 'ora';

/**
 * Options for BenchmarkLogger
 */
export interface BenchmarkLoggerOptions {
  verbose?: boolean;
}

/**
 * Per-task acquisition outcome as shown on the console
 */
export interface AcquisitionSummary {
  taskId: string;
  samples: number;
  requested: number;
  inputTokens: number;
  outputTokens: number;
  rejected: number;
  cost?: number | undefined;
  cached?: boolean | undefined;
}

// Shared separator for metric guide sections
const METRIC_GUIDE_SEPARATOR = '───────────────────────────────────────';

// CRPS is scale-dependent; thresholds apply to scaled CRPS
const CRPS_GOOD = 0.1;
const CRPS_OK = 0.3;

/**
 * Logger for benchmark CLI applications with spinner and verbose mode support
 */
export class BenchmarkLogger {
  private readonly verbose: boolean;
  private spinner: Ora | undefined = undefined;

  /**
   * Create a new BenchmarkLogger
   */
  constructor(options: BenchmarkLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  /**
   * Start a spinner with the given text
   */
  startSpinner(text: string): void {
    this.spinner = ora(text).start();
  }

  /**
   * Update the spinner text
   */
  updateSpinner(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
    }
  }

  /**
   * Mark the spinner as succeeded
   */
  succeedSpinner(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
    }
    this.spinner = undefined;
  }

  /**
   * Mark the spinner as failed
   */
  failSpinner(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
    }
    this.spinner = undefined;
  }

  /**
   * Log a message (verbose only)
   */
  log(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }

  /**
   * Log an error (always displayed)
   */
  error(message: string): void {
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Get quality indicator for a CRPS value (lower is better)
   */
  private getCrpsQuality(value: number): string {
    if (value < CRPS_GOOD) {
      return chalk.green('good');
    }
    if (value < CRPS_OK) {
      return chalk.yellow('ok');
    }
    return chalk.red('poor');
  }

  /**
   * Log a task's CRPS with quality indicator (verbose only)
   */
  logScore(taskId: string, crps: number): void {
    if (!this.verbose) {
      return;
    }
    const qualityLabel = chalk.dim('(' + this.getCrpsQuality(crps) + ')');
    console.log(chalk.yellow(`  ${taskId}: CRPS=${crps.toFixed(4)} ${qualityLabel}`));
  }

  /**
   * Log the outcome of one acquisition (verbose only)
   */
  logAcquisition(summary: AcquisitionSummary): void {
    if (!this.verbose) {
      return;
    }
    const countLabel = summary.samples < summary.requested
      ? chalk.red(`${String(summary.samples)}/${String(summary.requested)}`)
      : chalk.green(`${String(summary.samples)}/${String(summary.requested)}`);
    const cachedLabel = summary.cached === true ? chalk.dim(' [cached]') : '';
    const costLabel = summary.cost === undefined ? '' : `, cost=$${summary.cost.toFixed(2)}`;
    console.log(
      chalk.gray(`  ${summary.taskId}: samples=`) + countLabel +
      chalk.gray(`, rejected=${String(summary.rejected)}, tokens=${String(summary.inputTokens)}/${String(summary.outputTokens)}${costLabel}`) +
      cachedLabel
    );
  }

  /**
   * Log a hint/tip message (verbose only)
   */
  hint(message: string): void {
    if (!this.verbose) {
      return;
    }
    console.log(chalk.dim(`\n💡 ${message}`));
  }

  /**
   * Output a header (always displayed)
   */
  header(title: string): void {
    console.log(chalk.bold(title));
    console.log('='.repeat(title.length));
  }

  /**
   * Output benchmark objective/context (verbose only)
   */
  objective(description: string): void {
    if (!this.verbose) {
      return;
    }
    console.log(chalk.cyan(`\n📊 Objective: ${description}`));
  }

  /**
   * Output metric explanations (verbose only)
   */
  explainMetrics(): void {
    if (!this.verbose) {
      return;
    }
    console.log(chalk.dim('\n' + METRIC_GUIDE_SEPARATOR));
    console.log(chalk.dim('📖 Metric Guide:'));
    console.log(chalk.dim('   CRPS: 0=perfect, lower is better (distance between sample distribution and outcome)'));
    console.log(chalk.dim('   Rejected: model outputs discarded for an invalid forecast format'));
    console.log(chalk.dim('   Cost: estimated from cumulative tokens and per-1000-token prices'));
    console.log(chalk.dim(METRIC_GUIDE_SEPARATOR));
  }

  /**
   * Output a summary (always displayed)
   */
  summary(data: Record<string, string | number>): void {
    console.log(chalk.bold('\nResults'));
    console.log('-------');
    for (const [key, value] of Object.entries(data)) {
      const formatted = typeof value === 'number' ? value.toFixed(3) : value;
      console.log(`${key}: ${formatted}`);
    }
  }

  /**
   * Log model start with colored model name (always displayed)
   * For multi-model matrix benchmarks
   */
  logModelStart(modelId: string, index: number, total: number): void {
    const modelLabel = chalk.cyan(modelId);
    console.log(`\nModel ${String(index)}/${String(total)}: ${modelLabel}`);
  }

  /**
   * Log model score in compact format (non-verbose only)
   * Skips logging if verbose mode is enabled (since detailed logs are shown instead)
   */
  logModelScoreCompact(modelId: string, meanCrps: number, completedTasks: number, totalTasks: number): void {
    if (this.verbose) {
      return;
    }
    const modelLabel = chalk.cyan(modelId);
    console.log(`  ${modelLabel}: CRPS=${meanCrps.toFixed(4)}, Tasks=${String(completedTasks)}/${String(totalTasks)}`);
  }

  /**
   * Output benchmark info header (always displayed)
   */
  logBenchmarkInfo(info: { tasks?: number; samples?: number; profile?: string; models?: string[] }): void {
    if (info.tasks !== undefined) {
      console.log(`Tasks: ${String(info.tasks)}`);
    }
    if (info.samples !== undefined) {
      console.log(`Samples per task: ${String(info.samples)}`);
    }
    if (info.profile !== undefined) {
      console.log(`Context profile: ${info.profile}`);
    }
    if (info.models !== undefined && info.models.length > 0) {
      console.log(`Models: ${info.models.join(', ')}`);
    }
    console.log('');
  }

  /**
   * Output a blank newline (always displayed)
   */
  newline(): void {
    console.log('');
  }
}

/**
 * Factory function to create a BenchmarkLogger
 */
export function createBenchmarkLogger(verbose?: boolean): BenchmarkLogger {
  if (verbose === undefined) {
    return new BenchmarkLogger({});
  }
  return new BenchmarkLogger({ verbose });
}
/* eslint-enable no-restricted-syntax -- Re-enable after BenchmarkLogger implementation */
