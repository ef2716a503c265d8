/**
 * CLI argument parsing for the forecasting benchmark
 */
import { ConfigurationError, isContextProfileId } from '@llmcast/forecast-core';

import type { ContextProfileId } from '@llmcast/forecast-core';

export const DEFAULT_SAMPLES = 50;

export interface BenchmarkArguments {
  /** Model ids from --model, undefined to run the whole matrix */
  models: string[] | undefined;
  profile: ContextProfileId;
  /** From --samples, else N_SAMPLES, else the default */
  samples: number;
  tasksPath: string | undefined;
  useCache: boolean;
  verbose: boolean;
}

/**
 * Parse --model argument(s) from CLI arguments
 * Supports:
 * - Single model: --model model-name
 * - Comma-separated: --model a,b,c
 * - Multiple flags: --model a --model b
 *
 * @param arguments_ - Command line arguments (typically process.argv)
 * @returns Array of model IDs if --model was specified, undefined otherwise
 */
export function parseModelArgument(arguments_: string[]): string[] | undefined {
  const models: string[] = [];
  for (let index = 0; index < arguments_.length; index++) {
    if (arguments_[index] === '--model') {
      const nextValue = arguments_[index + 1];
      if (nextValue !== undefined && nextValue !== '') {
        models.push(...nextValue.split(',').map((m) => m.trim()).filter((m) => m !== ''));
      }
    }
  }
  return models.length > 0 ? models : undefined;
}

/**
 * Value following the last occurrence of a flag
 */
function flagValue(arguments_: string[], flag: string): string | undefined {
  const index = arguments_.lastIndexOf(flag);
  if (index === -1) {
    return undefined;
  }
  const value = arguments_[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Resolve the sample count from the flag or the N_SAMPLES environment variable
 *
 * @throws ConfigurationError unless the value is a positive integer
 */
export function resolveSampleCount(flag: string | undefined, environment: NodeJS.ProcessEnv = process.env): number {
  const raw = flag ?? environment['N_SAMPLES'];
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_SAMPLES;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`Sample count must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Parse the full benchmark command line
 *
 * @throws ConfigurationError for an unknown profile or a malformed value
 */
export function parseBenchmarkArguments(
  arguments_: string[],
  environment: NodeJS.ProcessEnv = process.env
): BenchmarkArguments {
  const profile = flagValue(arguments_, '--profile') ?? 'full';
  if (!isContextProfileId(profile)) {
    throw new ConfigurationError(`Unknown context profile "${profile}"`);
  }

  return {
    models: parseModelArgument(arguments_),
    profile,
    samples: resolveSampleCount(flagValue(arguments_, '--samples'), environment),
    tasksPath: flagValue(arguments_, '--tasks'),
    useCache: !arguments_.includes('--no-cache'),
    verbose: arguments_.includes('--verbose'),
  };
}
