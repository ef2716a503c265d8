/**
 * Error taxonomy for forecast acquisition
 */
export type ForecastErrorCode =
  | 'CONFIGURATION'
  | 'FORMAT'
  | 'INSUFFICIENT_SAMPLES'
  | 'BACKEND';

/**
 * Base class for every error raised by the forecast core
 */
export class ForecastError extends Error {
  override readonly name: string = 'ForecastError';
  readonly code: ForecastErrorCode;

  constructor(code: ForecastErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

/**
 * Invalid engine settings or backend selection. Raised before any request is made.
 */
export class ConfigurationError extends ForecastError {
  override readonly name = 'ConfigurationError';

  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

/**
 * One candidate completion could not be turned into a forecast.
 * The raw text is kept for diagnostics.
 */
export class FormatError extends ForecastError {
  override readonly name = 'FormatError';
  readonly rawText: string;
  readonly reason: string;

  constructor(reason: string, rawText: string) {
    super('FORMAT', `Invalid forecast format: ${reason}`);
    this.reason = reason;
    this.rawText = rawText;
  }
}

/**
 * The retry budget ran out before enough valid forecasts were collected
 */
export class InsufficientSamplesError extends ForecastError {
  override readonly name = 'InsufficientSamplesError';
  readonly requested: number;
  readonly achieved: number;

  constructor(requested: number, achieved: number) {
    super(
      'INSUFFICIENT_SAMPLES',
      `Failed to get ${String(requested)} valid forecasts. Got ${String(achieved)} instead.`
    );
    this.requested = requested;
    this.achieved = achieved;
  }
}

/**
 * Transport-level failure reported by a completion backend
 */
export class BackendError extends ForecastError {
  override readonly name = 'BackendError';
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(message: string, options: { status?: number; body?: string } = {}) {
    super('BACKEND', message);
    this.status = options.status;
    this.body = options.body;
  }
}
