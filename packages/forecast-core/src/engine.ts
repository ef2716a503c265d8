import { z } from 'zod';

import { buildCacheKey } from './cache-key.js';
import { emptyUsage, estimateCost } from './cost.js';
import { ConfigurationError, FormatError, InsufficientSamplesError } from './errors.js';
import { buildPrompt, DEFAULT_MAX_DIGITS } from './prompt-builder.js';
import { parseForecast } from './response-parser.js';

import type {
  AcquisitionResult,
  CompletionClient,
  ForecastLogger,
  TaskInstance,
  TokenCost,
} from './types.js';

const positiveInt = z.number().int().positive();

const EngineSettingsSchema = z.object({
  model: z.string().min(1),
  useContext: z.boolean().default(true),
  failOnInvalid: z.boolean().default(true),
  nRetries: positiveInt.default(3),
  batchSize: positiveInt.optional(),
  batchSizeOnRetry: positiveInt.default(5),
  temperature: z.number().min(0).default(1),
  maxTokens: positiveInt.default(10_000),
  maxDigits: positiveInt.default(DEFAULT_MAX_DIGITS),
  tokenCost: z
    .object({ input: z.number().nonnegative(), output: z.number().nonnegative() })
    .optional(),
  hosted: z.boolean().default(true),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;

export type ForecastEngineOptions = z.input<typeof EngineSettingsSchema> & {
  client: CompletionClient;
  logger?: ForecastLogger;
};

const silentLogger: ForecastLogger = {
  log: () => {
    // no-op
  },
};

interface BatchPlan {
  batchSize: number;
  retries: number;
  cap: number | undefined;
}

/**
 * Validate engine settings
 * @param options - Raw engine options
 * @throws ConfigurationError when a setting is out of range
 */
export function parseEngineSettings(options: z.input<typeof EngineSettingsSchema>): EngineSettings {
  const parsed = EngineSettingsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid engine settings: ${details}`);
  }
  return parsed.data;
}

/**
 * Acquires a fixed number of sample paths from an instruction-tuned model by
 * rejection sampling: batches of candidates are requested, each candidate is parsed
 * independently, and invalid ones are dropped until enough forecasts exist or the
 * retry budget runs out.
 */
export class ForecastEngine {
  readonly settings: EngineSettings;
  private readonly client: CompletionClient;
  private readonly logger: ForecastLogger;
  private lifetimeCost = 0;

  constructor(options: ForecastEngineOptions) {
    const { client, logger, ...settings } = options;
    this.settings = parseEngineSettings(settings);
    this.client = client;
    this.logger = logger ?? silentLogger;
  }

  /**
   * Total estimated cost of every acquisition run by this engine
   */
  get totalCost(): number {
    return this.lifetimeCost;
  }

  /**
   * Key under which this engine's results may be cached
   */
  get cacheKey(): string {
    return buildCacheKey(this.settings);
  }

  /**
   * Check call-time preconditions and derive the first batch size and retry budget
   * @param task - Task instance (only its batch cap is read)
   * @param nSamples - Requested number of sample paths
   */
  planBatches(task: TaskInstance, nSamples: number): BatchPlan {
    const { batchSize, batchSizeOnRetry, nRetries } = this.settings;

    if (!Number.isInteger(nSamples) || nSamples < 1) {
      throw new ConfigurationError(`Number of samples must be a positive integer, got ${String(nSamples)}`);
    }

    const defaultBatchSize = batchSize ?? nSamples;
    if (batchSize !== undefined && batchSize * nRetries < nSamples) {
      throw new ConfigurationError(`Not enough iterations to cover ${String(nSamples)} samples`);
    }
    if (batchSizeOnRetry > defaultBatchSize) {
      throw new ConfigurationError(
        `Batch size on retry should be equal to or less than ${String(defaultBatchSize)}`
      );
    }

    const cap = task.maxBatchSize;
    if (cap !== undefined) {
      if (!Number.isInteger(cap) || cap < 1) {
        throw new ConfigurationError(`Task batch cap must be a positive integer, got ${String(cap)}`);
      }
      const capped = Math.min(defaultBatchSize, cap);
      return { batchSize: capped, retries: nRetries + Math.floor(defaultBatchSize / capped), cap };
    }

    return { batchSize: defaultBatchSize, retries: nRetries, cap: undefined };
  }

  /**
   * Request forecasts until `nSamples` valid sample paths are collected or retries run out
   * @param task - Task instance to forecast
   * @param nSamples - Number of sample paths to return
   * @returns Samples shaped [n, H, 1] with usage, raw outputs, cost and timing
   * @throws ConfigurationError before any request when the settings cannot reach `nSamples`
   * @throws InsufficientSamplesError when `failOnInvalid` is set and the budget runs out
   */
  async acquire(task: TaskInstance, nSamples: number): Promise<AcquisitionResult> {
    const plan = this.planBatches(task, nSamples);
    const { batchSizeOnRetry, failOnInvalid, tokenCost } = this.settings;

    const startedAt = performance.now();
    let clientMs = 0;

    this.logger.log('Building prompt for model.');
    const { messages, targetTimestamps } = buildPrompt(task, {
      useContext: this.settings.useContext,
      maxDigits: this.settings.maxDigits,
    });

    const usage = emptyUsage();
    const rawOutputs: string[] = [];
    let validForecasts: number[][] = [];
    let { batchSize, retries } = plan;

    while (validForecasts.length < nSamples && retries > 0) {
      this.logger.log(`Requesting forecast of ${String(batchSize)} samples from the model.`);

      const clientStartedAt = performance.now();
      const response = await this.client.generate({
        model: this.settings.model,
        messages,
        n: batchSize,
        maxTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
      });
      clientMs += performance.now() - clientStartedAt;

      usage.inputTokens += response.usage.promptTokens;
      usage.outputTokens += response.usage.completionTokens;

      for (const choice of response.choices) {
        rawOutputs.push(choice.content);
        const forecast = this.tryParse(choice.content, targetTimestamps);
        if (forecast !== undefined) {
          validForecasts.push(forecast);
        }
      }

      validForecasts = validForecasts.slice(0, nSamples);
      retries -= 1;
      batchSize = plan.cap === undefined
        ? batchSizeOnRetry
        : Math.min(Math.max(nSamples - validForecasts.length, batchSizeOnRetry), plan.cap);

      this.logger.log(`Got ${String(validForecasts.length)}/${String(nSamples)} valid forecasts.`);
      if (validForecasts.length < nSamples) {
        this.logger.log(`Remaining retries: ${String(retries)}.`);
      }
    }

    if (failOnInvalid && validForecasts.length < nSamples) {
      throw new InsufficientSamplesError(nSamples, validForecasts.length);
    }

    this.logger.log(
      `Total tokens used: input=${String(usage.inputTokens)} output=${String(usage.outputTokens)}`
    );

    const result: AcquisitionResult = {
      samples: validForecasts.map((forecast) => forecast.map((value) => [value])),
      usage,
      rawOutputs,
      timing: { totalMs: 0, clientMs },
    };

    if (tokenCost !== undefined) {
      this.applyCost(result, tokenCost);
    }

    result.timing.totalMs = performance.now() - startedAt;
    return result;
  }

  private tryParse(rawText: string, targetTimestamps: readonly string[]): number[] | undefined {
    try {
      return parseForecast(rawText, targetTimestamps);
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      this.logger.log(`Sample rejected due to invalid format: ${error.reason}`);
      this.logger.log(`Rejected output: ${error.rawText}`);
      return undefined;
    }
  }

  private applyCost(result: AcquisitionResult, tokenCost: TokenCost): void {
    const cost = estimateCost(result.usage, tokenCost);
    this.logger.log(`Forecast cost: ${cost.toFixed(2)}$`);
    this.lifetimeCost += cost;
    result.cost = cost;
    result.tokenCost = { ...tokenCost };
  }
}
