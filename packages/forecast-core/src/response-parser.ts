import { FormatError } from './errors.js';

const FORECAST_BLOCK_PATTERN = /<forecast>([\S\s]*?)<\/forecast>/;
const DECORATION_PATTERN = /["'()]/g;
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Extract the text between the first pair of `<forecast>` tags
 * @param rawText - Model output
 * @returns Block content, or undefined when there is no complete block
 */
export function extractForecastBlock(rawText: string): string | undefined {
  const match = FORECAST_BLOCK_PATTERN.exec(rawText);
  return match?.[1];
}

/**
 * Parse a forecast block into a timestamp → value mapping.
 * Parentheses and quotes are ignored; every line must hold exactly one pair.
 * @param block - Content of the forecast block
 * @param rawText - Full model output, kept on the error
 */
export function parseForecastPairs(block: string, rawText: string): Map<string, number> {
  const lines = block.replace(DECORATION_PATTERN, '').trim().split(/\r?\n/);
  const pairs = new Map<string, number>();

  for (const line of lines) {
    const parts = line.split(',');
    if (parts.length !== 2) {
      throw new FormatError(`expected "timestamp, value" but got "${line.trim()}"`, rawText);
    }
    const [timestampPart = '', valuePart = ''] = parts;
    const timestamp = timestampPart.trim();
    const valueText = valuePart.trim();
    if (timestamp === '') {
      throw new FormatError(`missing timestamp in "${line.trim()}"`, rawText);
    }
    const value = Number(valueText);
    if (!NUMBER_PATTERN.test(valueText) || !Number.isFinite(value)) {
      throw new FormatError(`value "${valueText}" at ${timestamp} is not a number`, rawText);
    }
    pairs.set(timestamp, value);
  }

  return pairs;
}

/**
 * Turn one model output into a forecast aligned with the requested timestamps.
 * Pairs may appear in any order and extra timestamps are ignored;
 * a missing target timestamp is always an error.
 * @param rawText - Model output
 * @param targetTimestamps - Timestamps the forecast must cover, in order
 * @returns One value per target timestamp
 * @throws FormatError when the output cannot be turned into a complete forecast
 */
export function parseForecast(rawText: string, targetTimestamps: readonly string[]): number[] {
  const block = extractForecastBlock(rawText);
  if (block === undefined) {
    throw new FormatError('no <forecast> block found', rawText);
  }

  const pairs = parseForecastPairs(block, rawText);

  return targetTimestamps.map((timestamp) => {
    const value = pairs.get(timestamp);
    if (value === undefined) {
      throw new FormatError(`missing value for ${timestamp}`, rawText);
    }
    return value;
  });
}
