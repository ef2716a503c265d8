/**
 * Value and timestamp serialization used in prompts
 */

const EXPONENT_PATTERN = /e([+-]\d+)$/;

function stripTrailingZeros(mantissa: string): string {
  if (!mantissa.includes('.')) {
    return mantissa;
  }
  return mantissa.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Format a number in general notation with up to `significantDigits` significant digits.
 * Exponential notation is used when the decimal exponent is below -4 or at least
 * `significantDigits`; trailing zeros are removed in both notations.
 * @param value - Finite number to format
 * @param significantDigits - Maximum number of significant digits
 * @returns Formatted number
 */
export function formatGeneral(value: number, significantDigits: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  const exponential = value.toExponential(significantDigits - 1);
  const exponentMatch = EXPONENT_PATTERN.exec(exponential);
  const exponent = exponentMatch?.[1] === undefined ? 0 : Number(exponentMatch[1]);

  if (exponent < -4 || exponent >= significantDigits) {
    const [mantissa = ''] = exponential.split('e');
    const sign = exponent < 0 ? '-' : '+';
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
  }

  const fixed = value.toFixed(Math.max(0, significantDigits - 1 - exponent));
  return stripTrailingZeros(fixed);
}

/**
 * Format a history value for a prompt. Values whose magnitude reaches
 * 10^maxDigits are written as integers so they never switch to exponential notation.
 * @param value - The observed value
 * @param maxDigits - Maximum significant digits
 * @returns Serialized value
 */
export function formatValue(value: number, maxDigits: number): string {
  if (Number.isFinite(value) && Math.abs(value) >= 10 ** maxDigits) {
    // toFixed switches to exponent form from 1e21; doubles that large are integral
    return Math.abs(value) < 1e21 ? value.toFixed(0) : BigInt(value).toString();
  }
  return formatGeneral(value, maxDigits);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a timestamp as `YYYY-MM-DD HH:mm:ss` in UTC
 * @param timestamp - The timestamp to format
 * @returns Formatted timestamp
 */
export function formatTimestamp(timestamp: Date): string {
  const date = `${String(timestamp.getUTCFullYear())}-${pad(timestamp.getUTCMonth() + 1)}-${pad(timestamp.getUTCDate())}`;
  const time = `${pad(timestamp.getUTCHours())}:${pad(timestamp.getUTCMinutes())}:${pad(timestamp.getUTCSeconds())}`;
  return `${date} ${time}`;
}
