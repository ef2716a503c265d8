import { describe, it, expect } from 'vitest';

import { formatGeneral, formatTimestamp, formatValue } from '../src/number-format.js';
import { parseForecast } from '../src/response-parser.js';

describe('formatGeneral', () => {
  it.each([
    [0, '0'],
    [100, '100'],
    [-5, '-5'],
    [12.5, '12.5'],
    [1234.5678, '1234.57'],
    [0.0001234, '0.0001234'],
    [0.00001234, '1.234e-05'],
    [999_999.7, '1e+06'],
    [3.141_592_65, '3.14159'],
  ])('formats %d as %s with 6 significant digits', (value, expected) => {
    expect(formatGeneral(value, 6)).toBe(expected);
  });

  it('uses the digit count as the exponential threshold', () => {
    expect(formatGeneral(1234, 3)).toBe('1.23e+03');
    expect(formatGeneral(123, 3)).toBe('123');
  });
});

describe('formatValue', () => {
  it('switches to integer notation at 10^maxDigits', () => {
    expect(formatValue(1_000_000, 6)).toBe('1000000');
    expect(formatValue(12_345_678.9, 6)).toBe('12345679');
  });

  it('applies the threshold to negative magnitudes', () => {
    expect(formatValue(-2_500_000.4, 6)).toBe('-2500000');
  });

  it('never uses an exponent for very large magnitudes', () => {
    expect(formatValue(1e21, 6)).toBe('1000000000000000000000');
    expect(formatValue(-3.2e22, 6)).toBe('-32000000000000000000000');
  });

  it('keeps general notation below the threshold', () => {
    expect(formatValue(98_765.4321, 6)).toBe('98765.4');
  });
});

describe('formatTimestamp', () => {
  it('formats in UTC with zero padding', () => {
    expect(formatTimestamp(new Date('2024-01-05T03:07:09Z'))).toBe('2024-01-05 03:07:09');
  });
});

describe('serialization round-trip', () => {
  it.each([12.5, 0.000_321, 98_765.4321, 4_200_000, -17.25])(
    'recovers %d within the stated precision',
    (value) => {
      const timestamp = '2024-01-01 00:00:00';
      const echoed = `<forecast>\n(${timestamp}, ${formatValue(value, 6)})\n</forecast>`;
      const [parsed] = parseForecast(echoed, [timestamp]);
      expect(parsed).toBeDefined();
      const relativeError = Math.abs(((parsed ?? Number.NaN) - value) / value);
      expect(relativeError).toBeLessThan(5e-6);
    }
  );
});
