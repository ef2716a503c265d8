import { describe, it, expect } from 'vitest';

import { FormatError } from '../src/errors.js';
import { extractForecastBlock, parseForecast } from '../src/response-parser.js';

const TARGETS = ['2024-03-01 03:00:00', '2024-03-01 04:00:00', '2024-03-01 05:00:00'];

function expectFormatError(rawText: string, reason: string): void {
  let caught: unknown;
  try {
    parseForecast(rawText, TARGETS);
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(FormatError);
  if (caught instanceof FormatError) {
    expect(caught.reason).toBe(reason);
    expect(caught.rawText).toBe(rawText);
  }
}

describe('extractForecastBlock', () => {
  it('returns the content of the first forecast block', () => {
    const text = 'Thinking...\n<forecast>\n(a, 1)\n</forecast>\n<forecast>(b, 2)</forecast>';
    expect(extractForecastBlock(text)).toBe('\n(a, 1)\n');
  });

  it('returns undefined when the closing tag is missing', () => {
    expect(extractForecastBlock('<forecast>\n(a, 1)\n')).toBeUndefined();
  });
});

describe('parseForecast', () => {
  it('returns values in target order', () => {
    const text = [
      '<forecast>',
      '(2024-03-01 03:00:00, 1.5)',
      '(2024-03-01 04:00:00, 2)',
      '(2024-03-01 05:00:00, -3.25)',
      '</forecast>',
    ].join('\n');

    expect(parseForecast(text, TARGETS)).toEqual([1.5, 2, -3.25]);
  });

  it('accepts pairs in any order', () => {
    const text = [
      '<forecast>',
      '(2024-03-01 05:00:00, 30)',
      '(2024-03-01 03:00:00, 10)',
      '(2024-03-01 04:00:00, 20)',
      '</forecast>',
    ].join('\n');

    expect(parseForecast(text, TARGETS)).toEqual([10, 20, 30]);
  });

  it('ignores timestamps that were not requested', () => {
    const text = [
      '<forecast>',
      '(2024-03-01 03:00:00, 10)',
      '(2024-03-01 04:00:00, 20)',
      '(2024-03-01 05:00:00, 30)',
      '(2024-03-01 06:00:00, 40)',
      '</forecast>',
    ].join('\n');

    expect(parseForecast(text, TARGETS)).toEqual([10, 20, 30]);
  });

  it('strips quotes around timestamps and surrounding whitespace', () => {
    const text = [
      '<forecast>',
      "  ('2024-03-01 03:00:00', 1e3)",
      '("2024-03-01 04:00:00",  .5 )',
      '(2024-03-01 05:00:00, +7)',
      '</forecast>',
    ].join('\n');

    expect(parseForecast(text, TARGETS)).toEqual([1000, 0.5, 7]);
  });

  it('handles windows line endings', () => {
    const text = '<forecast>\r\n(2024-03-01 03:00:00, 1)\r\n(2024-03-01 04:00:00, 2)\r\n(2024-03-01 05:00:00, 3)\r\n</forecast>';
    expect(parseForecast(text, TARGETS)).toEqual([1, 2, 3]);
  });

  it('fails when there is no forecast block', () => {
    expectFormatError('The series will keep rising.', 'no <forecast> block found');
  });

  it('fails when a target timestamp is missing', () => {
    const text = '<forecast>\n(2024-03-01 03:00:00, 1)\n(2024-03-01 05:00:00, 3)\n</forecast>';
    expectFormatError(text, 'missing value for 2024-03-01 04:00:00');
  });

  it('fails when a line has no value', () => {
    const text = '<forecast>\n(2024-03-01 03:00:00)\n</forecast>';
    expectFormatError(text, 'expected "timestamp, value" but got "2024-03-01 03:00:00"');
  });

  it('fails when a line has more than two fields', () => {
    const text = '<forecast>\n(2024-03-01 03:00:00, 1, 2)\n</forecast>';
    expectFormatError(text, 'expected "timestamp, value" but got "2024-03-01 03:00:00, 1, 2"');
  });

  it('fails on a non-numeric value', () => {
    const text = '<forecast>\n(2024-03-01 03:00:00, about 5)\n</forecast>';
    expectFormatError(text, 'value "about 5" at 2024-03-01 03:00:00 is not a number');
  });

  it('fails on non-finite values', () => {
    const text = '<forecast>\n(2024-03-01 03:00:00, 1e999)\n</forecast>';
    expectFormatError(text, 'value "1e999" at 2024-03-01 03:00:00 is not a number');
  });

  it('fails on a blank line inside the block', () => {
    const text = '<forecast>\n(2024-03-01 03:00:00, 1)\n\n(2024-03-01 04:00:00, 2)\n</forecast>';
    expectFormatError(text, 'expected "timestamp, value" but got ""');
  });

  it('fails on an empty timestamp', () => {
    const text = '<forecast>\n( , 1)\n</forecast>';
    expectFormatError(text, 'missing timestamp in ", 1"');
  });

  it('returns identical output for repeated calls', () => {
    const text = '<forecast>\n(2024-03-01 03:00:00, 0.1)\n(2024-03-01 04:00:00, 0.2)\n(2024-03-01 05:00:00, 0.3)\n</forecast>';
    const first = parseForecast(text, TARGETS);
    const second = parseForecast(text, TARGETS);
    expect(second).toEqual(first);
    expect(Object.is(first[0], second[0])).toBe(true);
  });
});
