import * as fc from 'fast-check';
import {
  expandScientific,
  formatDecimal,
  trimTrailingZeros,
} from './format_decimal';
import { finiteDoubleArbitrary } from '../+test_utils/arbitraries';

describe('formatDecimal', () => {
  test.each([
    [NaN, 'NaN'],
    [Infinity, 'Infinity'],
    [-Infinity, '-Infinity'],
  ])('spells out %p', (value, expected) => {
    expect(formatDecimal(value)).toBe(expected);
  });

  test.each([
    [2, '2'],
    [-2, '-2'],
    [123.456, '123.456'],
    [0.1 + 0.2, '0.30000000000000004'],
    [1e-6, '0.000001'],
    [9007199254740993, '9007199254740992'],
    [9999999999999998, '9999999999999998'],
  ])('formats %p inside the plain band as %p', (value, expected) => {
    expect(formatDecimal(value)).toBe(expected);
  });

  test.each([
    [1e20, '100000000000000000000'],
    [1e-20, '0.00000000000000000001'],
    [1e16, '10000000000000000'],
    [1e21, '1000000000000000000000'],
    [-1.5e-7, '-0.00000015'],
    [9.99e-7, '0.000000999'],
    [1.25e22, '12500000000000000000000'],
    [-3.5e25, '-35000000000000000000000000'],
    [1.234e-10, '0.0000000001234'],
  ])('expands %p as %p', (value, expected) => {
    expect(formatDecimal(value)).toBe(expected);
  });

  test('formats both zeros as 0', () => {
    expect(formatDecimal(0)).toBe('0');
    expect(formatDecimal(-0)).toBe('0');
  });

  test('expands the largest double to all of its integer digits', () => {
    const formatted = formatDecimal(Number.MAX_VALUE);

    expect(formatted).toHaveLength(309);
    expect(formatted.slice(0, 16)).toBe('1797693134862316');
    expect(formatted.slice(16)).toBe('0'.repeat(293));
  });

  test('expands the smallest subnormal without losing its digit', () => {
    expect(formatDecimal(Number.MIN_VALUE)).toBe(`0.${'0'.repeat(323)}5`);
  });

  test('round-trips values inside the plain band', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 1e-6, max: 1e15, noNaN: true }),
        fc.boolean(),
        (magnitude, negative) => {
          const value = negative ? -magnitude : magnitude;

          expect(Number(formatDecimal(value))).toBe(value);
        }
      )
    );
  });

  test('never uses scientific notation or keeps trailing zeros', () => {
    fc.assert(
      fc.property(finiteDoubleArbitrary, (value) => {
        expect(formatDecimal(value)).toMatch(/^-?\d+(\.\d*[1-9])?$/);
      })
    );
  });

  test('stays within fifteen significant digits of the input', () => {
    fc.assert(
      fc.property(finiteDoubleArbitrary, (value) => {
        const parsed = Number(formatDecimal(value));

        expect(Math.abs(parsed - value)).toBeLessThanOrEqual(
          Math.abs(value) * 1e-14
        );
      })
    );
  });

  test('depends only on the value', () => {
    fc.assert(
      fc.property(
        finiteDoubleArbitrary,
        finiteDoubleArbitrary,
        (value, other) => {
          const first = formatDecimal(value);
          formatDecimal(other);

          expect(formatDecimal(value)).toBe(first);
        }
      )
    );
  });
});

describe('expandScientific', () => {
  test('multiplies out a non-negative adjusted exponent', () => {
    expect(expandScientific(4.5, 3)).toBe('4500');
    expect(expandScientific(7, 0)).toBe('7');
  });

  test('places the decimal point inside the digits when the shift is short', () => {
    expect(expandScientific(1.25, 1)).toBe('12.5');
    expect(expandScientific(-1.25, 1)).toBe('-12.5');
    expect(expandScientific(3.14159, 2)).toBe('314.159');
  });

  test('pads with zeros when the shift reaches past the digits', () => {
    expect(expandScientific(1.25, -1)).toBe('0.125');
    expect(expandScientific(1.25, -3)).toBe('0.00125');
  });

  test('drops a fraction that ends up all zeros', () => {
    expect(expandScientific(1.5, 1)).toBe('15');
  });
});

describe('trimTrailingZeros', () => {
  test.each([
    ['2.000000', '2'],
    ['2.500', '2.5'],
    ['100', '100'],
    ['0.0', '0'],
    ['10.05', '10.05'],
  ])('trims %p to %p', (value, expected) => {
    expect(trimTrailingZeros(value)).toBe(expected);
  });
});
