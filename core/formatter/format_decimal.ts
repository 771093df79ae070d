// Plain conversion is trusted only inside this band; outside it the value
// goes through its scientific form and is expanded with bigint arithmetic.
const PLAIN_LOWER_BOUND = 1e-6;
const PLAIN_UPPER_BOUND = 1e16;
const MANTISSA_FRACTION_DIGITS = 15;

/**
 * Renders a double as a full decimal string, never in scientific notation.
 *
 * `1e20` becomes `"100000000000000000000"` and `1e-20` becomes
 * `"0.00000000000000000001"`. Digits are moved across the decimal point with
 * integer arithmetic so the expansion adds no rounding of its own.
 */
export function formatDecimal(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }

  if (!Number.isFinite(value)) {
    return value > 0 ? 'Infinity' : '-Infinity';
  }

  const magnitude = Math.abs(value);
  if (
    magnitude >= PLAIN_LOWER_BOUND &&
    magnitude < PLAIN_UPPER_BOUND &&
    !String(value).includes('e')
  ) {
    return formatRegularNumber(value);
  }

  const [mantissa, exponent] = value.toExponential().split('e');

  return expandScientific(parseFloat(mantissa), parseInt(exponent, 10));
}

/**
 * Expands `mantissa × 10^exponent` into plain decimal notation.
 */
export function expandScientific(mantissa: number, exponent: number): string {
  const expanded =
    mantissa < 0
      ? `-${expandMagnitude(-mantissa, exponent)}`
      : expandMagnitude(mantissa, exponent);

  return trimTrailingZeros(expanded);
}

export function trimTrailingZeros(value: string): string {
  return value.includes('.') ? value.replace(/\.?0+$/, '') : value;
}

function formatRegularNumber(value: number): string {
  return trimTrailingZeros(String(value));
}

function expandMagnitude(mantissa: number, exponent: number): string {
  const [integerPart, fractionPart = ''] = trimTrailingZeros(
    mantissa.toFixed(MANTISSA_FRACTION_DIGITS)
  ).split('.');
  const digits = BigInt(`${integerPart}${fractionPart}`);
  const adjustedExponent = exponent - fractionPart.length;

  return adjustedExponent >= 0
    ? scaleUp(digits, adjustedExponent)
    : scaleDown(digits, -adjustedExponent);
}

function scaleUp(digits: bigint, exponent: number): string {
  return (digits * 10n ** BigInt(exponent)).toString();
}

function scaleDown(digits: bigint, shift: number): string {
  const rendered = digits.toString();

  if (shift >= rendered.length) {
    return `0.${'0'.repeat(shift - rendered.length)}${rendered}`;
  }

  const pointIndex = rendered.length - shift;
  return `${rendered.slice(0, pointIndex)}.${rendered.slice(pointIndex)}`;
}
