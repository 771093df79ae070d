import * as fc from 'fast-check';
import { OperatorSymbol } from '../tokenizer/tokens';

export const signArbitrary = fc.constantFrom<'+' | '-'>('+', '-');
export const digitArbitrary = fc.constantFrom(...'0123456789');
export const characterArbitrary = fc.constantFrom(
  ...'abcdfghijklmnopqrstuvwxyzABCDFGHIJKLMNOPQRSTUVWXYZ!%^()=,;$#@'
);
export const numberStringArbitrary = fc
  .tuple(
    fc.array(digitArbitrary, { minLength: 0, maxLength: 10 }),
    fc.option(fc.array(digitArbitrary, { minLength: 1, maxLength: 10 })),
    fc.constantFrom('e', 'E'),
    fc.option(signArbitrary),
    fc.option(fc.array(digitArbitrary, { minLength: 1, maxLength: 3 }))
  )
  .map(([integer, decimal, exponentMarker, exponentSign, exponent]) => {
    if (!integer.length && !decimal) {
      return '0';
    }

    return `${integer.join('')}${decimal ? `.${decimal.join('')}` : ''}${
      exponent
        ? `${exponentMarker}${exponentSign ?? ''}${exponent.join('')}`
        : ''
    }`;
  });
export const nonZeroNumberStringArbitrary = numberStringArbitrary.filter(
  (numberString) => parseFloat(numberString) !== 0
);
export const operatorArbitrary = fc.constantFrom<OperatorSymbol>(
  '+',
  '-',
  '*',
  '/'
);
export const finiteDoubleArbitrary = fc.double({
  noNaN: true,
  noDefaultInfinity: true,
});
