export type NumberToken = {
  type: 'number';
  value: number;
};

export type OperatorSymbol = '+' | '-' | '*' | '/';

export type OperatorToken<TOperator extends string> = TOperator extends string
  ? {
      type: 'operator';
      value: TOperator;
    }
  : never;

export type Token = NumberToken | OperatorToken<OperatorSymbol>;

export const OPERATOR_SYMBOLS: ReadonlyArray<OperatorSymbol> = [
  '+',
  '-',
  '*',
  '/',
];

export function isOperatorSymbol(value: string): value is OperatorSymbol {
  return OPERATOR_SYMBOLS.some((symbol) => symbol === value);
}
