import * as E from 'fp-ts/Either';
import * as RA from 'fp-ts/ReadonlyArray';
import { pipe } from 'fp-ts/function';
import { Token } from '../tokenizer/tokens';
import {
  INTERPRETATION_ERROR_CODES,
  InterpretationError,
} from './interpreter_errors';

export { INTERPRETATION_ERROR_CODES } from './interpreter_errors';
export type { InterpretationError } from './interpreter_errors';

export type InterpretationResult = E.Either<InterpretationError, number>;

type FoldState = Readonly<{
  accumulator: number;
  pendingOperator: string;
}>;

const initialState: FoldState = {
  accumulator: 0,
  pendingOperator: '+',
};

/**
 * Folds the tokens from left to right with no precedence. The accumulator
 * starts at zero under a pending '+', so "-5+3" is 0 - 5 + 3.
 */
export function interpret(tokens: ReadonlyArray<Token>): InterpretationResult {
  return pipe(
    tokens,
    RA.reduce<Token, E.Either<InterpretationError, FoldState>>(
      E.right(initialState),
      (state, token) =>
        pipe(
          state,
          E.flatMap((state) => step(state, token))
        )
    ),
    E.map(({ accumulator }) => accumulator)
  );
}

function step(
  state: FoldState,
  token: Token
): E.Either<InterpretationError, FoldState> {
  switch (token.type) {
    case 'operator':
      return E.right({ ...state, pendingOperator: token.value });
    case 'number':
      return pipe(
        applyOperator(state.accumulator, token.value, state.pendingOperator),
        E.map((accumulator) => ({ ...state, accumulator }))
      );
    default:
      return exhaustiveResult(token);
  }
}

export function applyOperator(
  left: number,
  right: number,
  operator: string
): InterpretationResult {
  switch (operator) {
    case '+':
      return E.right(left + right);
    case '-':
      return E.right(left - right);
    case '*':
      return E.right(left * right);
    case '/':
      return right === 0
        ? E.left({ reason: INTERPRETATION_ERROR_CODES.division_by_zero })
        : E.right(left / right);
    default:
      return E.left({
        reason: INTERPRETATION_ERROR_CODES.invalid_operator,
        operator,
      });
  }
}

function exhaustiveResult(
  value: never
): E.Either<InterpretationError, FoldState> {
  return E.left({
    reason: INTERPRETATION_ERROR_CODES.exhaustive_check_failed,
    value,
  });
}
