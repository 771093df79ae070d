import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { formatDecimal } from './formatter/format_decimal';
import { interpret } from './interpreter/interpret';
import { InterpretationError } from './interpreter/interpreter_errors';
import { tokenize } from './tokenizer/tokenizer';
import { TokenizerError } from './tokenizer/tokenizer_errors';

export type EvaluationError = TokenizerError | InterpretationError;

export type EvaluationResult = E.Either<EvaluationError, number>;

export function stripWhitespace(expression: string): string {
  return expression.replace(/\s+/g, '');
}

export function evaluateExpression(expression: string): EvaluationResult {
  return pipe(
    tokenize(stripWhitespace(expression)),
    E.flatMap(interpret)
  );
}

export function describeError(error: EvaluationError): string {
  switch (error.reason) {
    case 'invalid_character':
      return `Invalid character: ${error.character}`;
    case 'invalid_number':
      return `Invalid number: ${error.literal}`;
    case 'invalid_operator':
      return `Invalid operator: ${error.operator}`;
    case 'division_by_zero':
      return 'Division by zero!';
    case 'exhaustive_check_failed':
      return `Unexpected token: ${JSON.stringify(error.value)}`;
  }
}

/**
 * Evaluates an expression into the line a user sees: the formatted result on
 * the right, `Error: <message>` on the left.
 */
export function renderEvaluation(expression: string): E.Either<string, string> {
  return pipe(
    evaluateExpression(expression),
    E.bimap((error) => `Error: ${describeError(error)}`, formatDecimal)
  );
}
