import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { NumberToken, Token, isOperatorSymbol } from './tokens';
import { TOKENIZER_ERROR_CODES, TokenizerError } from './tokenizer_errors';

const literalCharacterPattern = /^[\d.e]$/i;
const exponentMarkerPattern = /^e$/i;
const floatPattern = /^(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?$/i;

export type TokenizeResult = E.Either<TokenizerError, Token[]>;

/**
 * Splits a whitespace-free expression into number and operator tokens.
 *
 * Digits, '.', 'e' and 'E' accumulate into a pending literal, together with a
 * sign that directly follows an exponent marker. The literal is only parsed
 * when an operator or the end of input flushes it, so a character outside
 * the grammar is reported before any malformed literal in front of it.
 */
export function tokenize(input: string): TokenizeResult {
  const characters = Array.from(input);
  const tokens: Token[] = [];
  let literal = '';

  for (let cursor = 0; cursor < characters.length; cursor++) {
    const character = characters[cursor];

    if (literalCharacterPattern.test(character)) {
      literal += character;

      const next = characters[cursor + 1];
      if (
        exponentMarkerPattern.test(character) &&
        (next === '+' || next === '-')
      ) {
        literal += next;
        cursor++;
      }
    } else if (isOperatorSymbol(character)) {
      const flushed = flushLiteral(literal);

      if (E.isLeft(flushed)) {
        return flushed;
      }

      tokens.push(...flushed.right, { type: 'operator', value: character });
      literal = '';
    } else {
      return E.left(invalidCharacter(character));
    }
  }

  return pipe(
    flushLiteral(literal),
    E.map((rest) => [...tokens, ...rest])
  );
}

function flushLiteral(
  literal: string
): E.Either<TokenizerError, NumberToken[]> {
  if (!literal) {
    return E.right([]);
  }

  return floatPattern.test(literal)
    ? E.right([{ type: 'number', value: parseFloat(literal) }])
    : E.left(invalidNumber(literal));
}

function invalidCharacter(character: string): TokenizerError {
  return {
    reason: TOKENIZER_ERROR_CODES.invalid_character,
    character,
  };
}

function invalidNumber(literal: string): TokenizerError {
  return {
    reason: TOKENIZER_ERROR_CODES.invalid_number,
    literal,
  };
}
