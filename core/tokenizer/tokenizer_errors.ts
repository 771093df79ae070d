export type TokenizerError =
  | {
      reason: 'invalid_character';
      character: string;
    }
  | {
      reason: 'invalid_number';
      literal: string;
    };

export const TOKENIZER_ERROR_CODES = {
  invalid_character: 'invalid_character',
  invalid_number: 'invalid_number',
} as const;
