export type InterpretationError =
  | {
      reason: 'division_by_zero';
    }
  | {
      reason: 'invalid_operator';
      operator: string;
    }
  | {
      reason: 'exhaustive_check_failed';
      value: unknown;
    };

export const INTERPRETATION_ERROR_CODES = {
  division_by_zero: 'division_by_zero',
  exhaustive_check_failed: 'exhaustive_check_failed',
  invalid_operator: 'invalid_operator',
} as const;
