export * from './tokenizer/tokens';
export { tokenize } from './tokenizer/tokenizer';
export type { TokenizeResult } from './tokenizer/tokenizer';
export * from './tokenizer/tokenizer_errors';
export { interpret, applyOperator } from './interpreter/interpret';
export type { InterpretationResult } from './interpreter/interpret';
export * from './interpreter/interpreter_errors';
export {
  formatDecimal,
  expandScientific,
  trimTrailingZeros,
} from './formatter/format_decimal';
export * from './evaluate';
