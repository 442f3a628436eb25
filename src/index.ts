export { lex } from './lexer.js';
export type { Token, TokenType } from './lexer.js';
export { classifyLiteral, FAMILY_CODES, NUMERAL_FAMILIES } from './literals.js';
export type { NumeralFamily } from './literals.js';
export { findInvalidSeparator, isValidlySeparated, SEPARATOR } from './separators.js';
export { NumericSeparatorRule, UnsupportedFamilyError } from './rule.js';
export type { CheckResult } from './rule.js';
export { checkSource, codeOf, formatDiagnostic } from './check.js';
export type { CheckOptions, CheckOutcome } from './check.js';
export { runCli } from './program.js';
export type { CliIO } from './program.js';
export type { Diagnostic, Loc } from './types.js';
