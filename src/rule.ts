import type { Token } from './lexer.js';
import type { Diagnostic } from './types.js';
import { FAMILY_CODES, classifyLiteral, type NumeralFamily } from './literals.js';
import { findInvalidSeparator } from './separators.js';

const PREFIX_LENGTH = 2;

export type CheckResult =
  | { type: 'ok' }
  | { type: 'invalid'; diagnostic: Diagnostic }
  | { type: 'unsupported'; family: NumeralFamily; token: Token };

type FamilyCheck = (token: Token) => CheckResult;

// Raised when a literal reaches a family whose validation does not exist yet
export class UnsupportedFamilyError extends Error {
  readonly code: string;

  constructor(readonly family: NumeralFamily, readonly token: Token) {
    super(`${FAMILY_CODES[family]} ${family} separator validation is not implemented`);
    this.name = 'UnsupportedFamilyError';
    this.code = FAMILY_CODES[family];
  }
}

/**
 * Flags numeric literals whose underscores do not split the digits into
 * groups of the family's width. Widths are fields so a subclass can
 * override them.
 */
export class NumericSeparatorRule {
  readonly decWidth: number = 3;
  readonly binWidth: number = 4;
  readonly octWidth: number = 4;
  readonly hexWidth: number = 4;
  readonly pointWidth: number = 3;
  readonly exponentWidth: number = 3;

  private readonly checks: Record<NumeralFamily, FamilyCheck>;

  constructor(private readonly tokens: Iterable<Token>) {
    // Widths are read when a check runs, after subclass fields are set
    this.checks = {
      DEC: (token) => this.checkBody(token, 'DEC', 0),
      BIN: (token) => this.checkBody(token, 'BIN', PREFIX_LENGTH),
      OCT: (token) => this.checkBody(token, 'OCT', PREFIX_LENGTH),
      HEX: (token) => this.checkBody(token, 'HEX', PREFIX_LENGTH),
      POINTFLOAT: (token) => ({ type: 'unsupported', family: 'POINTFLOAT', token }),
      EXPONENTFLOAT: (token) => ({ type: 'unsupported', family: 'EXPONENTFLOAT', token }),
    };
  }

  *run(): Generator<Diagnostic, void, undefined> {
    for (const token of this.tokens) {
      if (token.type !== 'number') continue;

      const result = this.check(token);
      if (result.type === 'invalid') {
        yield result.diagnostic;
      } else if (result.type === 'unsupported') {
        throw new UnsupportedFamilyError(result.family, result.token);
      }
    }
  }

  check(token: Token): CheckResult {
    return this.checks[classifyLiteral(token.value)](token);
  }

  widthOf(family: NumeralFamily): number {
    switch (family) {
      case 'DEC':
        return this.decWidth;
      case 'BIN':
        return this.binWidth;
      case 'OCT':
        return this.octWidth;
      case 'HEX':
        return this.hexWidth;
      case 'POINTFLOAT':
        return this.pointWidth;
      case 'EXPONENTFLOAT':
        return this.exponentWidth;
    }
  }

  private checkBody(token: Token, family: NumeralFamily, prefixLength: number): CheckResult {
    const invalid = findInvalidSeparator(token.value.slice(prefixLength), this.widthOf(family));
    if (invalid === null) {
      return { type: 'ok' };
    }

    return {
      type: 'invalid',
      diagnostic: {
        line: token.start.line,
        col: token.start.col + prefixLength + invalid,
        message: `${FAMILY_CODES[family]} ${family} Invalid`,
        fix: null,
      },
    };
  }
}
