import { lex } from './lexer.js';
import { NumericSeparatorRule, UnsupportedFamilyError } from './rule.js';
import type { Diagnostic } from './types.js';

export type CheckOptions = {
  // Code prefixes to report (e.g. NSP0 or NSP011); everything when empty
  select?: string[];
  // Code prefixes to drop; wins over select
  ignore?: string[];
};

export type CheckOutcome =
  | { type: 'ok'; diagnostics: Diagnostic[] }
  // diagnostics: what was reported before analysis stopped
  | { type: 'error'; error: UnsupportedFamilyError; diagnostics: Diagnostic[] };

export function checkSource(source: string, options: CheckOptions = {}): CheckOutcome {
  const rule = new NumericSeparatorRule(lex(source));
  const diagnostics: Diagnostic[] = [];

  try {
    for (const diagnostic of rule.run()) {
      if (isReported(codeOf(diagnostic), options)) {
        diagnostics.push(diagnostic);
      }
    }
  } catch (err) {
    if (err instanceof UnsupportedFamilyError) {
      return { type: 'error', error: err, diagnostics };
    }
    throw err;
  }

  return { type: 'ok', diagnostics };
}

export function codeOf(diagnostic: Diagnostic): string {
  return diagnostic.message.split(' ')[0];
}

function isReported(code: string, options: CheckOptions): boolean {
  const { select = [], ignore = [] } = options;
  if (ignore.some((prefix) => code.startsWith(prefix))) return false;
  return select.length === 0 || select.some((prefix) => code.startsWith(prefix));
}

// Columns are printed 1-based, like most editors expect
export function formatDiagnostic(file: string, d: Diagnostic): string {
  return `${file}:${d.line}:${d.col + 1}: ${d.message}`;
}
