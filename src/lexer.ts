import type { Loc } from './types.js';

export type TokenType = 'number' | 'name' | 'string' | 'op' | 'newline' | 'eof';

export type Token = {
  type: TokenType;
  value: string;
  start: Loc;
  end: Loc; // exclusive
};

const NAME_START = /[\p{L}\p{Nl}_]/u;
const NAME_CONTINUE = /[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]/u;

export function lex(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let col = 0;

  function loc(): Loc {
    return { line, col };
  }

  function peek(offset = 0): string {
    return source[pos + offset] ?? '';
  }

  // Whole code point at pos, so astral characters count as one column
  function current(): string {
    const cp = source.codePointAt(pos);
    return cp === undefined ? '' : String.fromCodePoint(cp);
  }

  function advance(): string {
    const ch = current();
    pos += ch.length;
    if (ch === '\n') {
      line++;
      col = 0;
    } else {
      col++;
    }
    return ch;
  }

  function push(type: TokenType, value: string, start: Loc): void {
    tokens.push({ type, value, start, end: loc() });
  }

  function skipWhitespace(): void {
    while (pos < source.length) {
      const ch = peek();
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f') {
        advance();
      } else if (ch === '\\' && peek(1) === '\n') {
        // Explicit line continuation
        advance(); advance();
      } else if (ch === '#') {
        while (pos < source.length && peek() !== '\n') {
          advance();
        }
      } else {
        break;
      }
    }
  }

  function readName(): string {
    let name = '';
    while (pos < source.length && NAME_CONTINUE.test(current())) {
      name += advance();
    }
    return name;
  }

  // Lenient on purpose: 1__000 or 1_ must arrive as a single literal
  function readNumber(): string {
    let num = '';
    const prefixed = /^0[bBoOxX]/.test(source.slice(pos, pos + 2));
    while (pos < source.length) {
      const ch = peek();
      if (/[0-9a-zA-Z_.]/.test(ch)) {
        num += advance();
      } else if ((ch === '+' || ch === '-') && !prefixed && /[eE]$/.test(num) && /[0-9]/.test(peek(1))) {
        num += advance();
      } else {
        break;
      }
    }
    return num;
  }

  function readString(): string {
    const quote = peek();
    const triple = peek(1) === quote && peek(2) === quote;
    const delimiter = triple ? quote.repeat(3) : quote;
    let str = '';
    for (let i = 0; i < delimiter.length; i++) str += advance();

    while (pos < source.length) {
      if (source.startsWith(delimiter, pos)) {
        for (let i = 0; i < delimiter.length; i++) str += advance();
        break;
      }
      if (!triple && peek() === '\n') break; // unterminated
      if (peek() === '\\') {
        str += advance();
      }
      if (pos < source.length) str += advance();
    }
    return str;
  }

  while (pos < source.length) {
    skipWhitespace();
    if (pos >= source.length) break;

    const startLoc = loc();
    const ch = current();

    if (ch === '\n') {
      advance();
      push('newline', '\n', startLoc);
      continue;
    }

    if (NAME_START.test(ch)) {
      push('name', readName(), startLoc);
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(peek(1)))) {
      push('number', readNumber(), startLoc);
      continue;
    }

    if (ch === '"' || ch === "'") {
      push('string', readString(), startLoc);
      continue;
    }

    push('op', advance(), startLoc);
  }

  tokens.push({ type: 'eof', value: '', start: loc(), end: loc() });
  return tokens;
}
