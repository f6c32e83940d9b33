import { ParseError } from '../core/errors.js';

export type TokenKind = 'atom' | 'var' | 'integer' | 'float' | 'char' | 'string' | 'punct' | 'keyword' | 'dot' | 'eof';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Decoded value for atoms, strings and chars; numeric text otherwise. */
  value: string;
  line: number;
  offset: number;
}

const KEYWORDS = new Set([
  'after', 'and', 'andalso', 'band', 'begin', 'bnot', 'bor', 'bsl', 'bsr', 'bxor',
  'case', 'catch', 'div', 'end', 'fun', 'if', 'not', 'of', 'or', 'orelse',
  'receive', 'rem', 'try', 'when', 'xor',
]);

// Longest first
const PUNCTUATION = [
  '=:=', '=/=', '...',
  '->', '<-', '<=', '=>', ':=', '||', '++', '--', '==', '/=', '=<', '>=', '<<', '>>', '::', '..',
  '(', ')', '{', '}', '[', ']', ',', ';', ':', '|', '=', '+', '-', '*', '/', '<', '>', '!', '#', '?', '.',
];

const ESCAPES: Record<string, string> = {
  n: '\n', t: '\t', r: '\r', s: ' ', e: '\x1b', b: '\b', f: '\f', v: '\v', d: '\x7f',
  '\\': '\\', '"': '"', "'": "'",
};

const isDigit = (c: string) => c >= '0' && c <= '9';
const isNameChar = (c: string) => /[A-Za-z0-9_@]/.test(c);
const isWhitespace = (c: string) => c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\f';

export function tokenize(src: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;

  const push = (kind: TokenKind, text: string, value: string, startLine: number, offset: number) => {
    tokens.push({ kind, text, value, line: startLine, offset });
  };

  // Reads one escape sequence after a backslash at position i
  const readEscape = (): string => {
    const c = src[i];
    if (c === undefined) throw new ParseError('Unterminated escape sequence', line);
    if (c >= '0' && c <= '7') {
      let digits = '';
      while (digits.length < 3 && src[i] >= '0' && src[i] <= '7') digits += src[i++];
      return String.fromCodePoint(parseInt(digits, 8));
    }
    if (c === 'x') {
      i++;
      let digits = '';
      if (src[i] === '{') {
        i++;
        while (i < src.length && src[i] !== '}') digits += src[i++];
        i++;
      } else {
        digits = src.slice(i, i + 2);
        i += 2;
      }
      return String.fromCodePoint(parseInt(digits, 16));
    }
    if (c === '^') {
      const ctl = src[i + 1] ?? '@';
      i += 2;
      return String.fromCharCode(ctl.charCodeAt(0) & 31);
    }
    i++;
    if (c === '\n') line++;
    return ESCAPES[c] ?? c;
  };

  const readQuoted = (quote: string): string => {
    let out = '';
    i++;
    while (true) {
      const c = src[i];
      if (c === undefined) throw new ParseError('Unterminated quoted literal', line);
      if (c === quote) { i++; break; }
      if (c === '\\') { i++; out += readEscape(); continue; }
      if (c === '\n') line++;
      out += c;
      i++;
    }
    return out;
  };

  while (i < src.length) {
    const c = src[i];

    if (c === '%') {
      while (i < src.length && src[i] !== '\n') i++;
      continue;
    }
    if (isWhitespace(c)) {
      if (c === '\n') line++;
      i++;
      continue;
    }

    const start = i;
    const startLine = line;

    if (isDigit(c)) {
      let text = '';
      while (isDigit(src[i] ?? '')) text += src[i++];
      if (src[i] === '#') {
        const base = parseInt(text, 10);
        if (base < 2 || base > 36) throw new ParseError(`Invalid integer base ${base}`, line);
        i++;
        let value = 0n;
        let digits = 0;
        while (/[0-9A-Za-z]/.test(src[i] ?? '')) {
          const digit = parseInt(src[i], 36);
          if (digit >= base) throw new ParseError(`Digit '${src[i]}' out of range for base ${base}`, line);
          value = value * BigInt(base) + BigInt(digit);
          digits++;
          i++;
        }
        if (digits === 0) throw new ParseError(`Missing digits after ${base}#`, line);
        push('integer', src.slice(start, i), value.toString(), startLine, start);
        continue;
      }
      if (src[i] === '.' && isDigit(src[i + 1] ?? '')) {
        text += src[i++];
        while (isDigit(src[i] ?? '')) text += src[i++];
        if (src[i] === 'e' || src[i] === 'E') {
          text += src[i++];
          if (src[i] === '-' || src[i] === '+') text += src[i++];
          while (isDigit(src[i] ?? '')) text += src[i++];
        }
        push('float', text, text, startLine, start);
        continue;
      }
      push('integer', text, text, startLine, start);
      continue;
    }

    if (c === '$') {
      i++;
      let value: string;
      if (src[i] === '\\') {
        i++;
        value = readEscape();
      } else {
        const cp = src.codePointAt(i);
        if (cp === undefined) throw new ParseError('Unterminated character literal', line);
        value = String.fromCodePoint(cp);
        i += value.length;
      }
      push('char', src.slice(start, i), value, startLine, start);
      continue;
    }

    if (c === '"') {
      const value = readQuoted('"');
      push('string', src.slice(start, i), value, startLine, start);
      continue;
    }

    if (c === "'") {
      const value = readQuoted("'");
      push('atom', src.slice(start, i), value, startLine, start);
      continue;
    }

    if (/[a-z]/.test(c)) {
      while (isNameChar(src[i] ?? '')) i++;
      const text = src.slice(start, i);
      push(KEYWORDS.has(text) ? 'keyword' : 'atom', text, text, startLine, start);
      continue;
    }

    if (/[A-Z_]/.test(c)) {
      while (isNameChar(src[i] ?? '')) i++;
      const text = src.slice(start, i);
      push('var', text, text, startLine, start);
      continue;
    }

    // A dot followed by whitespace, a comment or end of input ends a form
    if (c === '.' && (i + 1 >= src.length || isWhitespace(src[i + 1]) || src[i + 1] === '%')) {
      i++;
      push('dot', '.', '.', startLine, start);
      continue;
    }

    const punct = PUNCTUATION.find((p) => src.startsWith(p, i));
    if (punct) {
      i += punct.length;
      push('punct', punct, punct, startLine, start);
      continue;
    }

    throw new ParseError(`Unexpected character '${c}'`, line);
  }

  tokens.push({ kind: 'eof', text: '', value: '', line, offset: src.length });
  return tokens;
}
