/**
 * Scanner for Aki source text.
 *
 * Produces the complete token list up front; there is no end-of-input
 * token, the parser stops when the list is exhausted.
 */

import { ATTRIBUTES, KEYWORDS, PlainTokenKind, Token } from './tokens';
import { AkiLexError } from './errors';

const I32_MAX = 2147483647;

// Longest operators first so greedy matching picks '->' over '-'.
const OPERATORS: ReadonlyArray<PlainTokenKind> = [
  '++', '+=', '->', '--', '-=', '==', '!=', '<=', '>=', '&&', '||', '::',
  '+', '-', '*', '/', '%', '=', '<', '>', '!',
  '(', ')', '{', '}', '[', ']', ',', '.', ':', ';',
];

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
};

export class Lexer {
  private readonly input: string;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(input: string) {
    this.input = input;
  }

  /**
   * Scan the whole input.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.pos >= this.input.length) break;
      tokens.push(this.nextToken());
    }
    return tokens;
  }

  private peek(offset = 0): string {
    return this.input.charAt(this.pos + offset);
  }

  private advance(): string {
    const ch = this.input.charAt(this.pos);
    this.pos++;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private skipTrivia(): void {
    while (this.pos < this.input.length) {
      const ch = this.peek();
      if (/\s/.test(ch)) {
        this.advance();
      } else if (ch === '/' && this.peek(1) === '/') {
        while (this.pos < this.input.length && this.peek() !== '\n') this.advance();
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const line = this.line;
    const column = this.column;
    const ch = this.peek();

    if (isDigit(ch)) return this.readNumber(line, column);
    if (isIdentStart(ch)) return this.readIdentifier(line, column);
    if (ch === '"') return this.readString(line, column);
    if (ch === '#') return this.readAttribute(line, column);

    if (ch === '~') {
      this.advance();
      return { kind: 'tilde', line, column };
    }
    if (ch === '@') {
      this.advance();
      return { kind: 'at', line, column };
    }

    for (const op of OPERATORS) {
      if (this.input.startsWith(op, this.pos)) {
        for (let i = 0; i < op.length; i++) this.advance();
        return { kind: op, line, column };
      }
    }

    throw new AkiLexError(`invalid character '${ch}'`, line, column);
  }

  private readNumber(line: number, column: number): Token {
    let text = '';
    let isFloat = false;
    while (this.pos < this.input.length) {
      const ch = this.peek();
      if (isDigit(ch)) {
        text += this.advance();
      } else if (ch === '.' && !isFloat) {
        isFloat = true;
        text += this.advance();
      } else {
        break;
      }
    }

    if (isFloat) {
      return { kind: 'float', value: parseFloat(text), line, column };
    }
    const value = Number(text);
    if (value > I32_MAX) {
      throw new AkiLexError(`integer literal ${text} does not fit in i32`, line, column);
    }
    return { kind: 'integer', value, line, column };
  }

  private readIdentifier(line: number, column: number): Token {
    let text = '';
    while (this.pos < this.input.length && isIdentPart(this.peek())) {
      text += this.advance();
    }

    if (text === 'true' || text === 'false') {
      return { kind: 'bool', value: text === 'true', line, column };
    }
    const keyword = KEYWORDS.get(text);
    if (keyword !== undefined) {
      return { kind: keyword, line, column };
    }
    return { kind: 'identifier', value: text, line, column };
  }

  private readString(line: number, column: number): Token {
    this.advance(); // opening quote
    let value = '';
    while (this.pos < this.input.length) {
      const ch = this.advance();
      if (ch === '"') {
        return { kind: 'string', value, line, column };
      }
      if (ch === '\\') {
        if (this.pos >= this.input.length) break;
        const next = this.advance();
        value += ESCAPES[next] ?? next;
      } else {
        value += ch;
      }
    }
    throw new AkiLexError('unterminated string literal', line, column);
  }

  private readAttribute(line: number, column: number): Token {
    this.advance(); // '#'
    let name = '';
    while (this.pos < this.input.length && /[A-Za-z]/.test(this.peek())) {
      name += this.advance();
    }
    const kind = ATTRIBUTES.get(name);
    if (kind === undefined) {
      throw new AkiLexError(`unknown attribute '#${name}'`, line, column);
    }
    return { kind, line, column };
  }
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

/**
 * Convenience wrapper: scan `source` into tokens.
 */
export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
