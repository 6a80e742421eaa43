/**
 * Lexer for the Sentience language.
 *
 * Produces one token per `nextToken()` call until `eof`. The lexer never
 * fails: anything it does not recognise becomes an `illegal` token carrying
 * the raw character, and the parser skips it.
 */

import { Token, TokenKind, lookupIdent, SINGLE_CHAR_SYMBOLS } from './token';

export class Lexer {
  private readonly input: string;
  private pos = 0;
  private line = 1;
  private lineStart = 0;

  constructor(input: string) {
    this.input = input;
  }

  nextToken(): Token {
    this.skipWhitespace();

    const line = this.line;
    const column = this.pos - this.lineStart;
    const make = (kind: TokenKind, literal: string): Token => ({ kind, literal, line, column });

    if (this.pos >= this.input.length) {
      return make('eof', '');
    }

    const ch = this.input[this.pos];

    const symbol = SINGLE_CHAR_SYMBOLS.get(ch);
    if (symbol !== undefined) {
      this.pos++;
      return make(symbol, ch);
    }

    if (ch === '-') {
      if (this.peekChar(1) === '>') {
        this.pos += 2;
        return make('arrow', '->');
      }
      this.pos++;
      return make('illegal', ch);
    }

    if (ch === '<') {
      // Both the '-' and the '>' must be present before anything is consumed.
      if (this.peekChar(1) === '-' && this.peekChar(2) === '>') {
        this.pos += 3;
        return make('link_arrow', '<->');
      }
      this.pos++;
      return make('illegal', ch);
    }

    if (ch === '"') {
      return make('string', this.readString());
    }

    if (isLetter(ch)) {
      const ident = this.readIdentifier();
      return make(lookupIdent(ident), ident);
    }

    if (isDigit(ch)) {
      return make('number', this.readNumber());
    }

    this.pos++;
    return make('illegal', ch);
  }

  private peekChar(offset: number): string {
    return this.input[this.pos + offset] ?? '';
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (ch === '\n') {
        this.pos++;
        this.line++;
        this.lineStart = this.pos;
      } else if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.pos++;
      } else {
        break;
      }
    }
  }

  private readIdentifier(): string {
    const start = this.pos;
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (!isLetter(ch) && !isDigit(ch) && ch !== '_') break;
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  private readNumber(): string {
    const start = this.pos;
    while (this.pos < this.input.length && isDigit(this.input[this.pos])) {
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  /**
   * Read a double-quoted string. No escapes; an unterminated string runs to
   * the end of input. Newlines inside the literal still advance the line count.
   */
  private readString(): string {
    const start = this.pos + 1;
    let end = start;
    while (end < this.input.length && this.input[end] !== '"') {
      if (this.input[end] === '\n') {
        this.line++;
        this.lineStart = end + 1;
      }
      end++;
    }
    this.pos = Math.min(end + 1, this.input.length);
    return this.input.slice(start, end);
  }
}

/**
 * Lex the whole input. The returned array always ends with the `eof` token.
 */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  const tokens: Token[] = [];
  for (;;) {
    const tok = lexer.nextToken();
    tokens.push(tok);
    if (tok.kind === 'eof') return tokens;
  }
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}
