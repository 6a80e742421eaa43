/**
 * Recursive-descent parser for the Sentience language.
 *
 * Parsing never throws. A statement that does not match its grammar is
 * dropped and parsing resumes at the next token; every drop is recorded as
 * a ParseIssue for tooling (the linter reports them), while `parse()` itself
 * just returns the program.
 */

import { Lexer } from './lexer';
import { Token, TokenKind } from './token';
import {
  Program,
  Statement,
  AgentStatement,
  MemStatement,
  OnInputStatement,
  ReflectAccessStatement,
  GoalStatement,
  EmbedStatement,
  LinkStatement,
  IfStatement,
  EnterStatement,
  PrintStatement,
} from './ast';

export interface ParseIssue {
  message: string;
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

export interface ParseResult {
  program: Program;
  issues: ParseIssue[];
}

/**
 * Deepest block nesting the parser builds; a deeper block is skipped whole.
 */
export const MAX_BLOCK_DEPTH = 1000;

export class Parser {
  private readonly lexer: Lexer;
  private cur: Token;
  private peek: Token;
  private readonly issues: ParseIssue[] = [];
  /** Number of blocks currently open */
  private depth = 0;

  constructor(lexer: Lexer) {
    this.lexer = lexer;
    this.cur = lexer.nextToken();
    this.peek = lexer.nextToken();
  }

  parseProgram(): Program {
    const statements: Statement[] = [];
    while (this.cur.kind !== 'eof') {
      const stmt = this.parseStatementOrSkip();
      if (stmt) statements.push(stmt);
      this.nextToken();
    }
    return { kind: 'program', statements };
  }

  getIssues(): ParseIssue[] {
    return [...this.issues];
  }

  // ==================================================================
  // Token cursor
  // ==================================================================

  private nextToken(): void {
    this.cur = this.peek;
    this.peek = this.lexer.nextToken();
  }

  /**
   * Advance only when the next token has the expected kind.
   */
  private expectPeek(kind: TokenKind): boolean {
    if (this.peek.kind !== kind) return false;
    this.nextToken();
    return true;
  }

  private issue(message: string, tok: Token): void {
    this.issues.push({ message, line: tok.line, column: tok.column });
  }

  // ==================================================================
  // Statements
  // ==================================================================

  private parseStatementOrSkip(): Statement | null {
    const start = this.cur;
    const stmt = this.parseStatement();
    if (stmt) return stmt;
    if (isStatementKeyword(start.kind)) {
      this.issue(`Dropped malformed '${start.literal}' statement`, start);
    } else {
      this.issue(`Skipped unexpected token '${start.literal}'`, start);
    }
    return null;
  }

  private parseStatement(): Statement | null {
    switch (this.cur.kind) {
      case 'agent':
        return this.parseAgent();
      case 'mem':
        return this.peek.kind === 'dot' ? this.parseReflectAccess() : this.parseMem();
      case 'on':
        return this.parseOnInput();
      case 'reflect':
        return this.parseSimpleBlock('reflect');
      case 'train':
        return this.parseSimpleBlock('train');
      case 'evolve':
        return this.parseSimpleBlock('evolve');
      case 'goal':
        return this.parseGoal();
      case 'embed':
        return this.parseEmbed();
      case 'link':
        return this.parseLink();
      case 'if':
        return this.parseIf();
      case 'enter':
        return this.parseEnter();
      case 'print':
        return this.parsePrint();
      default:
        return null;
    }
  }

  /**
   * Parse `{ stmt* }` starting with the current token on `{`. Stops on the
   * closing brace, or at end of input for an unterminated block.
   */
  private parseBlockBody(): Statement[] {
    if (this.depth >= MAX_BLOCK_DEPTH) {
      this.issue('Block nested too deeply', this.cur);
      this.skipBlock();
      return [];
    }

    const body: Statement[] = [];
    this.depth++;
    this.nextToken();
    while (this.cur.kind !== 'rbrace' && this.cur.kind !== 'eof') {
      const stmt = this.parseStatementOrSkip();
      if (stmt) body.push(stmt);
      this.nextToken();
    }
    this.depth--;
    return body;
  }

  /**
   * Skip from the current `{` to its matching `}` (or end of input) without
   * building statements.
   */
  private skipBlock(): void {
    let open = 1;
    while (open > 0) {
      this.nextToken();
      if (this.cur.kind === 'eof') return;
      if (this.cur.kind === 'lbrace') open++;
      else if (this.cur.kind === 'rbrace') open--;
    }
  }

  // agent <ident> { ... }
  private parseAgent(): AgentStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('ident')) return null;
    const name = this.cur.literal;
    if (!this.expectPeek('lbrace')) return null;
    return { kind: 'agent', name, body: this.parseBlockBody(), line };
  }

  // mem <ident>
  private parseMem(): MemStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('ident')) return null;
    return { kind: 'mem', target: this.cur.literal, line };
  }

  // on input(<ident>) { ... }
  private parseOnInput(): OnInputStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('input')) return null;
    if (!this.expectPeek('lparen')) return null;
    if (!this.expectPeek('ident')) return null;
    const param = this.cur.literal;
    if (!this.expectPeek('rparen')) return null;
    if (!this.expectPeek('lbrace')) return null;
    return { kind: 'on_input', param, body: this.parseBlockBody(), line };
  }

  // reflect { ... } | train { ... } | evolve { ... }
  private parseSimpleBlock(kind: 'reflect' | 'train' | 'evolve'): Statement | null {
    const line = this.cur.line;
    if (!this.expectPeek('lbrace')) return null;
    return { kind, body: this.parseBlockBody(), line };
  }

  // mem.<ident>["<key>"]
  private parseReflectAccess(): ReflectAccessStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('dot')) return null;
    if (!this.expectPeek('ident')) return null;
    const memTarget = this.cur.literal;
    if (!this.expectPeek('lbracket')) return null;
    if (!this.expectPeek('string')) return null;
    const key = this.cur.literal;
    if (!this.expectPeek('rbracket')) return null;
    return { kind: 'reflect_access', memTarget, key, line };
  }

  // goal: "<text>"
  private parseGoal(): GoalStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('colon')) return null;
    if (!this.expectPeek('string')) return null;
    return { kind: 'goal', value: this.cur.literal, line };
  }

  /**
   * embed <ident> -> <target>
   *
   * The target is rebuilt from an optional `mem`, an optional `.` and an
   * optional identifier, so `mem.short` becomes "mem.short". Anything else is
   * accepted as whatever those parts concatenate to.
   */
  private parseEmbed(): EmbedStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('ident')) return null;
    const source = this.cur.literal;
    if (!this.expectPeek('arrow')) return null;

    const parts: string[] = [];
    if (this.expectPeek('mem')) {
      parts.push(this.cur.literal);
      if (this.expectPeek('dot')) parts.push('.');
    }
    if (this.expectPeek('ident')) parts.push(this.cur.literal);

    return { kind: 'embed', source, target: parts.join(''), line };
  }

  // link <ident> <-> <ident>
  private parseLink(): LinkStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('ident')) return null;
    const from = this.cur.literal;
    if (!this.expectPeek('link_arrow')) return null;
    if (!this.expectPeek('ident')) return null;
    return { kind: 'link', from, to: this.cur.literal, line };
  }

  /**
   * if <condition tokens...> { ... }
   *
   * The condition is kept as text: tokens up to `{` are rejoined, string
   * literals re-quoted.
   */
  private parseIf(): IfStatement | null {
    const line = this.cur.line;
    const parts: string[] = [];
    this.nextToken();
    while (this.cur.kind !== 'lbrace' && this.cur.kind !== 'eof') {
      parts.push(this.cur.kind === 'string' ? `"${this.cur.literal}"` : this.cur.literal);
      this.nextToken();
    }
    if (this.cur.kind !== 'lbrace') return null;
    const condition = joinConditionParts(parts);
    return { kind: 'if', condition, body: this.parseBlockBody(), line };
  }

  // enter <ident>
  private parseEnter(): EnterStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('ident')) return null;
    return { kind: 'enter', target: this.cur.literal, line };
  }

  // print "<text>"
  private parsePrint(): PrintStatement | null {
    const line = this.cur.line;
    if (!this.expectPeek('string')) return null;
    return { kind: 'print', value: this.cur.literal, line };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const STATEMENT_KEYWORDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'agent', 'mem', 'on', 'reflect', 'train', 'evolve', 'goal',
  'embed', 'link', 'if', 'enter', 'print',
]);

function isStatementKeyword(kind: TokenKind): boolean {
  return STATEMENT_KEYWORDS.has(kind);
}

/**
 * Join condition tokens, inserting a single space only between two parts
 * that both contain a letter or digit. `loss`,`>`,`0`,`.`,`1` rejoins as
 * `loss>0.1`; `context`,`includes`,`"joy"` as `context includes "joy"`.
 */
export function joinConditionParts(parts: string[]): string {
  let out = '';
  parts.forEach((part, i) => {
    if (i > 0 && hasAlphaNum(parts[i - 1]) && hasAlphaNum(part)) {
      out += ' ';
    }
    out += part;
  });
  return out;
}

function hasAlphaNum(s: string): boolean {
  return /[A-Za-z0-9]/.test(s);
}

/**
 * Parse Sentience source, also returning the statements and tokens that
 * were dropped along the way.
 */
export function parseWithDiagnostics(source: string): ParseResult {
  const parser = new Parser(new Lexer(source));
  const program = parser.parseProgram();
  return { program, issues: parser.getIssues() };
}

/**
 * Parse Sentience source into a program. Never throws.
 */
export function parse(source: string): Program {
  return parseWithDiagnostics(source).program;
}
