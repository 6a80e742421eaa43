/**
 * Sentience code formatter.
 *
 * Parses source and prints the program back in canonical layout: one
 * statement per line, blocks indented one level. The language has no
 * comments, and tokens the parser drops do not survive formatting.
 */

import { parse } from '../../interpreter/src/parser';
import type { Program, Statement } from '../../interpreter/src/ast';

export interface FormatOptions {
  /** Number of spaces per indentation level (default: 2) */
  indentSize: number;
  /** Blank lines between top-level agent declarations */
  blankLinesBetweenDeclarations: number;
}

const DEFAULT_OPTIONS: FormatOptions = {
  indentSize: 2,
  blankLinesBetweenDeclarations: 1,
};

/**
 * Format Sentience source code.
 */
export function format(source: string, options?: Partial<FormatOptions>): string {
  const opts: FormatOptions = { ...DEFAULT_OPTIONS, ...options };
  const text = new SentienceFormatter(opts).formatProgram(parse(source));
  return text === '' ? '' : text + '\n';
}

/**
 * True when formatting would leave the source unchanged.
 */
export function isFormatted(source: string, options?: Partial<FormatOptions>): boolean {
  return format(source, options) === source;
}

class SentienceFormatter {
  private readonly opts: FormatOptions;

  constructor(opts: FormatOptions) {
    this.opts = opts;
  }

  formatProgram(program: Program): string {
    const parts: string[] = [];
    let prev: Statement | null = null;

    for (const stmt of program.statements) {
      // Agents are set apart from their neighbours
      if (prev !== null && (stmt.kind === 'agent' || prev.kind === 'agent')) {
        for (let i = 0; i < this.opts.blankLinesBetweenDeclarations; i++) {
          parts.push('');
        }
      }
      parts.push(this.formatStatement(stmt, 0));
      prev = stmt;
    }

    return parts.join('\n');
  }

  /**
   * Format a statement (and any body) at the given indentation level.
   */
  formatStatement(stmt: Statement, indent: number): string {
    const pad = this.indent(indent);

    switch (stmt.kind) {
      case 'agent':
        return this.formatBlock(`agent ${stmt.name}`, stmt.body, indent);
      case 'on_input':
        return this.formatBlock(`on input(${stmt.param})`, stmt.body, indent);
      case 'reflect':
      case 'train':
      case 'evolve':
        return this.formatBlock(stmt.kind, stmt.body, indent);
      case 'if':
        return this.formatBlock(stmt.condition === '' ? 'if' : `if ${stmt.condition}`, stmt.body, indent);
      case 'mem':
        return `${pad}mem ${stmt.target}`;
      case 'goal':
        return `${pad}goal: "${stmt.value}"`;
      case 'embed':
        return `${pad}embed ${stmt.source} -> ${stmt.target}`;
      case 'link':
        return `${pad}link ${stmt.from} <-> ${stmt.to}`;
      case 'enter':
        return `${pad}enter ${stmt.target}`;
      case 'reflect_access':
        return `${pad}mem.${stmt.memTarget}["${stmt.key}"]`;
      case 'print':
        return `${pad}print "${stmt.value}"`;
    }
  }

  private formatBlock(head: string, body: Statement[], indent: number): string {
    const pad = this.indent(indent);
    if (body.length === 0) {
      return `${pad}${head} {}`;
    }
    const lines = [`${pad}${head} {`];
    for (const stmt of body) {
      lines.push(this.formatStatement(stmt, indent + 1));
    }
    lines.push(`${pad}}`);
    return lines.join('\n');
  }

  private indent(level: number): string {
    return ' '.repeat(level * this.opts.indentSize);
  }
}
