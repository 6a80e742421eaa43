/**
 * Token kinds and the keyword table for the Sentience language.
 */

export type KeywordKind =
  | 'agent'
  | 'mem'
  | 'on'
  | 'input'
  | 'goal'
  | 'reflect'
  | 'train'
  | 'evolve'
  | 'if'
  | 'enter'
  | 'embed'
  | 'link'
  | 'print';

export type SymbolKind =
  | 'assign'      // =
  | 'lparen'      // (
  | 'rparen'      // )
  | 'lbrace'      // {
  | 'rbrace'      // }
  | 'dot'         // .
  | 'colon'       // :
  | 'arrow'       // ->
  | 'link_arrow'  // <->
  | 'lbracket'    // [
  | 'rbracket';   // ]

export type TokenKind =
  | 'eof'
  | 'ident'
  | 'number'
  | 'string'
  | 'illegal'
  | KeywordKind
  | SymbolKind;

export interface Token {
  kind: TokenKind;
  literal: string;
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

export const KEYWORDS: ReadonlyMap<string, KeywordKind> = new Map<string, KeywordKind>([
  ['agent', 'agent'],
  ['mem', 'mem'],
  ['on', 'on'],
  ['input', 'input'],
  ['goal', 'goal'],
  ['reflect', 'reflect'],
  ['train', 'train'],
  ['evolve', 'evolve'],
  ['if', 'if'],
  ['enter', 'enter'],
  ['embed', 'embed'],
  ['link', 'link'],
  ['print', 'print'],
]);

export const SINGLE_CHAR_SYMBOLS: ReadonlyMap<string, SymbolKind> = new Map<string, SymbolKind>([
  ['=', 'assign'],
  ['(', 'lparen'],
  [')', 'rparen'],
  ['{', 'lbrace'],
  ['}', 'rbrace'],
  ['.', 'dot'],
  [':', 'colon'],
  ['[', 'lbracket'],
  [']', 'rbracket'],
]);

/**
 * Classify an identifier spelling. Keyword matching is exact and case-sensitive.
 */
export function lookupIdent(ident: string): TokenKind {
  return KEYWORDS.get(ident) ?? 'ident';
}

export function isKeyword(kind: TokenKind): kind is KeywordKind {
  return KEYWORDS.has(kind);
}
