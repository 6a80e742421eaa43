/**
 * AST node model for the Sentience language.
 *
 * The statement set is closed: every node is a plain object tagged by
 * `kind`, and consumers switch over it exhaustively. Nodes own only their
 * child statement lists; there is no sharing between parents.
 */

// ---- Statements ----

export interface AgentStatement {
  kind: 'agent';
  name: string;
  body: Statement[];
  line: number;
}

export interface MemStatement {
  kind: 'mem';
  target: string;
  line: number;
}

export interface OnInputStatement {
  kind: 'on_input';
  param: string;
  body: Statement[];
  line: number;
}

export interface ReflectStatement {
  kind: 'reflect';
  body: Statement[];
  line: number;
}

export interface TrainStatement {
  kind: 'train';
  body: Statement[];
  line: number;
}

export interface EvolveStatement {
  kind: 'evolve';
  body: Statement[];
  line: number;
}

export interface GoalStatement {
  kind: 'goal';
  value: string;
  line: number;
}

export interface EmbedStatement {
  kind: 'embed';
  source: string;
  target: string;
  line: number;
}

export interface LinkStatement {
  kind: 'link';
  from: string;
  to: string;
  line: number;
}

/**
 * `condition` is the reassembled token text, not an expression tree.
 */
export interface IfStatement {
  kind: 'if';
  condition: string;
  body: Statement[];
  line: number;
}

export interface EnterStatement {
  kind: 'enter';
  target: string;
  line: number;
}

export interface ReflectAccessStatement {
  kind: 'reflect_access';
  memTarget: string;
  key: string;
  line: number;
}

export interface PrintStatement {
  kind: 'print';
  value: string;
  line: number;
}

export type Statement =
  | AgentStatement
  | MemStatement
  | OnInputStatement
  | ReflectStatement
  | TrainStatement
  | EvolveStatement
  | GoalStatement
  | EmbedStatement
  | LinkStatement
  | IfStatement
  | EnterStatement
  | ReflectAccessStatement
  | PrintStatement;

export type StatementKind = Statement['kind'];

export interface Program {
  kind: 'program';
  statements: Statement[];
}

export type Node = Program | Statement;

/** Statements that carry a nested body. */
export type BlockStatement =
  | AgentStatement
  | OnInputStatement
  | ReflectStatement
  | TrainStatement
  | EvolveStatement
  | IfStatement;

// ---- Helpers ----

export function isBlockStatement(stmt: Statement): stmt is BlockStatement {
  switch (stmt.kind) {
    case 'agent':
    case 'on_input':
    case 'reflect':
    case 'train':
    case 'evolve':
    case 'if':
      return true;
    default:
      return false;
  }
}

/**
 * Get the statements of a given kind directly inside a body.
 */
export function statementsOfKind<K extends StatementKind>(
  body: Statement[],
  kind: K,
): Extract<Statement, { kind: K }>[] {
  return body.filter((s): s is Extract<Statement, { kind: K }> => s.kind === kind);
}

/**
 * Visit a node and every statement nested beneath it, parents first.
 */
export function walk(node: Node, visitor: (stmt: Statement, depth: number) => void, depth = 0): void {
  if (node.kind === 'program') {
    for (const stmt of node.statements) walk(stmt, visitor, depth);
    return;
  }
  visitor(node, depth);
  if (isBlockStatement(node)) {
    for (const child of node.body) walk(child, visitor, depth + 1);
  }
}

/**
 * The canonical keyword tag of a node.
 */
export function keywordOf(node: Node): string {
  switch (node.kind) {
    case 'program': return 'program';
    case 'on_input': return 'on';
    case 'reflect_access': return 'reflect-access';
    default: return node.kind;
  }
}

/**
 * Human-readable one-line rendering, for diagnostics only.
 */
export function renderNode(node: Node): string {
  switch (node.kind) {
    case 'program': return '[program]';
    case 'agent': return `agent ${node.name}`;
    case 'mem': return `mem ${node.target}`;
    case 'on_input': return `on input(${node.param})`;
    case 'reflect': return 'reflect { ... }';
    case 'train': return 'train { ... }';
    case 'evolve': return 'evolve { ... }';
    case 'goal': return `goal: ${node.value}`;
    case 'embed': return `embed ${node.source} -> ${node.target}`;
    case 'link': return `link ${node.from} <-> ${node.to}`;
    case 'if': return node.condition === '' ? 'if { ... }' : `if ${node.condition} { ... }`;
    case 'enter': return `enter ${node.target}`;
    case 'reflect_access': return `mem.${node.memTarget}["${node.key}"]`;
    case 'print': return `print "${node.value}"`;
  }
}
