/**
 * Tree-walking interpreter for the Sentience language.
 *
 * Evaluation has exactly two effects: mutations of the MemoryContext passed
 * in, and narration lines written to the OutputSink. Nothing in here throws;
 * a node the dispatcher does not know produces a diagnostic line instead.
 */

import { Node, Program, Statement, AgentStatement, EmbedStatement, IfStatement } from './ast';
import { MemoryContext } from './memory';
import { OutputSink, ConsoleSink } from './output';
import { ConditionEvaluator, lossPlaceholderCondition } from './conditions';
import { parse } from './parser';

export interface InterpreterOptions {
  /** Where narration goes (default: standard output) */
  sink: OutputSink;
  /** Decides whether an `if` body runs */
  conditionEvaluator: ConditionEvaluator;
  /** Prefix repeated once per nesting level */
  indentUnit: string;
}

const DEFAULT_OPTIONS: InterpreterOptions = {
  sink: new ConsoleSink(),
  conditionEvaluator: lossPlaceholderCondition,
  indentUnit: '  ',
};

export class Interpreter {
  private readonly opts: InterpreterOptions;

  constructor(options?: Partial<InterpreterOptions>) {
    this.opts = { ...DEFAULT_OPTIONS, ...options };
  }

  get sink(): OutputSink {
    return this.opts.sink;
  }

  /**
   * Parse and evaluate source text at the top level.
   */
  run(source: string, ctx: MemoryContext): Program {
    const program = parse(source);
    this.eval(program, ctx);
    return program;
  }

  /**
   * Evaluate a node against the context, narrating at the given depth.
   */
  eval(node: Node, ctx: MemoryContext, level = 0): void {
    switch (node.kind) {
      case 'program':
        this.evalBody(node.statements, ctx, level);
        return;

      case 'agent':
        this.evalAgent(node, ctx, level);
        return;

      case 'mem':
        this.out(level, `Init mem: ${node.target}`);
        ctx.setMem(node.target, '__init__', '1');
        return;

      case 'on_input':
        this.out(level, `On Input: (${node.param})`);
        this.evalBody(node.body, ctx, level + 1);
        return;

      case 'reflect':
        this.out(level, 'Reflect block:');
        this.evalBody(node.body, ctx, level + 1);
        return;

      case 'train':
        this.out(level, 'Train block:');
        this.evalBody(node.body, ctx, level + 1);
        return;

      case 'evolve':
        this.out(level, 'Evolve block:');
        this.evalBody(node.body, ctx, level + 1);
        return;

      case 'goal':
        this.out(level, `Goal: "${node.value}"`);
        return;

      case 'embed':
        this.evalEmbed(node, ctx, level);
        return;

      case 'link':
        this.out(level, `Link: ${node.from} <-> ${node.to}`);
        ctx.link(node.from, node.to);
        return;

      case 'if':
        this.evalIf(node, ctx, level);
        return;

      case 'enter':
        this.out(level, `Enter: ${node.target}`);
        return;

      case 'reflect_access': {
        const value = ctx.getMem(node.memTarget, node.key);
        this.out(level, `mem.${node.memTarget}["${node.key}"] = "${value}"`);
        return;
      }

      case 'print':
        this.out(level, node.value);
        return;

      default: {
        const unknown: never = node;
        this.out(level, `Unknown node: ${describeUnknown(unknown)}`);
      }
    }
  }

  /**
   * Evaluate statements in order at one depth.
   */
  evalBody(body: Statement[], ctx: MemoryContext, level: number): void {
    for (const stmt of body) {
      this.eval(stmt, ctx, level);
    }
  }

  // ==================================================================
  // Statements with more than a line of work
  // ==================================================================

  /** The agent becomes current only after its body has run. */
  private evalAgent(node: AgentStatement, ctx: MemoryContext, level: number): void {
    this.out(level, `Agent: ${node.name}`);
    this.evalBody(node.body, ctx, level + 1);
    ctx.currentAgent = node;
    this.out(level, `Agent: ${node.name} [registered]`);
  }

  /**
   * Copy a bound short-term value into the target store under the same key,
   * and record its latent vector. `mem.long` selects long-term memory; any
   * other target falls back to short-term.
   */
  private evalEmbed(node: EmbedStatement, ctx: MemoryContext, level: number): void {
    this.out(level, `Embed: ${node.source} -> ${node.target}`);
    if (!ctx.hasMem('short', node.source)) return;

    const value = ctx.getMem('short', node.source);
    const target = node.target === 'mem.long' ? 'long' : 'short';
    ctx.setMem(target, node.source, value);
    ctx.embedLatent(node.source, value);
  }

  private evalIf(node: IfStatement, ctx: MemoryContext, level: number): void {
    this.out(level, `If: ${node.condition}`);
    const result = this.opts.conditionEvaluator(node.condition, ctx);
    if (!result.supported) {
      this.out(level, `Condition not supported: ${node.condition}`);
    } else if (!result.holds) {
      this.out(level, `Condition not met: ${node.condition}`);
    } else {
      this.evalBody(node.body, ctx, level + 1);
    }
  }

  private out(level: number, text: string): void {
    this.opts.sink.writeLine(this.opts.indentUnit.repeat(level) + text);
  }
}

function describeUnknown(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'kind' in node) {
    return String(node.kind);
  }
  return typeof node;
}
