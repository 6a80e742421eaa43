/**
 * A Sentience session: one interpreter and one memory context kept alive
 * across inputs, plus the handler dispatch the REPL and CLI build on.
 *
 * Dispatching binds the supplied text into short-term memory and replays
 * the matching blocks of the current agent at depth 1.
 */

import type { Program, Statement } from './ast';
import { statementsOfKind } from './ast';
import { Interpreter } from './interpreter';
import { MemoryContext } from './memory';
import { OutputSink, ConsoleSink } from './output';
import { conditionEvaluatorFor } from './conditions';
import { SentienceConfig, DEFAULT_CONFIG } from './config';
import { errorMessage } from './errors';

/** Short-term key that train/evolve dispatch binds the text to. */
export const TRAINING_INPUT_KEY = 'msg';

export interface SessionOptions {
  config?: SentienceConfig;
  sink?: OutputSink;
}

export class Session {
  readonly interpreter: Interpreter;
  readonly ctx: MemoryContext;
  readonly config: SentienceConfig;
  private readonly sink: OutputSink;

  constructor(options?: SessionOptions) {
    this.config = options?.config ?? DEFAULT_CONFIG;
    this.sink = options?.sink ?? new ConsoleSink();
    this.ctx = new MemoryContext({ similarityThreshold: this.config.similarityThreshold });
    this.interpreter = new Interpreter({
      sink: this.sink,
      conditionEvaluator: conditionEvaluatorFor(this.config.conditions),
      indentUnit: this.config.indentUnit,
    });
  }

  /**
   * Parse and evaluate one chunk of source at the top level.
   */
  submit(source: string): Program {
    return this.interpreter.run(source, this.ctx);
  }

  /**
   * Run every `on input(param)` handler of the current agent with `param`
   * bound to `text`.
   */
  dispatchInput(text: string): boolean {
    const agent = this.ctx.currentAgent;
    if (!agent) {
      this.sink.writeLine('No agent registered.');
      return false;
    }
    const handlers = statementsOfKind(agent.body, 'on_input');
    if (handlers.length === 0) {
      this.sink.writeLine('Agent has no on input handler.');
      return false;
    }
    for (const handler of handlers) {
      this.ctx.setMem('short', handler.param, text);
      this.replay(handler.body);
    }
    return true;
  }

  dispatchTrain(text: string): boolean {
    return this.dispatchBlocks('train', text);
  }

  dispatchEvolve(text: string): boolean {
    return this.dispatchBlocks('evolve', text);
  }

  save(path: string = this.config.snapshotPath): boolean {
    try {
      this.ctx.save(path);
      this.sink.writeLine(`Saved to ${path}`);
      return true;
    } catch (e) {
      this.sink.writeLine(`Error saving: ${errorMessage(e)}`);
      return false;
    }
  }

  load(path: string = this.config.snapshotPath): boolean {
    try {
      this.ctx.load(path);
      this.sink.writeLine(`Loaded from ${path}`);
      return true;
    } catch (e) {
      this.sink.writeLine(`Error loading: ${errorMessage(e)}`);
      return false;
    }
  }

  similar(query: string): string[] {
    const keys = this.ctx.similarTo(query);
    this.sink.writeLine(`Similar: ${keys.length > 0 ? keys.join(', ') : '(none)'}`);
    return keys;
  }

  private dispatchBlocks(kind: 'train' | 'evolve', text: string): boolean {
    const agent = this.ctx.currentAgent;
    if (!agent) {
      this.sink.writeLine('No agent registered.');
      return false;
    }
    const blocks = statementsOfKind(agent.body, kind);
    if (blocks.length === 0) {
      this.sink.writeLine(`Agent has no ${kind} block.`);
      return false;
    }
    for (const block of blocks) {
      this.ctx.setMem('short', TRAINING_INPUT_KEY, text);
      this.replay(block.body);
    }
    return true;
  }

  private replay(body: Statement[]): void {
    this.interpreter.evalBody(body, this.ctx, 1);
  }
}

/**
 * Collects REPL lines until the braces outside string literals balance.
 */
export class BlockAccumulator {
  private lines: string[] = [];
  private depth = 0;

  /** True while a block is open. */
  get pending(): boolean {
    return this.lines.length > 0;
  }

  /**
   * Add a line. Returns the complete chunk (lines joined by a space) once
   * the braces balance, otherwise null.
   */
  push(line: string): string | null {
    this.lines.push(line);
    this.depth += braceDelta(line);
    if (this.depth > 0) return null;
    const chunk = this.lines.join(' ');
    this.reset();
    return chunk;
  }

  reset(): void {
    this.lines = [];
    this.depth = 0;
  }
}

/**
 * Net `{` minus `}` on a line, ignoring braces inside string literals.
 * A string left open at end of line is treated as closed there.
 */
export function braceDelta(line: string): number {
  let delta = 0;
  let inString = false;
  for (const ch of line) {
    if (ch === '"') {
      inString = !inString;
    } else if (!inString) {
      if (ch === '{') delta++;
      else if (ch === '}') delta--;
    }
  }
  return delta;
}
