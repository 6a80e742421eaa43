/**
 * Sentience REPL: interactive read-eval-print loop.
 *
 * Usage: sentience repl
 *
 * Features:
 *   - One memory context for the whole session
 *   - Multi-line input (accumulates until braces balance)
 *   - Dot commands: .input, .train, .evolve, .save, .load, .similar, .mem, .help, .quit
 */

import * as readline from 'readline';
import { Session, BlockAccumulator } from './session';
import { MemoryContext } from './memory';
import { SentienceConfig } from './config';

export const VERSION = '0.1.0';

/**
 * Start the Sentience REPL.
 */
export function startRepl(config: SentienceConfig): void {
  const session = new Session({ config });
  const accumulator = new BlockAccumulator();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '>>> ',
    terminal: process.stdin.isTTY === true,
  });

  console.log(`Sentience v${VERSION}`);
  console.log('Type .help for commands, .quit to exit.\n');

  rl.prompt();

  rl.on('line', (raw: string) => {
    const line = raw.trim();
    if (line === '') {
      rl.prompt();
      return;
    }

    // Commands are only recognised between blocks
    if (!accumulator.pending && line.startsWith('.')) {
      handleCommand(line, session, rl);
      rl.prompt();
      return;
    }

    const chunk = accumulator.push(line);
    if (chunk === null) {
      rl.setPrompt('... ');
      rl.prompt();
      return;
    }

    session.submit(chunk);
    rl.setPrompt('>>> ');
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
  });
}

/**
 * Handle a REPL dot command.
 */
export function handleCommand(line: string, session: Session, rl?: readline.Interface): void {
  const space = line.indexOf(' ');
  const command = space === -1 ? line : line.slice(0, space);
  const rest = space === -1 ? '' : line.slice(space + 1).trim();

  switch (command) {
    case '.input':
      session.dispatchInput(rest);
      break;

    case '.train':
      session.dispatchTrain(rest);
      break;

    case '.evolve':
      session.dispatchEvolve(rest);
      break;

    case '.save':
      session.save(rest || undefined);
      break;

    case '.load':
      session.load(rest || undefined);
      break;

    case '.similar':
      session.similar(rest);
      break;

    case '.mem':
      printMemory(session.ctx);
      break;

    case '.help':
      console.log('');
      console.log('REPL Commands:');
      console.log('  .input <text>    Run the agent\'s on input handlers with <text>');
      console.log('  .train <text>    Run the agent\'s train blocks (binds msg)');
      console.log('  .evolve <text>   Run the agent\'s evolve blocks (binds msg)');
      console.log('  .save [path]     Save memory to a snapshot file');
      console.log('  .load [path]     Load memory from a snapshot file');
      console.log('  .similar <text>  List latent keys similar to <text>');
      console.log('  .mem             Show memory contents');
      console.log('  .quit            Exit the REPL');
      console.log('');
      break;

    case '.quit':
    case '.exit':
      rl?.close();
      break;

    default:
      console.log(`Unknown command: ${command}. Type .help for available commands.`);
      break;
  }
}

/**
 * Print every store of a memory context.
 */
function printMemory(ctx: MemoryContext): void {
  const agent = ctx.currentAgent ? ctx.currentAgent.name : '(none)';
  console.log(`  agent: ${agent}`);
  printStore('short', ctx.memShort);
  printStore('long', ctx.memLong);
  printStore('links', ctx.links);
  for (const [key, vec] of ctx.memLatent) {
    console.log(`  latent ${key} = [${vec.join(', ')}]`);
  }
}

function printStore(label: string, store: Map<string, string>): void {
  for (const [key, value] of store) {
    const truncated = value.length > 60 ? value.slice(0, 57) + '...' : value;
    console.log(`  ${label} ${key} = "${truncated}"`);
  }
}
