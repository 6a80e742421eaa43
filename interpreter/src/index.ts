#!/usr/bin/env node
/**
 * Sentience interpreter CLI entry point.
 *
 * Usage: sentience <file.sen>
 *        sentience run <file.sen> [--input <text>]
 *        sentience repl
 *        sentience --eval "<code>"
 */

import * as fs from 'fs';
import * as path from 'path';
import { Session } from './session';
import { loadConfig, SentienceConfig } from './config';
import { SentienceError } from './errors';
import { startRepl, VERSION } from './repl';

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    process.exit(0);
  }

  let config: SentienceConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof SentienceError) {
      console.error(e.message);
      process.exit(1);
    }
    throw e;
  }

  if (args[0] === 'repl') {
    startRepl(config);
    return; // REPL runs its own event loop
  }

  let source: string;
  let rest: string[];

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) {
      console.error('Error: --eval requires a code argument');
      process.exit(1);
    }
    source = args[1];
    rest = args.slice(2);
  } else if (args[0] === 'run') {
    if (args.length < 2) {
      console.error('Usage: sentience run <file> [--input <text>]');
      process.exit(1);
    }
    source = readFile(args[1]);
    rest = args.slice(2);
  } else {
    // `sentience <file>` (shorthand)
    source = readFile(args[0]);
    rest = args.slice(1);
  }

  let input: string | null = null;
  if (rest[0] === '--input') {
    if (rest.length < 2) {
      console.error('Usage: sentience run <file> --input <text>');
      process.exit(1);
    }
    input = rest[1];
  }

  const session = new Session({ config });
  session.submit(source);
  if (input !== null) {
    session.dispatchInput(input);
  }
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    process.exit(1);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log(`Sentience v${VERSION}`);
  console.log('');
  console.log('Usage:');
  console.log('  sentience <file.sen>                         Run a Sentience file');
  console.log('  sentience run <file.sen> [--input <text>]    Run a file, then feed <text> to its agent');
  console.log('  sentience repl                               Start interactive REPL');
  console.log('  sentience --eval "<code>"                    Evaluate inline code');
  console.log('  sentience --help                             Show this help');
  console.log('');
  console.log('Environment:');
  console.log('  SENTIENCE_SNAPSHOT_PATH, SENTIENCE_INDENT,');
  console.log('  SENTIENCE_SIMILARITY_THRESHOLD, SENTIENCE_CONDITIONS');
}

main();
