#!/usr/bin/env node
/**
 * Sentience formatter CLI entry point.
 *
 * Usage:
 *   sentience-fmt <file.sen>              Format a file in-place
 *   sentience-fmt <file.sen> --check      Exit 1 if the file is not formatted
 *   sentience-fmt <file.sen> --stdout     Print formatted output to stdout
 *   sentience-fmt -                       Format standard input to stdout
 *   sentience-fmt --indent 4 <file.sen>   Use 4-space indentation
 */

import * as fs from 'fs';
import * as path from 'path';
import { format, isFormatted, FormatOptions } from './formatter';

type Mode = 'write' | 'check' | 'stdout';

interface CliArgs {
  mode: Mode;
  options: Partial<FormatOptions>;
  files: string[];
}

const STDIN = '-';

function main(): void {
  const argv = process.argv.slice(2);

  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const { mode, options, files } = parseArgs(argv);

  if (files.includes(STDIN)) {
    if (files.length > 1) fail('Error: standard input cannot be combined with files');
    const source = fs.readFileSync(0, 'utf-8');
    if (mode === 'check') {
      process.exit(isFormatted(source, options) ? 0 : 1);
    }
    process.stdout.write(format(source, options));
    return;
  }

  let unformatted = 0;
  for (const file of files) {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) fail(`Error: File not found: ${resolved}`);

    const source = fs.readFileSync(resolved, 'utf-8');
    const formatted = format(source, options);
    const changed = formatted !== source;

    switch (mode) {
      case 'check':
        console.log(`${changed ? 'Would reformat' : 'Already formatted'}: ${file}`);
        if (changed) unformatted++;
        break;
      case 'stdout':
        process.stdout.write(formatted);
        break;
      case 'write':
        if (changed) fs.writeFileSync(resolved, formatted, 'utf-8');
        console.log(`${changed ? 'Formatted' : 'Unchanged'}: ${file}`);
        break;
    }
  }

  if (unformatted > 0) process.exit(1);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { mode: 'write', options: {}, files: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--check':
        args.mode = 'check';
        break;
      case '--stdout':
        args.mode = 'stdout';
        break;
      case '--indent':
        args.options.indentSize = intOption(argv[++i], arg, 1, 8);
        break;
      case '--blank-lines':
        args.options.blankLinesBetweenDeclarations = intOption(argv[++i], arg, 0, 3);
        break;
      default:
        if (arg !== STDIN && arg.startsWith('-')) fail(`Unknown option: ${arg}`);
        args.files.push(arg);
        break;
    }
  }

  if (args.files.length === 0) fail('Error: no files specified');
  return args;
}

function intOption(raw: string | undefined, flag: string, min: number, max: number): number {
  const n = parseInt(raw ?? '', 10);
  if (isNaN(n) || n < min || n > max) {
    fail(`Error: ${flag} must be a number between ${min} and ${max}`);
  }
  return n;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function printUsage(): void {
  console.log('Sentience Formatter v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  sentience-fmt <file.sen> [options]');
  console.log('  sentience-fmt - [options]      Read from standard input');
  console.log('');
  console.log('Options:');
  console.log('  --check              Check if files are formatted (exit 1 if not)');
  console.log('  --stdout             Print formatted output to stdout');
  console.log('  --indent <n>         Indentation size (default: 2)');
  console.log('  --blank-lines <n>    Blank lines around top-level agents (default: 1)');
  console.log('  --help, -h           Show this help');
}

main();
