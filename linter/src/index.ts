#!/usr/bin/env node
/**
 * Sentience linter CLI entry point.
 *
 * Usage:
 *   sentience-lint <file.sen> [...]
 *   sentience-lint --rule dropped-statement <file.sen>
 *   sentience-lint --disable unsupported-condition <file.sen>
 *   sentience-lint --severity unsupported-condition=warning <file.sen>
 *   sentience-lint --json <file.sen>
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  createDefaultLinter,
  formatDiagnostic,
  isSeverity,
  summarize,
  Diagnostic,
  LintOptions,
  Severity,
} from './linter';

interface CliArgs {
  files: string[];
  options: LintOptions;
  json: boolean;
  maxWarnings: number | null;
}

function main(): void {
  const argv = process.argv.slice(2);

  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  if (argv.includes('--list-rules')) {
    listRules();
    process.exit(0);
  }

  const args = parseArgs(argv);
  const linter = createDefaultLinter();
  const results: Array<{ file: string; diagnostics: Diagnostic[] }> = [];

  for (const file of args.files) {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) {
      fail(`Error: File not found: ${resolved}`);
    }
    const source = fs.readFileSync(resolved, 'utf-8');
    results.push({ file, diagnostics: linter.lint(source, args.options) });
  }

  const all = results.flatMap(r => r.diagnostics);
  const summary = summarize(all);

  if (args.json) {
    console.log(JSON.stringify(results, null, 2));
  } else {
    for (const { file, diagnostics } of results) {
      if (diagnostics.length === 0) continue;
      console.log(`${file}:`);
      for (const d of diagnostics) console.log(formatDiagnostic(d, file));
      console.log('');
    }
    const checked = plural(args.files.length, 'file');
    if (all.length === 0) {
      console.log(`All clean! ${checked} checked.`);
    } else {
      const parts = [
        summary.errors > 0 ? plural(summary.errors, 'error') : '',
        summary.warnings > 0 ? plural(summary.warnings, 'warning') : '',
        summary.infos > 0 ? plural(summary.infos, 'note') : '',
      ].filter(p => p !== '');
      console.log(`Found ${parts.join(', ')} in ${checked}.`);
    }
  }

  const tooManyWarnings = args.maxWarnings !== null && summary.warnings > args.maxWarnings;
  process.exit(summary.errors > 0 || tooManyWarnings ? 1 : 0);
}

function parseArgs(argv: string[]): CliArgs {
  const enabled: string[] = [];
  const disabled: string[] = [];
  const overrides: Record<string, Severity> = {};
  const args: CliArgs = { files: [], options: {}, json: false, maxWarnings: null };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--rule':
        enabled.push(requireValue(argv, ++i, arg));
        break;
      case '--disable':
        disabled.push(requireValue(argv, ++i, arg));
        break;
      case '--severity': {
        const [rule, severity] = requireValue(argv, ++i, arg).split('=');
        if (!rule || severity === undefined || !isSeverity(severity)) {
          fail('Error: --severity expects <rule>=<error|warning|info>');
        }
        overrides[rule] = severity;
        break;
      }
      case '--max-warnings': {
        const n = parseInt(requireValue(argv, ++i, arg), 10);
        if (isNaN(n) || n < 0) fail('Error: --max-warnings must be a non-negative number');
        args.maxWarnings = n;
        break;
      }
      case '--json':
        args.json = true;
        break;
      default:
        if (arg.startsWith('-')) fail(`Unknown option: ${arg}`);
        args.files.push(arg);
        break;
    }
  }

  if (args.files.length === 0) fail('Error: no files specified');
  if (enabled.length > 0) args.options.enabledRules = enabled;
  if (disabled.length > 0) args.options.disabledRules = disabled;
  if (Object.keys(overrides).length > 0) args.options.severityOverrides = overrides;
  return args;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined) fail(`Error: ${flag} requires a value`);
  return value;
}

function listRules(): void {
  console.log('Available rules:');
  for (const rule of createDefaultLinter().getRules()) {
    console.log(`  ${rule.name.padEnd(28)}${rule.severity.padEnd(9)}${rule.description}`);
  }
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function printUsage(): void {
  console.log('Sentience Linter v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  sentience-lint <file.sen> [...]               Lint files');
  console.log('  sentience-lint --rule <name> <file.sen>        Run only specific rule(s)');
  console.log('  sentience-lint --disable <name> <file.sen>     Disable specific rule(s)');
  console.log('  sentience-lint --severity <name>=<level> ...   Override a rule\'s severity');
  console.log('  sentience-lint --max-warnings <n> ...          Fail when warnings exceed <n>');
  console.log('  sentience-lint --json <file.sen>               Print diagnostics as JSON');
  console.log('  sentience-lint --list-rules                    List available rules');
}

main();
