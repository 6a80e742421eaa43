/**
 * Sentience linter engine.
 *
 * Parses source once with diagnostics, hands the result to every selected
 * rule and collects what they report. Parse problems are not thrown; they
 * reach the rules as `ParseResult.issues`.
 */

import { parseWithDiagnostics, ParseResult } from '../../interpreter/src/parser';
import { errorMessage } from '../../interpreter/src/errors';
import { droppedStatementRule } from './rules/dropped-statement';
import { agentWithoutInputHandlerRule } from './rules/agent-without-input-handler';
import { unsupportedConditionRule } from './rules/unsupported-condition';
import { unknownMemoryTargetRule } from './rules/unknown-memory-target';

export type Severity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  /** 1-based; 0 when the diagnostic has no source position */
  line: number;
  column: number;
}

/**
 * A lint rule inspects one parse result. Rules report at their default
 * severity; the linter applies any override afterwards.
 */
export interface LintRule {
  /** Unique rule identifier (e.g., "dropped-statement") */
  name: string;
  description: string;
  severity: Severity;
  run(parsed: ParseResult, source: string): Diagnostic[];
}

export interface LintOptions {
  /** Rules to run (by name). Unset means all registered rules. */
  enabledRules?: string[];
  /** Rules to skip (by name). Wins over enabledRules. */
  disabledRules?: string[];
  /** Per-rule severity replacing whatever the rule reported. */
  severityOverrides?: Record<string, Severity>;
}

export interface LintSummary {
  errors: number;
  warnings: number;
  infos: number;
}

export class Linter {
  private readonly rules: LintRule[] = [];

  addRule(rule: LintRule): void {
    if (this.rules.some(r => r.name === rule.name)) {
      throw new Error(`Lint rule '${rule.name}' is already registered`);
    }
    this.rules.push(rule);
  }

  /**
   * Lint Sentience source. Diagnostics come back ordered by line, then column.
   */
  lint(source: string, options: LintOptions = {}): Diagnostic[] {
    const parsed = parseWithDiagnostics(source);
    const overrides = options.severityOverrides ?? {};
    const diagnostics: Diagnostic[] = [];

    for (const rule of this.selectRules(options)) {
      for (const d of this.runRule(rule, parsed, source)) {
        const severity = overrides[rule.name];
        diagnostics.push(severity === undefined ? d : { ...d, severity });
      }
    }

    return diagnostics.sort((a, b) => a.line - b.line || a.column - b.column);
  }

  getRuleNames(): string[] {
    return this.rules.map(r => r.name);
  }

  getRules(): readonly LintRule[] {
    return this.rules;
  }

  private selectRules(options: LintOptions): LintRule[] {
    const enabled = options.enabledRules;
    const disabled = new Set(options.disabledRules ?? []);
    return this.rules.filter(rule =>
      !disabled.has(rule.name) && (enabled === undefined || enabled.includes(rule.name)),
    );
  }

  /** A rule that throws is reported against itself instead of aborting the run. */
  private runRule(rule: LintRule, parsed: ParseResult, source: string): Diagnostic[] {
    try {
      return rule.run(parsed, source);
    } catch (e) {
      return [{
        rule: rule.name,
        severity: 'error',
        message: `Rule failed internally: ${errorMessage(e)}`,
        line: 0,
        column: 0,
      }];
    }
  }
}

const SEVERITY_TAGS: Record<Severity, string> = {
  error: 'error',
  warning: 'warn',
  info: 'info',
};

/**
 * Format a diagnostic for terminal output.
 */
export function formatDiagnostic(d: Diagnostic, filename?: string): string {
  const loc = filename ? `${filename}:${d.line}:${d.column}` : `${d.line}:${d.column}`;
  return `  ${loc}  ${SEVERITY_TAGS[d.severity]}  ${d.message}  (${d.rule})`;
}

export function summarize(diagnostics: Diagnostic[]): LintSummary {
  const summary: LintSummary = { errors: 0, warnings: 0, infos: 0 };
  for (const d of diagnostics) {
    if (d.severity === 'error') summary.errors++;
    else if (d.severity === 'warning') summary.warnings++;
    else summary.infos++;
  }
  return summary;
}

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_TAGS, value);
}

/**
 * Create a linter with all built-in rules registered.
 */
export function createDefaultLinter(): Linter {
  const linter = new Linter();
  linter.addRule(droppedStatementRule);
  linter.addRule(agentWithoutInputHandlerRule);
  linter.addRule(unsupportedConditionRule);
  linter.addRule(unknownMemoryTargetRule);
  return linter;
}
