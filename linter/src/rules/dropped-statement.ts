/**
 * Lint rule: dropped-statement
 *
 * The parser silently drops tokens that start no statement and statements
 * that do not match their grammar. This rule surfaces each drop.
 */

import type { LintRule, Diagnostic } from '../linter';

export const droppedStatementRule: LintRule = {
  name: 'dropped-statement',
  description: 'Report input the parser skipped',
  severity: 'warning',

  run(parsed): Diagnostic[] {
    return parsed.issues.map((issue): Diagnostic => ({
      rule: 'dropped-statement',
      severity: 'warning',
      message: issue.message,
      line: issue.line,
      column: issue.column,
    }));
  },
};
