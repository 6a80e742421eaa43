/**
 * Lint rule: unsupported-condition
 *
 * Flags `if` conditions the default evaluator cannot interpret; their
 * bodies are skipped at run time.
 */

import type { LintRule, Diagnostic } from '../linter';
import { walk } from '../../../interpreter/src/ast';
import { lossPlaceholderCondition } from '../../../interpreter/src/conditions';
import { MemoryContext } from '../../../interpreter/src/memory';

/** Shared empty context for checking whether a condition is supported */
const EMPTY_CONTEXT = new MemoryContext();

export const unsupportedConditionRule: LintRule = {
  name: 'unsupported-condition',
  description: 'Note if conditions whose body never runs under the default evaluator',
  severity: 'info',

  run(parsed): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    walk(parsed.program, (stmt) => {
      if (stmt.kind !== 'if') return;
      if (lossPlaceholderCondition(stmt.condition, EMPTY_CONTEXT).supported) return;

      diagnostics.push({
        rule: 'unsupported-condition',
        severity: 'info',
        message: `Condition '${stmt.condition}' is not supported; its body will be skipped`,
        line: stmt.line,
        column: 0,
      });
    });

    return diagnostics;
  },
};
