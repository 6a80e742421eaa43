/**
 * Lint rule: agent-without-input-handler
 *
 * Warns on agent declarations that do not include an `on input` handler.
 * Such an agent registers fine but ignores everything sent to it.
 */

import type { LintRule, Diagnostic } from '../linter';
import { walk, statementsOfKind } from '../../../interpreter/src/ast';

export const agentWithoutInputHandlerRule: LintRule = {
  name: 'agent-without-input-handler',
  description: 'Warn on agents that declare no on input handler',
  severity: 'warning',

  run(parsed): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    walk(parsed.program, (stmt) => {
      if (stmt.kind !== 'agent') return;
      if (statementsOfKind(stmt.body, 'on_input').length > 0) return;

      diagnostics.push({
        rule: 'agent-without-input-handler',
        severity: 'warning',
        message: `Agent '${stmt.name}' does not define an on input handler`,
        line: stmt.line,
        column: 0,
      });
    });

    return diagnostics;
  },
};
