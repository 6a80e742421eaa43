/**
 * Lint rule: unknown-memory-target
 *
 * Only `short` and `long` are memory stores. Declaring or reading any other
 * target does nothing, and an embed into anything but `mem.short` or
 * `mem.long` lands in short-term memory.
 */

import type { LintRule, Diagnostic } from '../linter';
import { walk } from '../../../interpreter/src/ast';

const STORES = new Set(['short', 'long']);
const EMBED_TARGETS = new Set(['mem.short', 'mem.long']);

export const unknownMemoryTargetRule: LintRule = {
  name: 'unknown-memory-target',
  description: 'Warn on memory targets other than short and long',
  severity: 'warning',

  run(parsed): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    const report = (message: string, line: number): void => {
      diagnostics.push({ rule: 'unknown-memory-target', severity: 'warning', message, line, column: 0 });
    };

    walk(parsed.program, (stmt) => {
      switch (stmt.kind) {
        case 'mem':
          if (!STORES.has(stmt.target)) {
            report(`Unknown memory store '${stmt.target}'`, stmt.line);
          }
          break;
        case 'reflect_access':
          if (!STORES.has(stmt.memTarget)) {
            report(`Unknown memory store '${stmt.memTarget}'; reads as ""`, stmt.line);
          }
          break;
        case 'embed':
          if (!EMBED_TARGETS.has(stmt.target)) {
            report(`Embed target '${stmt.target}' falls back to mem.short`, stmt.line);
          }
          break;
        default:
          break;
      }
    });

    return diagnostics;
  },
};
