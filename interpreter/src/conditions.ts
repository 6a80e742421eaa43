/**
 * Condition evaluators for `if` statements.
 *
 * Conditions reach the evaluator as raw text. Interpreting that text is
 * delegated to one ConditionEvaluator so new condition forms can be added
 * without touching the statement dispatcher.
 */

import type { MemoryContext } from './memory';

export type ConditionResult =
  | { supported: false }
  | { supported: true; holds: boolean };

export type ConditionEvaluator = (condition: string, ctx: MemoryContext) => ConditionResult;

export type ConditionMode = 'loss-only' | 'loss-and-context';

const UNSUPPORTED: ConditionResult = { supported: false };

/**
 * The training-loss placeholder: any condition mentioning `loss` holds.
 * Everything else is unsupported, so `context includes "..."` bodies are
 * skipped under this evaluator.
 */
export const lossPlaceholderCondition: ConditionEvaluator = (condition) =>
  condition.includes('loss') ? { supported: true, holds: true } : UNSUPPORTED;

const CONTEXT_INCLUDES = /^context\s+includes\s*"([^"]*)"$/;

/**
 * `context includes "<kw>"`: holds when any short-term key or value contains
 * the keyword.
 */
export const contextIncludesCondition: ConditionEvaluator = (condition, ctx) => {
  const match = CONTEXT_INCLUDES.exec(condition.trim());
  if (!match) return UNSUPPORTED;
  const keyword = match[1];
  for (const [key, value] of ctx.memShort) {
    if (key.includes(keyword) || value.includes(keyword)) {
      return { supported: true, holds: true };
    }
  }
  return { supported: true, holds: false };
};

/**
 * Try each evaluator in order; the first that supports the condition decides.
 */
export function firstSupported(...evaluators: ConditionEvaluator[]): ConditionEvaluator {
  return (condition, ctx) => {
    for (const evaluate of evaluators) {
      const result = evaluate(condition, ctx);
      if (result.supported) return result;
    }
    return UNSUPPORTED;
  };
}

export function conditionEvaluatorFor(mode: ConditionMode): ConditionEvaluator {
  switch (mode) {
    case 'loss-only':
      return lossPlaceholderCondition;
    case 'loss-and-context':
      return firstSupported(lossPlaceholderCondition, contextIncludesCondition);
  }
}
