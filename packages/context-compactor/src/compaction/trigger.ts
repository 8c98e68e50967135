/**
 * Decides whether a context sequence should be compacted.
 */

import { type ContextItem, totalTokens } from "../core/types.js";
import type { ResolvedCompactorConfig } from "./config.js";

/**
 * Fraction of low-importance items past which compaction is recommended.
 */
export const LOW_IMPORTANCE_FRACTION = 0.6;

export type TriggerConfig = Pick<
  ResolvedCompactorConfig,
  "maxContextTokens" | "compactionTriggerThreshold" | "minImportanceThreshold"
>;

/**
 * Why compaction was (or was not) recommended.
 */
export interface TriggerEvaluation {
  shouldCompact: boolean;
  totalTokens: number;
  tokenLimit: number;
  lowImportanceCount: number;
  overBudget: boolean;
  mostlyLowImportance: boolean;
}

/**
 * Evaluates both trigger conditions. Pure; reads scores as they currently are.
 */
export function evaluateTrigger(
  items: readonly ContextItem[],
  config: TriggerConfig,
): TriggerEvaluation {
  const tokens = totalTokens(items);
  const tokenLimit = config.maxContextTokens * config.compactionTriggerThreshold;
  const lowImportanceCount = items.filter(
    (item) => item.importanceScore < config.minImportanceThreshold,
  ).length;

  const overBudget = tokens > tokenLimit;
  const mostlyLowImportance = lowImportanceCount > items.length * LOW_IMPORTANCE_FRACTION;

  return {
    shouldCompact: overBudget || mostlyLowImportance,
    totalTokens: tokens,
    tokenLimit,
    lowImportanceCount,
    overBudget,
    mostlyLowImportance,
  };
}

/**
 * True when the token total exceeds the trigger threshold, or when more than
 * 60% of the items score below `minImportanceThreshold`.
 */
export function shouldCompact(items: readonly ContextItem[], config: TriggerConfig): boolean {
  return evaluateTrigger(items, config).shouldCompact;
}
