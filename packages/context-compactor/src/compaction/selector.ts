/**
 * Chooses which scored items survive a compaction verbatim.
 */

import type { ContextItem } from "../core/types.js";
import { createDefaultPreservationRules, mostRecent, type PreservationRuleTable } from "./instructions.js";

/** Items at or above this score are always kept. */
export const HIGH_IMPORTANCE_THRESHOLD = 0.8;

export interface SelectionOptions {
  preserveRecentCount: number;
  instructions?: string;
  rules?: PreservationRuleTable;
}

/**
 * Union of pinned items, the most recent items, high-importance items and
 * instruction-driven extras. Duplicates (by id) collapse to one entry; the
 * result follows the input sequence order.
 */
export function selectPreserved(
  items: readonly ContextItem[],
  options: SelectionOptions,
): ContextItem[] {
  const rules = options.rules ?? createDefaultPreservationRules();

  const candidates = [
    ...items.filter((item) => item.mustPreserve),
    ...mostRecent(items, options.preserveRecentCount),
    ...items.filter((item) => item.importanceScore >= HIGH_IMPORTANCE_THRESHOLD),
    ...rules.apply(items, options.instructions),
  ];

  const keep = new Set(candidates.map((item) => item.id));
  const seen = new Set<string>();
  const preserved: ContextItem[] = [];
  for (const item of items) {
    if (keep.has(item.id) && !seen.has(item.id)) {
      seen.add(item.id);
      preserved.push(item);
    }
  }
  return preserved;
}

/**
 * Items not in the preserved set, in sequence order.
 */
export function discardedItems(
  items: readonly ContextItem[],
  preserved: readonly ContextItem[],
): ContextItem[] {
  const kept = new Set(preserved.map((item) => item.id));
  return items.filter((item) => !kept.has(item.id));
}
