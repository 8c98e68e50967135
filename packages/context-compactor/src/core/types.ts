/**
 * Core data model: context items and compaction results.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { toValidationIssues, ValidationError } from "./errors.js";
import { estimateTokens, type TokenEstimator } from "./token-estimator.js";

export const CONTEXT_KINDS = ["user", "assistant", "system", "file", "command"] as const;

export type ContextKind = (typeof CONTEXT_KINDS)[number];

/**
 * One unit of session history: a message, a file reference, a command, etc.
 *
 * Only the scorer writes `importanceScore`; everything else is fixed at creation.
 */
export interface ContextItem {
  /** Stable unique id, used for de-duplication */
  readonly id: string;
  readonly content: string;
  readonly kind: ContextKind;
  readonly timestamp: Date;
  /** Normalized importance in [0, 1]; 0 until scored */
  importanceScore: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly tokensEstimate: number;
  /** Caller-set pin; pinned items always survive compaction */
  readonly mustPreserve: boolean;
}

/**
 * Where a compaction summary came from.
 * - `generated`: produced by the generation service
 * - `fallback`: built from category counts after the service failed
 * - `placeholder`: nothing was discarded (or the context was empty)
 */
export type SummarySource = "generated" | "fallback" | "placeholder";

/**
 * Snapshot of the settings that drove a compaction.
 */
export interface PreservationCriteria {
  preserveRecentCount: number;
  minImportanceThreshold: number;
  importanceWeights: ImportanceWeights;
  targetCompressionRatio: number;
}

export interface ImportanceWeights {
  recency: number;
  userInteraction: number;
  codeRelevance: number;
  errorInformation: number;
}

export interface CompactionMetadata {
  instructions: string | null;
  /** ISO timestamp of completion */
  compactedAt: string;
  preservationCriteria: PreservationCriteria;
  /** Number of items folded into the summary */
  itemsCompacted: number;
  summarySource: SummarySource;
}

/**
 * Outcome of one compaction pass.
 *
 * `compactedItems` is always `preservedItems.length + 1`; the extra entry is the summary.
 */
export interface CompactionResult {
  readonly originalItems: number;
  readonly compactedItems: number;
  readonly originalTokens: number;
  readonly compactedTokens: number;
  /** compactedTokens / originalTokens, or 1 when the original was empty. May exceed 1. */
  readonly compressionRatio: number;
  readonly preservedItems: readonly ContextItem[];
  readonly summary: string;
  readonly metadata: Readonly<CompactionMetadata>;
}

const contextItemInitSchema = z.object({
  id: z.string().min(1).optional(),
  content: z.string(),
  kind: z.enum(CONTEXT_KINDS),
  timestamp: z.date().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
  tokensEstimate: z.number().int().nonnegative().optional(),
  mustPreserve: z.boolean().optional(),
});

export type ContextItemInit = z.input<typeof contextItemInitSchema>;

/**
 * Creates a context item, filling in id, timestamp and token estimate.
 *
 * @throws ValidationError when the init is malformed
 *
 * @example
 * ```typescript
 * const item = createContextItem({ kind: "user", content: "Fix the build" });
 * ```
 */
export function createContextItem(
  init: ContextItemInit,
  estimator: TokenEstimator = estimateTokens,
): ContextItem {
  const parsed = contextItemInitSchema.safeParse(init);
  if (!parsed.success) {
    throw new ValidationError("Invalid context item", toValidationIssues(parsed.error));
  }
  const value = parsed.data;

  return {
    id: value.id ?? randomUUID(),
    content: value.content,
    kind: value.kind,
    timestamp: value.timestamp ?? new Date(),
    importanceScore: 0,
    metadata: value.metadata ?? {},
    tokensEstimate: value.tokensEstimate ?? estimator(value.content),
    mustPreserve: value.mustPreserve ?? false,
  };
}

/**
 * Sums `tokensEstimate` over a sequence.
 */
export function totalTokens(items: readonly ContextItem[]): number {
  return items.reduce((sum, item) => sum + item.tokensEstimate, 0);
}
