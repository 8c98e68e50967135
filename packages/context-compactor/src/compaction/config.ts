/**
 * Configuration for the compaction engine.
 *
 * Every field is optional on input; `resolveCompactorConfig` fills in defaults
 * and `mergeCompactorConfig` applies partial updates. Both validate with zod
 * and throw `ConfigurationError` instead of accepting out-of-range values.
 */

import type { ILogObj, Logger } from "tslog";
import { z } from "zod";
import { ConfigurationError, toValidationIssues } from "../core/errors.js";
import type { ImportanceWeights, PreservationCriteria } from "../core/types.js";
import { MAX_TIMEOUT_MS } from "../utils/timing.js";

const unitInterval = z.number().min(0).max(1);
const positiveFraction = z.number().gt(0).max(1);

const importanceWeightsSchema = z.strictObject({
  recency: unitInterval.optional(),
  userInteraction: unitInterval.optional(),
  codeRelevance: unitInterval.optional(),
  errorInformation: unitInterval.optional(),
});

const compactorConfigSchema = z.strictObject({
  targetCompressionRatio: positiveFraction.optional(),
  minImportanceThreshold: unitInterval.optional(),
  preserveRecentCount: z.number().int().nonnegative().optional(),
  maxContextTokens: z.number().int().positive().optional(),
  compactionTriggerThreshold: positiveFraction.optional(),
  importanceWeights: importanceWeightsSchema.optional(),
  summaryTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  summaryRetries: z.number().int().nonnegative().optional(),
});

/**
 * Recognized configuration options.
 *
 * @example
 * ```typescript
 * compactor.configure({
 *   preserveRecentCount: 8,
 *   importanceWeights: { recency: 0.5 },
 * });
 * ```
 */
export interface CompactorConfig {
  /**
   * Desired post-compaction size relative to the original.
   * Recorded in each result's preservation criteria but never used to pick items.
   * @default 0.3
   */
  targetCompressionRatio?: number;

  /**
   * Items scoring below this count as low-importance for the trigger.
   * @default 0.3
   */
  minImportanceThreshold?: number;

  /**
   * Number of most recent items always kept verbatim.
   * @default 5
   */
  preserveRecentCount?: number;

  /**
   * Token budget of the whole context.
   * @default 1_000_000
   */
  maxContextTokens?: number;

  /**
   * Fraction of `maxContextTokens` past which compaction is recommended.
   * @default 0.95
   */
  compactionTriggerThreshold?: number;

  /**
   * Per-feature weights of the importance score. Updates merge into the
   * current weights key by key.
   */
  importanceWeights?: Partial<ImportanceWeights>;

  /**
   * Deadline for summary generation, covering every attempt.
   * At most 2^31 - 1.
   * @default 60000
   */
  summaryTimeoutMs?: number;

  /**
   * Extra attempts for transient generation failures.
   * @default 0
   */
  summaryRetries?: number;
}

export type ResolvedCompactorConfig = Required<Omit<CompactorConfig, "importanceWeights">> & {
  importanceWeights: ImportanceWeights;
};

export const DEFAULT_IMPORTANCE_WEIGHTS: Readonly<ImportanceWeights> = {
  recency: 0.3,
  userInteraction: 0.4,
  codeRelevance: 0.2,
  errorInformation: 0.1,
};

export const DEFAULT_COMPACTOR_CONFIG: Readonly<ResolvedCompactorConfig> = {
  targetCompressionRatio: 0.3,
  minImportanceThreshold: 0.3,
  preserveRecentCount: 5,
  maxContextTokens: 1_000_000,
  compactionTriggerThreshold: 0.95,
  importanceWeights: DEFAULT_IMPORTANCE_WEIGHTS,
  summaryTimeoutMs: 60_000,
  summaryRetries: 0,
};

function validate(update: unknown): CompactorConfig {
  const parsed = compactorConfigSchema.safeParse(update);
  if (!parsed.success) {
    throw new ConfigurationError(toValidationIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Applies a validated partial update on top of `base`.
 * `importanceWeights` merges key by key; other fields replace.
 *
 * @throws ConfigurationError when any field is invalid (nothing is applied)
 */
export function mergeCompactorConfig(
  base: ResolvedCompactorConfig,
  update: CompactorConfig,
  logger?: Logger<ILogObj>,
): ResolvedCompactorConfig {
  const valid = validate(update);
  const weights = valid.importanceWeights;

  const merged: ResolvedCompactorConfig = {
    targetCompressionRatio: valid.targetCompressionRatio ?? base.targetCompressionRatio,
    minImportanceThreshold: valid.minImportanceThreshold ?? base.minImportanceThreshold,
    preserveRecentCount: valid.preserveRecentCount ?? base.preserveRecentCount,
    maxContextTokens: valid.maxContextTokens ?? base.maxContextTokens,
    compactionTriggerThreshold: valid.compactionTriggerThreshold ?? base.compactionTriggerThreshold,
    importanceWeights: {
      recency: weights?.recency ?? base.importanceWeights.recency,
      userInteraction: weights?.userInteraction ?? base.importanceWeights.userInteraction,
      codeRelevance: weights?.codeRelevance ?? base.importanceWeights.codeRelevance,
      errorInformation: weights?.errorInformation ?? base.importanceWeights.errorInformation,
    },
    summaryTimeoutMs: valid.summaryTimeoutMs ?? base.summaryTimeoutMs,
    summaryRetries: valid.summaryRetries ?? base.summaryRetries,
  };

  const weightSum = Object.values(merged.importanceWeights).reduce((sum, w) => sum + w, 0);
  if (weightSum > 1) {
    logger?.warn(
      `importanceWeights sum to ${weightSum.toFixed(2)}; scores above 1 are clamped, so high-importance items become indistinguishable.`,
    );
  }

  return merged;
}

/**
 * Resolves a partial configuration against the defaults.
 *
 * @throws ConfigurationError when any field is invalid
 */
export function resolveCompactorConfig(
  config: CompactorConfig = {},
  logger?: Logger<ILogObj>,
): ResolvedCompactorConfig {
  return mergeCompactorConfig(DEFAULT_COMPACTOR_CONFIG, config, logger);
}

/**
 * Snapshot recorded in each result's metadata.
 */
export function preservationCriteriaOf(config: ResolvedCompactorConfig): PreservationCriteria {
  return {
    preserveRecentCount: config.preserveRecentCount,
    minImportanceThreshold: config.minImportanceThreshold,
    importanceWeights: { ...config.importanceWeights },
    targetCompressionRatio: config.targetCompressionRatio,
  };
}
