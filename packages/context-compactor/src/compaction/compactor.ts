/**
 * ContextCompactor - orchestrates one compaction pass.
 *
 * score -> select -> summarize -> account -> record. Scoring, selection and
 * accounting are synchronous; summary generation is the only await.
 */

import type { ILogObj, Logger } from "tslog";
import { estimateTokens, type TokenEstimator } from "../core/token-estimator.js";
import {
  type CompactionResult,
  type ContextItem,
  type SummarySource,
  totalTokens,
} from "../core/types.js";
import type { GenerationService } from "../generation/service.js";
import { createLogger } from "../logging/logger.js";
import {
  type CompactorConfig,
  mergeCompactorConfig,
  preservationCriteriaOf,
  type ResolvedCompactorConfig,
  resolveCompactorConfig,
} from "./config.js";
import { CompactionHistory, type CompactionStats } from "./history.js";
import {
  createDefaultPreservationRules,
  type PreservationRule,
  type PreservationRuleTable,
} from "./instructions.js";
import { scoreItems } from "./scorer.js";
import { discardedItems, selectPreserved } from "./selector.js";
import { Summarizer } from "./summarizer.js";
import { evaluateTrigger, type TriggerEvaluation } from "./trigger.js";

export const EMPTY_CONTEXT_SUMMARY = "Empty context";

export interface ContextCompactorOptions {
  config?: CompactorConfig;
  /** Summary backend; without one, summaries use the deterministic fallback */
  generator?: GenerationService;
  /** @default floor(length / 4) */
  estimator?: TokenEstimator;
  /** Source of "now" for recency scoring and timestamps */
  clock?: () => Date;
  logger?: Logger<ILogObj>;
  /** Results retained in memory. @default 100 */
  historyCapacity?: number;
  /** Instruction rule table; defaults to code/errors/recent directives */
  preservationRules?: PreservationRuleTable;
  /** Called after each recorded compaction, e.g. to persist it */
  onCompaction?: (result: CompactionResult) => void;
  /** Delay before the first summary retry. @default 1000 */
  retryMinTimeoutMs?: number;
}

export interface CompactOptions {
  /** Free-text guidance; also drives instruction-based preservation */
  instructions?: string;
  /** Cancels summary generation; the call then rejects with CompactionAbortedError */
  signal?: AbortSignal;
  /** Overrides `summaryTimeoutMs` for this call */
  timeoutMs?: number;
}

export interface AutoCompactOptions extends CompactOptions {
  /**
   * Re-score the items before evaluating the trigger. By default the trigger
   * reads the scores the items already carry.
   * @default false
   */
  scoreFirst?: boolean;
}

/**
 * Keeps a context sequence within budget by preserving important items and
 * summarizing the rest.
 *
 * @example
 * ```typescript
 * const compactor = new ContextCompactor({
 *   generator: createGeminiGenerationServiceFromEnv() ?? undefined,
 *   config: { preserveRecentCount: 8 },
 * });
 *
 * const result = await compactor.autoCompactIfNeeded(items);
 * if (result) {
 *   console.log(`${result.originalTokens} -> ${result.compactedTokens} tokens`);
 * }
 * ```
 */
export class ContextCompactor {
  private config: ResolvedCompactorConfig;
  private readonly estimator: TokenEstimator;
  private readonly clock: () => Date;
  private readonly logger: Logger<ILogObj>;
  private readonly history: CompactionHistory;
  private readonly rules: PreservationRuleTable;
  private readonly summarizer: Summarizer;
  private readonly onCompaction?: (result: CompactionResult) => void;

  constructor(options: ContextCompactorOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: "compactor" });
    this.config = resolveCompactorConfig(options.config, this.logger);
    this.estimator = options.estimator ?? estimateTokens;
    this.clock = options.clock ?? (() => new Date());
    this.history = new CompactionHistory(options.historyCapacity);
    this.rules = options.preservationRules ?? createDefaultPreservationRules();
    this.onCompaction = options.onCompaction;
    this.summarizer = new Summarizer({
      generator: options.generator,
      logger: this.logger.getSubLogger({ name: "summarizer" }),
      retryMinTimeoutMs: options.retryMinTimeoutMs,
    });
  }

  /**
   * Whether the sequence is over budget or mostly low-importance,
   * judged on the scores the items currently carry.
   */
  shouldCompact(items: readonly ContextItem[]): boolean {
    return this.evaluateTrigger(items).shouldCompact;
  }

  evaluateTrigger(items: readonly ContextItem[]): TriggerEvaluation {
    return evaluateTrigger(items, this.config);
  }

  /**
   * Runs one compaction pass over `items`.
   *
   * Only `importanceScore` on the given items is written. The pass is not
   * guaranteed to bring the context under budget.
   *
   * @throws TypeError when `items` is not an array or repeats an id
   * @throws CompactionAbortedError when `options.signal` aborts during summarization
   */
  async compactContext(
    items: readonly ContextItem[],
    options: CompactOptions = {},
  ): Promise<CompactionResult> {
    if (!Array.isArray(items)) {
      throw new TypeError("compactContext expects an array of context items");
    }
    assertUniqueIds(items);

    const config = this.config;
    const instructions = options.instructions;

    if (items.length === 0) {
      return this.buildResult(config, {
        items,
        preserved: [],
        summary: EMPTY_CONTEXT_SUMMARY,
        summarySource: "placeholder",
        itemsCompacted: 0,
        originalTokens: 0,
        compactedTokens: 0,
        instructions,
      });
    }

    scoreItems(items, { now: this.clock(), weights: config.importanceWeights });

    const preserved = selectPreserved(items, {
      preserveRecentCount: config.preserveRecentCount,
      instructions,
      rules: this.rules,
    });
    const discarded = discardedItems(items, preserved);

    const outcome = await this.summarizer.summarize(discarded, {
      instructions,
      signal: options.signal,
      timeoutMs: options.timeoutMs ?? config.summaryTimeoutMs,
      retries: config.summaryRetries,
    });

    const result = this.buildResult(config, {
      items,
      preserved,
      summary: outcome.text,
      summarySource: outcome.source,
      itemsCompacted: discarded.length,
      originalTokens: totalTokens(items),
      compactedTokens: totalTokens(preserved) + this.estimator(outcome.text),
      instructions,
    });

    this.history.record(result);
    this.logger.info("Compacted context", {
      originalItems: result.originalItems,
      compactedItems: result.compactedItems,
      originalTokens: result.originalTokens,
      compactedTokens: result.compactedTokens,
      compressionRatio: Number(result.compressionRatio.toFixed(3)),
      summarySource: outcome.source,
    });
    this.notify(result);

    return result;
  }

  /**
   * Compacts only if `shouldCompact(items)` holds, judged on the scores the
   * items carry unless `options.scoreFirst` is set.
   *
   * @returns the result, or null when no compaction was needed
   */
  async autoCompactIfNeeded(
    items: readonly ContextItem[],
    options: AutoCompactOptions = {},
  ): Promise<CompactionResult | null> {
    if (!Array.isArray(items)) {
      throw new TypeError("autoCompactIfNeeded expects an array of context items");
    }
    const { scoreFirst = false, ...compactOptions } = options;
    if (scoreFirst) {
      scoreItems(items, { now: this.clock(), weights: this.config.importanceWeights });
    }

    const evaluation = this.evaluateTrigger(items);
    if (!evaluation.shouldCompact) {
      this.logger.debug("Compaction not needed", {
        totalTokens: evaluation.totalTokens,
        tokenLimit: evaluation.tokenLimit,
        lowImportanceCount: evaluation.lowImportanceCount,
      });
      return null;
    }
    return this.compactContext(items, compactOptions);
  }

  /**
   * Applies a partial configuration update. Weights merge key by key.
   *
   * @throws ConfigurationError when any value is invalid; nothing is applied
   */
  configure(update: CompactorConfig): void {
    this.config = mergeCompactorConfig(this.config, update, this.logger);
  }

  getConfig(): ResolvedCompactorConfig {
    return { ...this.config, importanceWeights: { ...this.config.importanceWeights } };
  }

  registerPreservationRule(rule: PreservationRule): void {
    this.rules.register(rule);
  }

  getStats(): CompactionStats {
    return this.history.getStats();
  }

  /**
   * Retained results, oldest first.
   */
  getHistory(): CompactionResult[] {
    return this.history.entries();
  }

  private buildResult(
    config: ResolvedCompactorConfig,
    parts: {
      items: readonly ContextItem[];
      preserved: readonly ContextItem[];
      summary: string;
      summarySource: SummarySource;
      itemsCompacted: number;
      originalTokens: number;
      compactedTokens: number;
      instructions: string | undefined;
    },
  ): CompactionResult {
    const { originalTokens, compactedTokens } = parts;
    return Object.freeze({
      originalItems: parts.items.length,
      compactedItems: parts.preserved.length + 1,
      originalTokens,
      compactedTokens,
      compressionRatio: originalTokens > 0 ? compactedTokens / originalTokens : 1.0,
      preservedItems: Object.freeze([...parts.preserved]),
      summary: parts.summary,
      metadata: Object.freeze({
        instructions: parts.instructions ?? null,
        compactedAt: this.clock().toISOString(),
        preservationCriteria: preservationCriteriaOf(config),
        itemsCompacted: parts.itemsCompacted,
        summarySource: parts.summarySource,
      }),
    });
  }

  private notify(result: CompactionResult): void {
    if (!this.onCompaction) return;
    try {
      this.onCompaction(result);
    } catch (error) {
      this.logger.warn("onCompaction callback failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function assertUniqueIds(items: readonly ContextItem[]): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new TypeError(`Duplicate context item id: ${item.id}`);
    }
    seen.add(item.id);
  }
}
