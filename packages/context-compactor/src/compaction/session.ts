/**
 * CompactionSession - one session's context sequence and its compactor.
 *
 * Compactions run single-flight: a call made while another is in flight
 * waits for it and then works on the sequence it left behind.
 */

import type { ILogObj, Logger } from "tslog";
import { estimateTokens, type TokenEstimator } from "../core/token-estimator.js";
import {
  type CompactionResult,
  type ContextItem,
  createContextItem,
  totalTokens,
} from "../core/types.js";
import { createLogger } from "../logging/logger.js";
import {
  type AutoCompactOptions,
  type CompactOptions,
  ContextCompactor,
  type ContextCompactorOptions,
} from "./compactor.js";

export interface CompactionSessionOptions extends ContextCompactorOptions {
  /** Reuse an existing compactor instead of creating one from the options */
  compactor?: ContextCompactor;
  /** Initial sequence */
  items?: readonly ContextItem[];
}

/**
 * Metadata flag carried by summary items the session inserts.
 */
export const COMPACTION_SUMMARY_FLAG = "compactionSummary";

export class CompactionSession {
  readonly compactor: ContextCompactor;
  private items: ContextItem[];
  private readonly estimator: TokenEstimator;
  private readonly clock: () => Date;
  private readonly logger: Logger<ILogObj>;
  private tail: Promise<unknown> = Promise.resolve();
  private inFlight = 0;

  constructor(options: CompactionSessionOptions = {}) {
    this.logger = (options.logger ?? createLogger({ name: "compactor" })).getSubLogger({
      name: "session",
    });
    this.compactor = options.compactor ?? new ContextCompactor(options);
    this.items = [...(options.items ?? [])];
    this.estimator = options.estimator ?? estimateTokens;
    this.clock = options.clock ?? (() => new Date());
  }

  append(...items: ContextItem[]): void {
    this.items.push(...items);
  }

  /**
   * Snapshot of the current sequence.
   */
  getItems(): ContextItem[] {
    return [...this.items];
  }

  totalTokens(): number {
    return totalTokens(this.items);
  }

  /**
   * True while a compaction is running or queued.
   */
  get busy(): boolean {
    return this.inFlight > 0;
  }

  /**
   * Compacts the sequence and replaces it with `[summary, ...preserved]`,
   * followed by anything appended meanwhile.
   * If the call rejects (e.g. aborted), the sequence is left unchanged.
   */
  compact(options: CompactOptions = {}): Promise<CompactionResult> {
    return this.exclusive(async () => {
      const snapshot = [...this.items];
      const result = await this.compactor.compactContext(snapshot, options);
      this.apply(result, snapshot.length);
      return result;
    });
  }

  /**
   * Compacts only when the compactor's trigger fires.
   */
  autoCompact(options: AutoCompactOptions = {}): Promise<CompactionResult | null> {
    return this.exclusive(async () => {
      const snapshot = [...this.items];
      const result = await this.compactor.autoCompactIfNeeded(snapshot, options);
      if (result) {
        this.apply(result, snapshot.length);
      }
      return result;
    });
  }

  /**
   * Items appended after the first `consumed` entries arrived while the
   * compaction ran; they are kept after the preserved items.
   */
  private apply(result: CompactionResult, consumed: number): void {
    if (result.originalItems === 0) {
      return;
    }
    const summaryItem = createContextItem(
      {
        kind: "system",
        content: result.summary,
        timestamp: this.clock(),
        metadata: {
          [COMPACTION_SUMMARY_FLAG]: true,
          itemsCompacted: result.metadata.itemsCompacted,
          summarySource: result.metadata.summarySource,
        },
      },
      this.estimator,
    );
    this.items = [summaryItem, ...result.preservedItems, ...this.items.slice(consumed)];
    this.logger.debug("Replaced session context", {
      items: this.items.length,
      tokens: this.totalTokens(),
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    this.inFlight++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run.finally(() => {
      this.inFlight--;
    });
  }
}
