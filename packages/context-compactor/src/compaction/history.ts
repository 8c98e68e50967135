/**
 * Append-only record of compactions with running statistics.
 *
 * Keeps the most recent results in a ring buffer; aggregates cover every
 * result ever recorded, including those the buffer has evicted. Long-term
 * storage belongs to the session store, fed through `onCompaction`.
 */

import type { CompactionResult } from "../core/types.js";

export const DEFAULT_HISTORY_CAPACITY = 100;

export interface CompactionStats {
  totalCompactions: number;
  /** 0 when nothing has been recorded */
  averageCompressionRatio: number;
  /** Lowest ratio seen */
  bestCompressionRatio: number | null;
  /** Highest ratio seen */
  worstCompressionRatio: number | null;
  /** Σ(originalTokens − compactedTokens); individual entries may be negative */
  totalTokensSaved: number;
  /** ISO timestamp of the latest compaction */
  lastCompactionTime: string | null;
}

export class CompactionHistory {
  private readonly buffer: CompactionResult[] = [];
  private readonly capacity: number;
  private start = 0;

  private total = 0;
  private ratioSum = 0;
  private best: number | null = null;
  private worst: number | null = null;
  private tokensSaved = 0;
  private lastTime: string | null = null;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  record(result: CompactionResult): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(result);
    } else {
      this.buffer[this.start] = result;
      this.start = (this.start + 1) % this.capacity;
    }

    this.total++;
    this.ratioSum += result.compressionRatio;
    this.best = this.best === null ? result.compressionRatio : Math.min(this.best, result.compressionRatio);
    this.worst =
      this.worst === null ? result.compressionRatio : Math.max(this.worst, result.compressionRatio);
    this.tokensSaved += result.originalTokens - result.compactedTokens;
    this.lastTime = result.metadata.compactedAt;
  }

  /**
   * Retained results, oldest first.
   */
  entries(): CompactionResult[] {
    return [...this.buffer.slice(this.start), ...this.buffer.slice(0, this.start)];
  }

  latest(): CompactionResult | undefined {
    if (this.buffer.length === 0) return undefined;
    return this.buffer[(this.start + this.buffer.length - 1) % this.buffer.length];
  }

  get size(): number {
    return this.buffer.length;
  }

  getStats(): CompactionStats {
    return {
      totalCompactions: this.total,
      averageCompressionRatio: this.total > 0 ? this.ratioSum / this.total : 0,
      bestCompressionRatio: this.best,
      worstCompressionRatio: this.worst,
      totalTokensSaved: this.tokensSaved,
      lastCompactionTime: this.lastTime,
    };
  }
}
