/**
 * Importance scoring.
 *
 * Each item gets a weighted sum of four features in [0, 1]:
 * - recency: linear decay to zero over 24 hours
 * - userInteraction: user messages, then assistant replies to the user
 * - codeRelevance: 0.2 per matched code indicator
 * - errorInformation: 0.3 per matched important pattern
 *
 * Pinned items score 1. Destructive operations get a 1.2x boost before the final clamp.
 */

import {
  containsDestructiveKeyword,
  countCodeIndicators,
  countImportantPatterns,
} from "../core/patterns.js";
import type { ContextItem, ImportanceWeights } from "../core/types.js";
import { DEFAULT_IMPORTANCE_WEIGHTS } from "./config.js";

const HOUR_MS = 60 * 60 * 1000;
const RECENCY_WINDOW_HOURS = 24;
const CODE_INDICATOR_STEP = 0.2;
const IMPORTANT_PATTERN_STEP = 0.3;
const DESTRUCTIVE_BOOST = 1.2;

export type ImportanceFeature = keyof ImportanceWeights;

/**
 * Per-feature breakdown of one item's score.
 */
export interface ScoreBreakdown {
  features: Record<ImportanceFeature, number>;
  /** Weighted sum before overrides */
  weighted: number;
  pinned: boolean;
  destructive: boolean;
  /** Final clamped score */
  score: number;
}

export interface ScoringOptions {
  now: Date;
  weights?: ImportanceWeights;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function userInteraction(item: ContextItem): number {
  if (item.kind === "user") return 1.0;
  if (item.kind === "assistant" && item.metadata.responseToUser === true) return 0.8;
  return 0.2;
}

/**
 * Scores a single item without mutating it.
 */
export function scoreItem(item: ContextItem, options: ScoringOptions): ScoreBreakdown {
  const weights = options.weights ?? DEFAULT_IMPORTANCE_WEIGHTS;
  const ageHours = (options.now.getTime() - item.timestamp.getTime()) / HOUR_MS;

  const features: Record<ImportanceFeature, number> = {
    recency: clamp01(1 - ageHours / RECENCY_WINDOW_HOURS),
    userInteraction: userInteraction(item),
    codeRelevance: Math.min(1, CODE_INDICATOR_STEP * countCodeIndicators(item.content)),
    errorInformation: Math.min(1, IMPORTANT_PATTERN_STEP * countImportantPatterns(item.content)),
  };

  const weighted =
    weights.recency * features.recency +
    weights.userInteraction * features.userInteraction +
    weights.codeRelevance * features.codeRelevance +
    weights.errorInformation * features.errorInformation;

  const destructive = containsDestructiveKeyword(item.content);
  let score = item.mustPreserve ? 1.0 : weighted;
  if (destructive) {
    score *= DESTRUCTIVE_BOOST;
  }

  return {
    features,
    weighted,
    pinned: item.mustPreserve,
    destructive,
    score: clamp01(score),
  };
}

/**
 * Assigns `importanceScore` on every item and returns the same array.
 * Idempotent for a fixed `now`.
 */
export function scoreItems<T extends ContextItem>(
  items: readonly T[],
  options: ScoringOptions,
): readonly T[] {
  for (const item of items) {
    item.importanceScore = scoreItem(item, options).score;
  }
  return items;
}
