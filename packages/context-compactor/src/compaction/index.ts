export type { AutoCompactOptions, CompactOptions, ContextCompactorOptions } from "./compactor.js";
export { ContextCompactor, EMPTY_CONTEXT_SUMMARY } from "./compactor.js";
export type { CompactorConfig, ResolvedCompactorConfig } from "./config.js";
export {
  DEFAULT_COMPACTOR_CONFIG,
  DEFAULT_IMPORTANCE_WEIGHTS,
  mergeCompactorConfig,
  resolveCompactorConfig,
} from "./config.js";
export type { CompactionStats } from "./history.js";
export { CompactionHistory, DEFAULT_HISTORY_CAPACITY } from "./history.js";
export type { PreservationRule } from "./instructions.js";
export {
  createDefaultPreservationRules,
  PRESERVE_CODE,
  PRESERVE_ERRORS,
  PRESERVE_RECENT,
  PreservationRuleTable,
} from "./instructions.js";
export type { ImportanceFeature, ScoreBreakdown, ScoringOptions } from "./scorer.js";
export { scoreItem, scoreItems } from "./scorer.js";
export { discardedItems, HIGH_IMPORTANCE_THRESHOLD, selectPreserved } from "./selector.js";
export type {
  SerializedCompactionResult,
  SerializedContextItem,
} from "./serialization.js";
export {
  parseCompactionResult,
  parseContextItem,
  serializeCompactionResult,
  serializeContextItem,
} from "./serialization.js";
export type { CompactionSessionOptions } from "./session.js";
export { COMPACTION_SUMMARY_FLAG, CompactionSession } from "./session.js";
export type {
  SummarizeOptions,
  SummarizerOptions,
  SummaryCategory,
  SummaryOutcome,
} from "./summarizer.js";
export {
  buildFallbackSummary,
  buildSummaryPrompt,
  categorizeItem,
  categorizeItems,
  Summarizer,
} from "./summarizer.js";
export type { TriggerConfig, TriggerEvaluation } from "./trigger.js";
export { evaluateTrigger, LOW_IMPORTANCE_FRACTION, shouldCompact } from "./trigger.js";
