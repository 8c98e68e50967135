// Compaction engine
export * from "./compaction/index.js";

// Data model
export type {
  CompactionMetadata,
  CompactionResult,
  ContextItem,
  ContextItemInit,
  ContextKind,
  ImportanceWeights,
  PreservationCriteria,
  SummarySource,
} from "./core/types.js";
export { CONTEXT_KINDS, createContextItem, totalTokens } from "./core/types.js";
export type { TokenEstimator } from "./core/token-estimator.js";
export { CHARS_PER_TOKEN, estimateTokens } from "./core/token-estimator.js";
export {
  CODE_INDICATORS,
  DESTRUCTIVE_KEYWORDS,
  IMPORTANT_PATTERNS,
  matchesImportantPattern,
} from "./core/patterns.js";

// Errors
export type { ValidationIssue } from "./core/errors.js";
export {
  CompactionAbortedError,
  CompactorError,
  ConfigurationError,
  isAbortError,
  isRetryableError,
  SerializationError,
  SummaryTimeoutError,
  ValidationError,
} from "./core/errors.js";

// Generation backends
export type { GenerationRequest, GenerationService } from "./generation/service.js";
export type { GeminiModelsClient, GeminiTextResponse } from "./generation/gemini.js";
export {
  createGeminiGenerationServiceFromEnv,
  DEFAULT_GEMINI_SUMMARY_MODEL,
  GeminiGenerationService,
} from "./generation/gemini.js";

// Logging
export type { LoggerOptions } from "./logging/logger.js";
export { createLogger } from "./logging/logger.js";
