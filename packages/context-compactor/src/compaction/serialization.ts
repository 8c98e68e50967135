/**
 * JSON-safe forms of items and results, for the external session store.
 *
 * Dates become ISO strings; parsing validates the shape and rebuilds dates.
 */

import { z } from "zod";
import { SerializationError, toValidationIssues } from "../core/errors.js";
import { CONTEXT_KINDS, type CompactionResult, type ContextItem } from "../core/types.js";

const isoDate = z.iso.datetime({ offset: true });

const contextItemSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  kind: z.enum(CONTEXT_KINDS),
  timestamp: isoDate,
  importanceScore: z.number().min(0).max(1),
  metadata: z.record(z.string(), z.unknown()),
  tokensEstimate: z.number().int().nonnegative(),
  mustPreserve: z.boolean(),
});

const weightsSchema = z.object({
  recency: z.number(),
  userInteraction: z.number(),
  codeRelevance: z.number(),
  errorInformation: z.number(),
});

const compactionResultSchema = z.object({
  originalItems: z.number().int().nonnegative(),
  compactedItems: z.number().int().positive(),
  originalTokens: z.number().int(),
  compactedTokens: z.number().int(),
  compressionRatio: z.number().nonnegative(),
  preservedItems: z.array(contextItemSchema),
  summary: z.string(),
  metadata: z.object({
    instructions: z.string().nullable(),
    compactedAt: isoDate,
    preservationCriteria: z.object({
      preserveRecentCount: z.number().int().nonnegative(),
      minImportanceThreshold: z.number(),
      importanceWeights: weightsSchema,
      targetCompressionRatio: z.number(),
    }),
    itemsCompacted: z.number().int().nonnegative(),
    summarySource: z.enum(["generated", "fallback", "placeholder"]),
  }),
});

export type SerializedContextItem = z.infer<typeof contextItemSchema>;
export type SerializedCompactionResult = z.infer<typeof compactionResultSchema>;

export function serializeContextItem(item: ContextItem): SerializedContextItem {
  return {
    id: item.id,
    content: item.content,
    kind: item.kind,
    timestamp: item.timestamp.toISOString(),
    importanceScore: item.importanceScore,
    metadata: { ...item.metadata },
    tokensEstimate: item.tokensEstimate,
    mustPreserve: item.mustPreserve,
  };
}

function toContextItem(value: SerializedContextItem): ContextItem {
  return { ...value, timestamp: new Date(value.timestamp) };
}

/**
 * @throws SerializationError when `value` is not a serialized context item
 */
export function parseContextItem(value: unknown): ContextItem {
  const parsed = contextItemSchema.safeParse(value);
  if (!parsed.success) {
    throw new SerializationError("context item", toValidationIssues(parsed.error));
  }
  return toContextItem(parsed.data);
}

export function serializeCompactionResult(result: CompactionResult): SerializedCompactionResult {
  const criteria = result.metadata.preservationCriteria;
  return {
    originalItems: result.originalItems,
    compactedItems: result.compactedItems,
    originalTokens: result.originalTokens,
    compactedTokens: result.compactedTokens,
    compressionRatio: result.compressionRatio,
    preservedItems: result.preservedItems.map(serializeContextItem),
    summary: result.summary,
    metadata: {
      ...result.metadata,
      preservationCriteria: { ...criteria, importanceWeights: { ...criteria.importanceWeights } },
    },
  };
}

/**
 * @throws SerializationError when `value` is not a serialized compaction result
 */
export function parseCompactionResult(value: unknown): CompactionResult {
  const parsed = compactionResultSchema.safeParse(value);
  if (!parsed.success) {
    throw new SerializationError("compaction result", toValidationIssues(parsed.error));
  }
  const data = parsed.data;
  return Object.freeze({
    ...data,
    preservedItems: Object.freeze(data.preservedItems.map(toContextItem)),
    metadata: Object.freeze(data.metadata),
  });
}
