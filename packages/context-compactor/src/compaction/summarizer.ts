/**
 * Summarizer - folds discarded items into one summary text.
 *
 * Discarded items are grouped into fixed categories, a prompt is built from a
 * few examples per category, and the generation service is called once under
 * a deadline. Any failure of that call yields a deterministic summary built
 * from the category counts; only a caller abort propagates.
 */

import pRetry from "p-retry";
import type { ILogObj, Logger } from "tslog";
import { CompactionAbortedError, isAbortError, isRetryableError } from "../core/errors.js";
import { CODE_SNIPPET_KEYWORDS, matchesImportantPattern } from "../core/patterns.js";
import type { ContextItem, SummarySource } from "../core/types.js";
import type { GenerationService } from "../generation/service.js";
import { createLogger } from "../logging/logger.js";
import { formatTimeRange, preview } from "../utils/format.js";
import { withDeadline } from "../utils/timing.js";

export const SUMMARY_CATEGORIES = [
  "userCommands",
  "assistantResponses",
  "fileOperations",
  "codeSnippets",
  "errors",
  "other",
] as const;

export type SummaryCategory = (typeof SUMMARY_CATEGORIES)[number];

export const CATEGORY_TITLES: Record<SummaryCategory, string> = {
  userCommands: "User Commands",
  assistantResponses: "Assistant Responses",
  fileOperations: "File Operations",
  codeSnippets: "Code Snippets",
  errors: "Errors and Problems",
  other: "Other Activity",
};

export const EMPTY_DISCARD_SUMMARY = "No items were compacted.";
export const UNAVAILABLE_SUMMARY = "Summary not available";

const EXAMPLES_PER_CATEGORY = 3;
const EXAMPLE_PREVIEW_CHARS = 200;
const DEFAULT_MAX_OUTPUT_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_RETRY_MIN_TIMEOUT_MS = 1000;

/** Non-empty categories in fixed order. */
export type CategorizedItems = Map<SummaryCategory, ContextItem[]>;

/**
 * First match wins: kind user, kind assistant, kind file, code keywords,
 * important patterns, otherwise "other".
 */
export function categorizeItem(item: ContextItem): SummaryCategory {
  if (item.kind === "user") return "userCommands";
  if (item.kind === "assistant") return "assistantResponses";
  if (item.kind === "file") return "fileOperations";
  if (CODE_SNIPPET_KEYWORDS.some((keyword) => item.content.includes(keyword))) {
    return "codeSnippets";
  }
  if (matchesImportantPattern(item.content)) return "errors";
  return "other";
}

export function categorizeItems(items: readonly ContextItem[]): CategorizedItems {
  const groups: CategorizedItems = new Map();
  for (const category of SUMMARY_CATEGORIES) {
    const members = items.filter((item) => categorizeItem(item) === category);
    if (members.length > 0) {
      groups.set(category, members);
    }
  }
  return groups;
}

/**
 * Builds the summarization prompt: up to three truncated examples per
 * category, then the formatting instructions and any caller instructions.
 */
export function buildSummaryPrompt(groups: CategorizedItems, instructions?: string): string {
  const lines = ["Write a concise, informative summary of the following development session:", ""];

  for (const [category, members] of groups) {
    lines.push(`### ${CATEGORY_TITLES[category]}:`);
    for (const item of members.slice(0, EXAMPLES_PER_CATEGORY)) {
      lines.push(`- ${preview(item.content, EXAMPLE_PREVIEW_CHARS)}`);
    }
    if (members.length > EXAMPLES_PER_CATEGORY) {
      lines.push(`... and ${members.length - EXAMPLES_PER_CATEGORY} more items`);
    }
    lines.push("");
  }

  lines.push(
    "Summary instructions:",
    "- Focus on the main points and important outcomes",
    "- Mention errors encountered and how they were solved",
    "- Highlight files created or modified",
    "- Use clear, concise language",
    "- At most 3 paragraphs",
  );
  if (instructions) {
    lines.push(`- Special instructions: ${instructions}`);
  }

  return lines.join("\n");
}

/**
 * "user commands (2), errors (1)"
 */
export function describeCategories(groups: CategorizedItems): string {
  return [...groups]
    .map(([category, members]) => `${CATEGORY_TITLES[category].toLowerCase()} (${members.length})`)
    .join(", ");
}

/**
 * Deterministic summary used when generation fails.
 */
export function buildFallbackSummary(groups: CategorizedItems): string {
  const total = [...groups.values()].reduce((sum, members) => sum + members.length, 0);
  const lines = ["## Session Summary", `Total of ${total} activities processed:`];
  for (const [category, members] of groups) {
    lines.push(`- ${CATEGORY_TITLES[category]}: ${members.length} items`);
  }
  return lines.join("\n");
}

function composeSummary(
  body: string,
  items: readonly ContextItem[],
  groups: CategorizedItems,
): string {
  return [
    "## Compacted Session Summary",
    "",
    body,
    "",
    "### Statistics",
    `- Items compacted: ${items.length}`,
    `- Period: ${formatTimeRange(items.map((item) => item.timestamp))}`,
    `- Content types: ${describeCategories(groups)}`,
    "",
    "*This summary was generated automatically by context compaction.*",
  ].join("\n");
}

export interface SummaryOutcome {
  text: string;
  source: SummarySource;
  categoryCounts: Partial<Record<SummaryCategory, number>>;
}

export interface SummarizerOptions {
  /** Without a generator every summary is the deterministic fallback */
  generator?: GenerationService;
  logger?: Logger<ILogObj>;
  /** @default 2048 */
  maxOutputTokens?: number;
  /** @default 0.1 */
  temperature?: number;
  /** Delay before the first retry; doubles per attempt. @default 1000 */
  retryMinTimeoutMs?: number;
}

export interface SummarizeOptions {
  instructions?: string;
  /** Caller cancellation */
  signal?: AbortSignal;
  /** @default 60000 */
  timeoutMs?: number;
  /** @default 0 */
  retries?: number;
}

export class Summarizer {
  private readonly generator?: GenerationService;
  private readonly logger: Logger<ILogObj>;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;
  private readonly retryMinTimeoutMs: number;

  constructor(options: SummarizerOptions = {}) {
    this.generator = options.generator;
    this.logger = options.logger ?? createLogger({ name: "compactor:summarizer" });
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.retryMinTimeoutMs = options.retryMinTimeoutMs ?? DEFAULT_RETRY_MIN_TIMEOUT_MS;
  }

  /**
   * Summarizes the discarded items.
   *
   * @throws CompactionAbortedError if `options.signal` aborts first
   */
  async summarize(
    items: readonly ContextItem[],
    options: SummarizeOptions = {},
  ): Promise<SummaryOutcome> {
    if (items.length === 0) {
      return { text: EMPTY_DISCARD_SUMMARY, source: "placeholder", categoryCounts: {} };
    }

    const groups = categorizeItems(items);
    const categoryCounts: Partial<Record<SummaryCategory, number>> = {};
    for (const [category, members] of groups) {
      categoryCounts[category] = members.length;
    }

    const fallback = (): SummaryOutcome => ({
      text: buildFallbackSummary(groups),
      source: "fallback",
      categoryCounts,
    });

    const generator = this.generator;
    if (!generator) {
      this.logger.debug("No generation service configured, using fallback summary");
      return fallback();
    }

    const prompt = buildSummaryPrompt(groups, options.instructions);
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    try {
      const generated = await withDeadline(
        (signal) => this.generate(generator, prompt, signal, options.retries ?? 0),
        timeoutMs,
        options.signal,
      );
      const body = generated.trim() || UNAVAILABLE_SUMMARY;
      return { text: composeSummary(body, items, groups), source: "generated", categoryCounts };
    } catch (error) {
      if (options.signal?.aborted) {
        throw error instanceof CompactionAbortedError
          ? error
          : new CompactionAbortedError({ cause: error });
      }
      // Cancelled below us (SDK or transport), not by the caller
      const reason = isAbortError(error) ? "was cancelled" : "failed";
      this.logger.warn(`Summary generation ${reason}, using fallback summary`, {
        error: error instanceof Error ? error.message : String(error),
        items: items.length,
      });
      return fallback();
    }
  }

  private async generate(
    generator: GenerationService,
    prompt: string,
    signal: AbortSignal,
    retries: number,
  ): Promise<string> {
    return pRetry(
      async (attemptNumber) => {
        this.logger.debug("Requesting summary", { attempt: attemptNumber, maxAttempts: retries + 1 });
        const text: unknown = await generator.generate({
          prompt,
          maxOutputTokens: this.maxOutputTokens,
          temperature: this.temperature,
          signal,
        });
        if (typeof text !== "string") {
          throw new Error(`Malformed summary response: expected string, got ${typeof text}`);
        }
        return text;
      },
      {
        retries,
        minTimeout: this.retryMinTimeoutMs,
        factor: 2,
        randomize: false,
        signal,
        onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
          this.logger.warn(
            `Summary attempt ${attemptNumber}/${attemptNumber + retriesLeft} failed`,
            { error: error.message, retriesLeft },
          );
        },
        shouldRetry: ({ error }) => !signal.aborted && isRetryableError(error),
      },
    );
  }
}
