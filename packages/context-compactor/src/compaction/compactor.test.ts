import {
  fixedClock,
  FIXED_NOW,
  hoursAgo,
  makeConversation,
  makeItem,
  mockGeneration,
} from "@context-compactor/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { CompactionAbortedError, ConfigurationError } from "../core/errors.js";
import { type CompactionResult, type ContextItem, totalTokens } from "../core/types.js";
import { createLogger } from "../logging/logger.js";
import { ContextCompactor, EMPTY_CONTEXT_SUMMARY } from "./compactor.js";

const logger = createLogger({ type: "hidden" });

const FALLBACK_15 =
  "## Session Summary\nTotal of 15 activities processed:\n- User Commands: 8 items\n- Assistant Responses: 7 items";

describe("ContextCompactor", () => {
  let generator: ReturnType<typeof mockGeneration>;

  beforeEach(() => {
    generator = mockGeneration();
  });

  const createCompactor = (options: ConstructorParameters<typeof ContextCompactor>[0] = {}) =>
    new ContextCompactor({ generator, logger, clock: fixedClock(), ...options });

  describe("compactContext", () => {
    it("returns a placeholder result for an empty context", async () => {
      const compactor = createCompactor();
      const result = await compactor.compactContext([]);

      expect(result.originalItems).toBe(0);
      expect(result.compactedItems).toBe(1);
      expect(result.originalTokens).toBe(0);
      expect(result.compactedTokens).toBe(0);
      expect(result.compressionRatio).toBe(1);
      expect(result.preservedItems).toEqual([]);
      expect(result.summary).toBe(EMPTY_CONTEXT_SUMMARY);
      expect(result.metadata.summarySource).toBe("placeholder");
      expect(generator.callCount).toBe(0);
      expect(compactor.getStats().totalCompactions).toBe(0);
    });

    it("keeps recent items and summarizes the rest", async () => {
      generator.returns("Discussed fifteen things.");
      const compactor = createCompactor();
      const items = makeConversation(10, { tokensPerItem: 100 });

      const result = await compactor.compactContext(items);

      expect(result.preservedItems.map((item) => item.id)).toEqual([
        "turn-8-assistant",
        "turn-9-user",
        "turn-9-assistant",
        "turn-10-user",
        "turn-10-assistant",
      ]);
      expect(result.originalItems).toBe(20);
      expect(result.compactedItems).toBe(6);
      expect(result.originalTokens).toBe(2000);
      expect(result.compactedTokens).toBe(500 + Math.floor(result.summary.length / 4));
      expect(result.compressionRatio).toBeCloseTo(result.compactedTokens / 2000);
      expect(result.metadata.itemsCompacted).toBe(15);
      expect(result.metadata.summarySource).toBe("generated");
      expect(result.metadata.compactedAt).toBe(FIXED_NOW.toISOString());
      expect(
        result.summary.startsWith(
          "## Compacted Session Summary\n\nDiscussed fifteen things.\n\n### Statistics\n- Items compacted: 15\n",
        ),
      ).toBe(true);
    });

    it("scores the given items in place", async () => {
      const items = makeConversation(1);
      await createCompactor().compactContext(items);

      // user one hour old: 0.3 * (23/24) + 0.4
      expect(items[0]?.importanceScore).toBeCloseTo(0.6875);
      // assistant reply at now: 0.3 + 0.4 * 0.8
      expect(items[1]?.importanceScore).toBeCloseTo(0.62);
    });

    it("sends a categorized prompt", async () => {
      await createCompactor().compactContext(makeConversation(10), { instructions: "focus on tests" });

      const prompt = generator.lastPrompt() ?? "";
      expect(prompt).toContain("### User Commands:\n- Question 1\n- Question 2\n- Question 3\n... and 5 more items");
      expect(prompt).toContain("### Assistant Responses:\n- Answer 1\n- Answer 2\n- Answer 3\n... and 4 more items");
      expect(prompt).toContain("- Special instructions: focus on tests");
      expect(generator.calls[0]?.maxOutputTokens).toBe(2048);
      expect(generator.calls[0]?.temperature).toBe(0.1);
    });

    it("records instructions in the metadata", async () => {
      const result = await createCompactor().compactContext(makeConversation(2), {
        instructions: "keep it short",
      });
      expect(result.metadata.instructions).toBe("keep it short");

      const plain = await createCompactor().compactContext(makeConversation(2));
      expect(plain.metadata.instructions).toBeNull();
    });

    it("uses the fallback summary when generation fails", async () => {
      generator.fails("500 Internal Server Error");
      const result = await createCompactor().compactContext(makeConversation(10));

      expect(result.summary).toBe(FALLBACK_15);
      expect(result.metadata.summarySource).toBe("fallback");
      expect(result.compactedItems).toBe(6);
    });

    it("uses the fallback summary without a generator", async () => {
      const compactor = new ContextCompactor({ logger, clock: fixedClock() });
      const result = await compactor.compactContext(makeConversation(10));

      expect(result.summary).toBe(FALLBACK_15);
    });

    it("falls back when the summary deadline passes", async () => {
      generator.hangs();
      const compactor = createCompactor({ config: { summaryTimeoutMs: 20 } });

      const result = await compactor.compactContext(makeConversation(10));

      expect(result.metadata.summarySource).toBe("fallback");
      expect(compactor.getStats().totalCompactions).toBe(1);
    });

    it("honors a per-call timeout", async () => {
      generator.hangs();
      const result = await createCompactor().compactContext(makeConversation(10), { timeoutMs: 20 });

      expect(result.metadata.summarySource).toBe("fallback");
    });

    it("skips generation when every item is preserved", async () => {
      const items = [
        makeItem({ content: "a", tokensEstimate: 1 }),
        makeItem({ content: "b", tokensEstimate: 1 }),
        makeItem({ content: "c", tokensEstimate: 1 }),
      ];
      const result = await createCompactor().compactContext(items);

      expect(generator.callCount).toBe(0);
      expect(result.summary).toBe("No items were compacted.");
      expect(result.metadata.summarySource).toBe("placeholder");
      expect(result.compactedItems).toBe(4);
      // 3 + floor(24 / 4)
      expect(result.compactedTokens).toBe(9);
      expect(result.compressionRatio).toBe(3);
    });

    it("always keeps pinned items", async () => {
      const pinned = makeItem({ kind: "system", content: "project rules", timestamp: hoursAgo(72), mustPreserve: true });
      const items = [pinned, ...makeConversation(10)];

      const result = await createCompactor().compactContext(items);

      expect(result.preservedItems[0]).toBe(pinned);
      expect(result.compactedItems).toBe(result.preservedItems.length + 1);
    });

    it("may leave the context over budget after one pass", async () => {
      const compactor = createCompactor({ config: { maxContextTokens: 100 } });
      const items = Array.from({ length: 20 }, () => makeItem({ tokensEstimate: 10, mustPreserve: true }));

      const result = await compactor.compactContext(items);

      expect(result.preservedItems).toHaveLength(20);
      expect(totalTokens(result.preservedItems)).toBe(200);
      expect(compactor.shouldCompact(result.preservedItems)).toBe(true);
    });

    it("preserves instruction-selected items", async () => {
      const failure = makeItem({
        kind: "system",
        content: "Build failed: exception in parser",
        timestamp: hoursAgo(30),
      });
      const items = [failure, ...makeConversation(10)];

      const withoutHint = await createCompactor().compactContext(items);
      const withHint = await createCompactor().compactContext(items, { instructions: "keep errors" });

      expect(withoutHint.preservedItems).not.toContain(failure);
      expect(withHint.preservedItems[0]).toBe(failure);
    });

    it("records results in history", async () => {
      const compactor = createCompactor();
      const first = await compactor.compactContext(makeConversation(10));
      const second = await compactor.compactContext(makeConversation(10));

      expect(compactor.getHistory()).toEqual([first, second]);
      const stats = compactor.getStats();
      expect(stats.totalCompactions).toBe(2);
      expect(stats.lastCompactionTime).toBe(FIXED_NOW.toISOString());
      expect(stats.totalTokensSaved).toBe(
        2 * (first.originalTokens - first.compactedTokens),
      );
    });

    it("returns frozen results", async () => {
      const result = await createCompactor().compactContext(makeConversation(3));

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.preservedItems)).toBe(true);
      expect(Object.isFrozen(result.metadata)).toBe(true);
    });

    it("notifies onCompaction and survives a throwing callback", async () => {
      const onCompaction = vi.fn<(result: CompactionResult) => void>(() => {
        throw new Error("store offline");
      });
      const compactor = createCompactor({ onCompaction });

      const result = await compactor.compactContext(makeConversation(3));

      expect(onCompaction).toHaveBeenCalledWith(result);
      expect(compactor.getStats().totalCompactions).toBe(1);
    });

    it("rejects and records nothing when aborted", async () => {
      generator.hangs();
      const compactor = createCompactor();
      const controller = new AbortController();

      const pending = compactor.compactContext(makeConversation(10), { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CompactionAbortedError);
      expect(compactor.getStats().totalCompactions).toBe(0);
      expect(compactor.getHistory()).toEqual([]);
    });

    it("rejects repeated ids", async () => {
      const first = makeItem({ id: "dup", content: "first" });
      const second = makeItem({ id: "dup", content: "second", mustPreserve: true });
      const compactor = createCompactor();

      await expect(compactor.compactContext([first, second])).rejects.toThrow(
        "Duplicate context item id: dup",
      );
      expect(compactor.getStats().totalCompactions).toBe(0);
    });

    it("keeps a long per-call timeout instead of overflowing it", async () => {
      generator.delays(20).returns("Slow but fine");
      const result = await createCompactor().compactContext(makeConversation(10), {
        timeoutMs: 3_000_000_000,
      });

      expect(result.metadata.summarySource).toBe("generated");
    });

    it("rejects non-array input", async () => {
      await expect(createCompactor().compactContext(JSON.parse("null"))).rejects.toBeInstanceOf(
        TypeError,
      );
    });

    it("uses the configured estimator for the summary", async () => {
      generator.returns("x");
      const compactor = createCompactor({ estimator: () => 7 });
      const items = makeConversation(10, { tokensPerItem: 1 });

      const result = await compactor.compactContext(items);

      expect(result.compactedTokens).toBe(5 + 7);
    });
  });

  describe("autoCompactIfNeeded", () => {
    const withScores = (scores: number[]) =>
      scores.map((score) => {
        const item = makeItem({ kind: "user", content: "status update", tokensEstimate: 1 });
        item.importanceScore = score;
        return item;
      });

    it("compacts whenever shouldCompact holds on the current scores", async () => {
      const compactor = createCompactor();
      const items = withScores([0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.9, 0.9]);
      expect(compactor.shouldCompact(items)).toBe(true);

      const result = await compactor.autoCompactIfNeeded(items);

      expect(result).not.toBeNull();
      expect(result?.originalItems).toBe(10);
      expect(generator.callCount).toBe(1);
    });

    it("returns null and leaves scores alone when shouldCompact is false", async () => {
      const compactor = createCompactor();
      const items = withScores([0.5, 0.5, 0.5, 0.5, 0.1]);
      expect(compactor.shouldCompact(items)).toBe(false);

      const result = await compactor.autoCompactIfNeeded(items);

      expect(result).toBeNull();
      expect(items.map((item) => item.importanceScore)).toEqual([0.5, 0.5, 0.5, 0.5, 0.1]);
      expect(generator.callCount).toBe(0);
    });

    it("re-scores before deciding when scoreFirst is set", async () => {
      const compactor = createCompactor();

      // Unscored items all count as low-importance
      expect(await compactor.autoCompactIfNeeded(makeConversation(2))).not.toBeNull();
      expect(await compactor.autoCompactIfNeeded(makeConversation(2), { scoreFirst: true })).toBeNull();
      expect(generator.callCount).toBe(0);
    });

    it("compacts a context of mostly stale items", async () => {
      const compactor = createCompactor();
      const items: ContextItem[] = Array.from({ length: 10 }, (_, index) =>
        makeItem({ kind: "system", content: `log line ${index}`, timestamp: hoursAgo(48 + index) }),
      );

      const result = await compactor.autoCompactIfNeeded(items);

      expect(result?.originalItems).toBe(10);
      expect(result?.metadata.itemsCompacted).toBe(5);
      expect(generator.callCount).toBe(1);
    });

    it("compacts when over the token budget", async () => {
      const compactor = createCompactor({ config: { maxContextTokens: 1000 } });
      const items = makeConversation(5, { tokensPerItem: 100 });

      const result = await compactor.autoCompactIfNeeded(items);

      expect(result?.originalTokens).toBe(1000);
    });
  });

  describe("configure", () => {
    it("merges weight updates", () => {
      const compactor = createCompactor();
      compactor.configure({ importanceWeights: { recency: 0.5 } });

      expect(compactor.getConfig().importanceWeights).toEqual({
        recency: 0.5,
        userInteraction: 0.4,
        codeRelevance: 0.2,
        errorInformation: 0.1,
      });
    });

    it("leaves the config unchanged on invalid input", () => {
      const compactor = createCompactor({ config: { preserveRecentCount: 4 } });

      expect(() => compactor.configure({ preserveRecentCount: -1 })).toThrow(ConfigurationError);
      expect(() => compactor.configure(JSON.parse('{"unknownOption": 1}'))).toThrow(ConfigurationError);
      expect(compactor.getConfig().preserveRecentCount).toBe(4);
    });

    it("rejects an invalid initial config", () => {
      expect(() => createCompactor({ config: { maxContextTokens: -5 } })).toThrow(ConfigurationError);
      expect(() => createCompactor({ config: { summaryTimeoutMs: 3_000_000_000 } })).toThrow(
        ConfigurationError,
      );
    });

    it("returns a copy from getConfig", () => {
      const compactor = createCompactor();
      compactor.getConfig().importanceWeights.recency = 0.9;

      expect(compactor.getConfig().importanceWeights.recency).toBe(0.3);
    });

    it("applies new settings to later compactions", async () => {
      const compactor = createCompactor();
      compactor.configure({ preserveRecentCount: 2 });

      const result = await compactor.compactContext(makeConversation(10));

      expect(result.preservedItems.map((item) => item.id)).toEqual(["turn-10-user", "turn-10-assistant"]);
      expect(result.metadata.preservationCriteria.preserveRecentCount).toBe(2);
    });

    it("records but does not act on targetCompressionRatio", async () => {
      const loose = createCompactor({ config: { targetCompressionRatio: 0.9 } });
      const tight = createCompactor({ config: { targetCompressionRatio: 0.1 } });

      const a = await loose.compactContext(makeConversation(10));
      const b = await tight.compactContext(makeConversation(10));

      expect(a.preservedItems.map((item) => item.id)).toEqual(b.preservedItems.map((item) => item.id));
      expect(a.metadata.preservationCriteria.targetCompressionRatio).toBe(0.9);
    });
  });

  describe("registerPreservationRule", () => {
    it("extends instruction handling", async () => {
      const compactor = createCompactor();
      compactor.registerPreservationRule({
        directive: "preserve-questions",
        detect: (text) => text.includes("questions"),
        select: (items) => items.filter((item) => item.kind === "user"),
      });

      const result = await compactor.compactContext(makeConversation(4), {
        instructions: "keep questions",
      });

      expect(result.preservedItems.map((item) => item.id)).toEqual([
        "turn-1-user",
        "turn-2-user",
        "turn-2-assistant",
        "turn-3-user",
        "turn-3-assistant",
        "turn-4-user",
        "turn-4-assistant",
      ]);
    });
  });
});
