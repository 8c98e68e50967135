/**
 * Instruction-driven preservation rules.
 *
 * Free-text compaction instructions ("keep the recent errors") are matched
 * against a table of directives. Each directive pairs a detector over the
 * lower-cased instructions with a selector over the scored items.
 *
 * @example
 * ```typescript
 * const rules = createDefaultPreservationRules();
 * rules.register({
 *   directive: "preserve-commands",
 *   detect: (text) => text.includes("command"),
 *   select: (items) => items.filter((item) => item.kind === "command"),
 * });
 * ```
 */

import { matchesImportantPattern } from "../core/patterns.js";
import type { ContextItem } from "../core/types.js";

/** Items kept by the `preserve-recent` directive. */
export const INSTRUCTED_RECENT_COUNT = 10;

/**
 * One entry of the rule table.
 */
export interface PreservationRule {
  /** Unique tag, e.g. "preserve-code" */
  readonly directive: string;
  /** Receives the lower-cased instructions */
  detect(instructions: string): boolean;
  select(items: readonly ContextItem[]): ContextItem[];
}

/**
 * Returns the `count` most recent items; ties keep their sequence order.
 */
export function mostRecent(items: readonly ContextItem[], count: number): ContextItem[] {
  return [...items]
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .slice(0, count);
}

const mentions =
  (...keywords: string[]) =>
  (instructions: string): boolean =>
    keywords.some((keyword) => instructions.includes(keyword));

export const PRESERVE_CODE: PreservationRule = {
  directive: "preserve-code",
  detect: mentions("code", "código"),
  select: (items) =>
    items.filter(
      (item) => item.kind === "file" || item.kind === "command" || item.content.includes("def "),
    ),
};

export const PRESERVE_ERRORS: PreservationRule = {
  directive: "preserve-errors",
  detect: mentions("error", "erro"),
  select: (items) => items.filter((item) => matchesImportantPattern(item.content)),
};

export const PRESERVE_RECENT: PreservationRule = {
  directive: "preserve-recent",
  detect: mentions("recent", "recente"),
  select: (items) => mostRecent(items, INSTRUCTED_RECENT_COUNT),
};

/**
 * Ordered, extensible table of preservation rules.
 */
export class PreservationRuleTable {
  private readonly rules = new Map<string, PreservationRule>();

  constructor(rules: readonly PreservationRule[] = []) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  /**
   * Adds a rule, replacing any rule with the same directive.
   */
  register(rule: PreservationRule): void {
    this.rules.set(rule.directive, rule);
  }

  unregister(directive: string): boolean {
    return this.rules.delete(directive);
  }

  directives(): string[] {
    return [...this.rules.keys()];
  }

  /**
   * Directives triggered by the given instructions, in table order.
   */
  match(instructions: string | undefined): PreservationRule[] {
    if (!instructions) return [];
    const lower = instructions.toLowerCase();
    return [...this.rules.values()].filter((rule) => rule.detect(lower));
  }

  /**
   * Items selected by every triggered directive, concatenated (may repeat).
   */
  apply(items: readonly ContextItem[], instructions: string | undefined): ContextItem[] {
    return this.match(instructions).flatMap((rule) => rule.select(items));
  }
}

export function createDefaultPreservationRules(): PreservationRuleTable {
  return new PreservationRuleTable([PRESERVE_CODE, PRESERVE_ERRORS, PRESERVE_RECENT]);
}
