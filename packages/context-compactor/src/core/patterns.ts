/**
 * Fixed content detectors shared by the scorer, the selector and the summarizer.
 */

/**
 * Substrings that suggest source code or file references.
 * Matched against lower-cased content; each one counts at most once.
 */
export const CODE_INDICATORS: readonly string[] = [
  "def ",
  "class ",
  "import ",
  "from ",
  "function",
  ".py",
  ".js",
  ".ts",
  ".java",
  ".cpp",
  ".c",
];

/**
 * Content worth keeping: failures, urgency markers, declarations,
 * open work and credential-like tokens.
 */
export const IMPORTANT_PATTERNS: readonly RegExp[] = [
  /erro|error|exception|falha|failed/i,
  /importante|critical|urgent|aten[cç][aã]o/i,
  /def\s+\w+|class\s+\w+|function\s+\w+/i,
  /todo|fixme|hack|bug/i,
  /api[_\s]key|secret|password|token/i,
];

/** Keywords that mark an item as a code snippet when summarizing. */
export const CODE_SNIPPET_KEYWORDS: readonly string[] = ["def ", "class ", "function"];

/** Operations whose mention raises an item's importance. */
export const DESTRUCTIVE_KEYWORDS: readonly string[] = ["delete", "remove", "drop"];

export function countCodeIndicators(content: string): number {
  const lower = content.toLowerCase();
  return CODE_INDICATORS.filter((indicator) => lower.includes(indicator)).length;
}

export function countImportantPatterns(content: string): number {
  return IMPORTANT_PATTERNS.filter((pattern) => pattern.test(content)).length;
}

export function matchesImportantPattern(content: string): boolean {
  return IMPORTANT_PATTERNS.some((pattern) => pattern.test(content));
}

export function containsDestructiveKeyword(content: string): boolean {
  const lower = content.toLowerCase();
  return DESTRUCTIVE_KEYWORDS.some((keyword) => lower.includes(keyword));
}
