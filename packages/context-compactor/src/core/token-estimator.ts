/**
 * Approximate characters per token for budget accounting.
 */
export const CHARS_PER_TOKEN = 4;

/**
 * Maps text to an approximate token count. Injectable for deterministic tests
 * or to plug in a real tokenizer.
 */
export type TokenEstimator = (text: string) => number;

/**
 * Character-based estimate: `floor(length / 4)`.
 */
export const estimateTokens: TokenEstimator = (text) => Math.floor(text.length / CHARS_PER_TOKEN);
