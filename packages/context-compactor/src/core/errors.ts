/**
 * Error types and classifiers for the compaction engine.
 */

import type { ZodError } from "zod";

/**
 * One invalid field reported by validation.
 */
export interface ValidationIssue {
  /** Dotted path of the offending field, or "root" */
  path: string;
  message: string;
}

/**
 * Base class for errors raised by this package.
 */
export class CompactorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Input that failed schema validation.
 */
export class ValidationError extends CompactorError {
  readonly issues: ValidationIssue[];

  constructor(header: string, issues: ValidationIssue[]) {
    super(formatIssues(header, issues));
    this.issues = issues;
  }
}

/**
 * Rejected configuration. Raised synchronously by `configure()` and the
 * config resolver; the previous configuration stays in effect.
 */
export class ConfigurationError extends ValidationError {
  constructor(issues: ValidationIssue[]) {
    super("Invalid compaction configuration", issues);
  }
}

/**
 * A persisted result or item that does not match the serialized shape.
 */
export class SerializationError extends ValidationError {
  constructor(what: string, issues: ValidationIssue[]) {
    super(`Invalid serialized ${what}`, issues);
  }
}

/**
 * The caller cancelled a compaction while its summary was being generated.
 */
export class CompactionAbortedError extends CompactorError {
  constructor(options?: { cause?: unknown }) {
    super("Compaction aborted", options);
  }
}

/**
 * Summary generation exceeded its deadline.
 */
export class SummaryTimeoutError extends CompactorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Summary generation timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Converts zod issues into the flat shape carried by our errors.
 */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join(".") || "root",
    message: issue.message,
  }));
}

function formatIssues(header: string, issues: ValidationIssue[]): string {
  return [`${header}:`, ...issues.map((issue) => `  - ${issue.path}: ${issue.message}`)].join(
    "\n",
  );
}

/**
 * Detects abort/cancellation errors from fetch, provider SDKs and our own
 * `CompactionAbortedError`.
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error instanceof CompactionAbortedError) return true;
  if (error.name === "AbortError") return true;
  if (error.name === "APIUserAbortError") return true;

  const message = error.message.toLowerCase();
  return message.includes("abort") || message.includes("cancelled") || message.includes("canceled");
}

/**
 * Determines if a generation failure is worth retrying.
 *
 * Retryable: rate limits, quota exhaustion, 5xx, timeouts, connection errors.
 * Everything else (auth, bad request, content policy) fails immediately.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof SummaryTimeoutError) return true;

  const message = error.message.toLowerCase();

  if (message.includes("429") || message.includes("rate limit") || message.includes("rate_limit")) {
    return true;
  }

  if (
    message.includes("500") ||
    message.includes("502") ||
    message.includes("503") ||
    message.includes("504") ||
    message.includes("internal server error") ||
    message.includes("service unavailable")
  ) {
    return true;
  }

  if (message.includes("timeout") || message.includes("timed out") || message.includes("etimedout")) {
    return true;
  }

  if (
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("network") ||
    message.includes("connection")
  ) {
    return true;
  }

  // Gemini gRPC status codes
  return (
    message.includes("resource_exhausted") ||
    message.includes("quota exceeded") ||
    message.includes("unavailable") ||
    message.includes("deadline_exceeded")
  );
}
