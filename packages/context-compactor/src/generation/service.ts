/**
 * Contract of the text generation collaborator used for summaries.
 */

export interface GenerationRequest {
  prompt: string;
  maxOutputTokens: number;
  temperature: number;
  /** Aborted on timeout or caller cancellation */
  signal?: AbortSignal;
}

/**
 * Produces text for a prompt. A rejected promise is a soft failure: the
 * summarizer falls back to a deterministic summary.
 *
 * @example
 * ```typescript
 * const echo: GenerationService = {
 *   generate: async ({ prompt }) => prompt.slice(0, 100),
 * };
 * ```
 */
export interface GenerationService {
  generate(request: GenerationRequest): Promise<string>;
}
