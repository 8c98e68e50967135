import { type GenerateContentParameters, GoogleGenAI } from "@google/genai";
import type { GenerationRequest, GenerationService } from "./service.js";

export const DEFAULT_GEMINI_SUMMARY_MODEL = "gemini-2.5-flash";

/**
 * The slice of the `@google/genai` client this adapter calls.
 * Accepting the structural type lets tests pass an in-process stand-in.
 */
export interface GeminiModelsClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<GeminiTextResponse>;
  };
}

export interface GeminiTextResponse {
  readonly text?: string;
  readonly candidates?: ReadonlyArray<{ readonly finishReason?: string }>;
}

/**
 * Summarization backed by Gemini's `generateContent`.
 */
export class GeminiGenerationService implements GenerationService {
  constructor(
    private readonly client: GeminiModelsClient,
    private readonly model: string = DEFAULT_GEMINI_SUMMARY_MODEL,
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: [{ role: "user", parts: [{ text: request.prompt }] }],
      config: {
        maxOutputTokens: request.maxOutputTokens,
        temperature: request.temperature,
        // Gemini SDK uses abortSignal in the config object
        ...(request.signal ? { abortSignal: request.signal } : {}),
      },
    });

    const text = response.text;
    if (typeof text !== "string") {
      const reason = response.candidates?.[0]?.finishReason ?? "no text";
      throw new Error(`Gemini returned no summary text (${reason})`);
    }
    return text;
  }
}

/**
 * Builds a Gemini-backed service from `GEMINI_API_KEY`, or returns null when unset.
 */
export function createGeminiGenerationServiceFromEnv(
  model: string = process.env.COMPACTOR_SUMMARY_MODEL?.trim() || DEFAULT_GEMINI_SUMMARY_MODEL,
): GeminiGenerationService | null {
  const apiKey = process.env.GEMINI_API_KEY?.trim();
  if (!apiKey) {
    return null;
  }
  return new GeminiGenerationService(new GoogleGenAI({ apiKey }), model);
}
