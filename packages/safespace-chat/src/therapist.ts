import { generateText, type LanguageModel } from "ai";
import { THERAPIST_SYSTEM_PROMPT } from "./prompts";

export const THERAPIST_UNCONFIGURED_MESSAGE = "The assistant is not fully configured (missing GROQ_API_KEY). Please try again after the server is configured.";

export const THERAPIST_FALLBACK_MESSAGE = "I'm having technical difficulties right now, but I want you to know your feelings matter. Please try again later.";

/** Output cap for a single therapist reply */
const THERAPIST_MAX_OUTPUT_TOKENS = 350;

export interface TherapistOptions {
  temperature: number;
  topP: number;
}

export interface Therapist {
  /** Produce a therapist-style reply. Never rejects. */
  respond(prompt: string): Promise<string>;
}

/**
 * Therapist persona backed by the same LLM provider as the agent,
 * with its own system prompt.
 */
export class LlmTherapist implements Therapist {
  constructor(
    private readonly model: LanguageModel | null,
    private readonly options: TherapistOptions,
  ) {}

  async respond(prompt: string): Promise<string> {
    if (!this.model) {
      return THERAPIST_UNCONFIGURED_MESSAGE;
    }

    try {
      const result = await generateText({
        model: this.model,
        system: THERAPIST_SYSTEM_PROMPT,
        prompt,
        temperature: this.options.temperature,
        topP: this.options.topP,
        maxOutputTokens: THERAPIST_MAX_OUTPUT_TOKENS,
      });
      return result.text.trim();
    } catch (error) {
      console.error("[therapist] Generation failed:", error);
      return THERAPIST_FALLBACK_MESSAGE;
    }
  }
}
