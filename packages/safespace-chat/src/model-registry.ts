import { createGroq } from "@ai-sdk/groq";
import { createOpenAI } from "@ai-sdk/openai";

/** Options for configuring the model provider */
export interface GetChatModelOptions {
  /** Provider API key */
  apiKey?: string;
  /** Custom base URL for the provider */
  baseUrl?: string;
}

/**
 * Resolve an AI SDK model instance from a `provider:model` spec string.
 *
 * Supported providers: groq, openai. Only the first colon separates the
 * provider, so model ids may contain slashes ("groq:openai/gpt-oss-20b").
 *
 * @param spec - Model spec, e.g. "groq:openai/gpt-oss-20b"
 * @param options - Optional API key and base URL
 * @returns AI SDK LanguageModel instance
 */
export function getChatModel(spec: string, options?: GetChatModelOptions) {
  const provider = getProviderFromSpec(spec);
  const modelName = spec.slice(provider.length + 1);

  switch (provider) {
    case "groq": {
      const groq = createGroq({
        ...(options?.apiKey ? { apiKey: options.apiKey } : {}),
        ...(options?.baseUrl ? { baseURL: options.baseUrl } : {}),
      });
      return groq(modelName);
    }
    case "openai": {
      const openai = createOpenAI({
        ...(options?.apiKey ? { apiKey: options.apiKey } : {}),
        ...(options?.baseUrl ? { baseURL: options.baseUrl } : {}),
      });
      // Chat Completions keeps OpenAI-compatible base URLs working
      return openai.chat(modelName);
    }
    default:
      throw new Error(`Unsupported model provider: ${provider}`);
  }
}

/**
 * Extract the provider name from a model spec string.
 *
 * @param spec - Model spec, e.g. "groq:openai/gpt-oss-20b"
 * @returns Provider name, e.g. "groq"
 */
export function getProviderFromSpec(spec: string): string {
  const colonIdx = spec.indexOf(":");
  if (colonIdx === -1) {
    throw new Error(`Invalid model format: ${spec}. Expected "provider:model"`);
  }
  return spec.slice(0, colonIdx);
}
