import { DEFAULT_CHAT_CONFIG, DEFAULT_TWILIO_VOICE_URL, type ChatConfig, type TelephonyConfig } from "./types";
import { getChatModel, getProviderFromSpec } from "./model-registry";
import { ConfigurationError } from "./errors";

/** Environment variable holding the API key, per provider */
const API_KEY_VARIABLES = new Map<string, string>([
  ["groq", "GROQ_API_KEY"],
  ["openai", "OPENAI_API_KEY"],
]);

type Env = Record<string, string | undefined>;

/**
 * Resolve chat configuration from environment variables.
 *
 * Reads SAFESPACE_* model settings, the provider API key and the optional
 * TWILIO_* credentials. Blank values count as unset. Unparseable numbers, a
 * step limit below 1 and a negative or fractional history size fall back to
 * the defaults.
 *
 * @param env - Variables to read from (defaults to `process.env`)
 * @returns Resolved ChatConfig
 */
export function loadChatConfig(env: Env = process.env): ChatConfig {
  const get = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };
  const getNumber = (key: string, fallback: number): number => {
    const raw = get(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
  };
  // Out-of-range counts fall back too: a step limit below 1 never stops the agent
  const getCount = (key: string, fallback: number, min: number): number => {
    const parsed = getNumber(key, fallback);
    return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
  };

  const modelName = get("SAFESPACE_MODEL") ?? DEFAULT_CHAT_CONFIG.modelName;
  const keyVariable = modelName.includes(":") ? API_KEY_VARIABLES.get(getProviderFromSpec(modelName)) : undefined;

  const accountSid = get("TWILIO_ACCOUNT_SID");
  const authToken = get("TWILIO_AUTH_TOKEN");
  const fromNumber = get("TWILIO_FROM_NUMBER");
  const telephony: TelephonyConfig | undefined =
    accountSid && authToken && fromNumber ? { accountSid, authToken, fromNumber, voiceUrl: get("TWILIO_VOICE_URL") ?? DEFAULT_TWILIO_VOICE_URL } : undefined;

  return {
    modelName,
    apiKey: keyVariable ? get(keyVariable) : undefined,
    baseUrl: get("SAFESPACE_BASE_URL"),
    temperature: getNumber("SAFESPACE_TEMPERATURE", DEFAULT_CHAT_CONFIG.temperature),
    topP: getNumber("SAFESPACE_TOP_P", DEFAULT_CHAT_CONFIG.topP),
    maxSteps: getCount("SAFESPACE_MAX_STEPS", DEFAULT_CHAT_CONFIG.maxSteps, 1),
    historyMaxMessages: getCount("SAFESPACE_HISTORY_MAX_MESSAGES", DEFAULT_CHAT_CONFIG.historyMaxMessages, 0),
    agentName: DEFAULT_CHAT_CONFIG.agentName,
    telephony,
  };
}

/**
 * Build the configured language model.
 *
 * @throws ConfigurationError when the model spec is invalid or its API key is missing
 */
export function createConfiguredModel(config: ChatConfig) {
  let provider: string;
  try {
    provider = getProviderFromSpec(config.modelName);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  const variable = API_KEY_VARIABLES.get(provider);
  if (!variable) {
    throw new ConfigurationError(`Unsupported model provider: ${provider}`);
  }
  if (!config.apiKey) {
    throw new ConfigurationError(`Missing ${variable}. Set it in the environment and restart the server.`);
  }

  return getChatModel(config.modelName, { apiKey: config.apiKey, baseUrl: config.baseUrl });
}
