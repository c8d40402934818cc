import { describe, it, expect } from "vitest";
import { loadChatConfig, createConfiguredModel } from "../src/chat-config.js";
import { DEFAULT_CHAT_CONFIG } from "../src/types.js";
import { ConfigurationError } from "../src/errors.js";

describe("loadChatConfig", () => {
  it("should use defaults for an empty environment", () => {
    const config = loadChatConfig({});

    expect(config).toEqual({
      ...DEFAULT_CHAT_CONFIG,
      apiKey: undefined,
      baseUrl: undefined,
      telephony: undefined,
    });
  });

  it("should read the groq key and model settings", () => {
    const config = loadChatConfig({
      GROQ_API_KEY: "test-groq-key",
      SAFESPACE_TEMPERATURE: "0.2",
      SAFESPACE_TOP_P: "0.5",
      SAFESPACE_MAX_STEPS: "3",
      SAFESPACE_HISTORY_MAX_MESSAGES: "8",
      SAFESPACE_BASE_URL: "https://llm-proxy.example.com/v1",
    });

    expect(config.apiKey).toBe("test-groq-key");
    expect(config.temperature).toBe(0.2);
    expect(config.topP).toBe(0.5);
    expect(config.maxSteps).toBe(3);
    expect(config.historyMaxMessages).toBe(8);
    expect(config.baseUrl).toBe("https://llm-proxy.example.com/v1");
  });

  it("should pick the API key matching the model's provider", () => {
    const config = loadChatConfig({
      SAFESPACE_MODEL: "openai:gpt-4o-mini",
      GROQ_API_KEY: "test-groq-key",
      OPENAI_API_KEY: "test-openai-key",
    });

    expect(config.modelName).toBe("openai:gpt-4o-mini");
    expect(config.apiKey).toBe("test-openai-key");
  });

  it("should fall back to defaults for unparseable numbers", () => {
    const config = loadChatConfig({ SAFESPACE_TEMPERATURE: "warm", SAFESPACE_MAX_STEPS: "many" });

    expect(config.temperature).toBe(0.7);
    expect(config.maxSteps).toBe(5);
  });

  it("should reject a step limit below one", () => {
    expect(loadChatConfig({ SAFESPACE_MAX_STEPS: "0" }).maxSteps).toBe(5);
    expect(loadChatConfig({ SAFESPACE_MAX_STEPS: "-3" }).maxSteps).toBe(5);
    expect(loadChatConfig({ SAFESPACE_MAX_STEPS: "2.5" }).maxSteps).toBe(5);
    expect(loadChatConfig({ SAFESPACE_MAX_STEPS: "1" }).maxSteps).toBe(1);
  });

  it("should accept a zero history size but not a negative one", () => {
    expect(loadChatConfig({ SAFESPACE_HISTORY_MAX_MESSAGES: "0" }).historyMaxMessages).toBe(0);
    expect(loadChatConfig({ SAFESPACE_HISTORY_MAX_MESSAGES: "-1" }).historyMaxMessages).toBe(20);
    expect(loadChatConfig({ SAFESPACE_HISTORY_MAX_MESSAGES: "4.5" }).historyMaxMessages).toBe(20);
  });

  it("should treat blank values as unset", () => {
    const config = loadChatConfig({ GROQ_API_KEY: "   ", TWILIO_ACCOUNT_SID: "" });

    expect(config.apiKey).toBeUndefined();
    expect(config.telephony).toBeUndefined();
  });

  it("should enable telephony only when all three credentials are present", () => {
    const partial = loadChatConfig({ TWILIO_ACCOUNT_SID: "AC-test", TWILIO_AUTH_TOKEN: "test-token" });
    expect(partial.telephony).toBeUndefined();

    const full = loadChatConfig({ TWILIO_ACCOUNT_SID: "AC-test", TWILIO_AUTH_TOKEN: "test-token", TWILIO_FROM_NUMBER: "+15550009999" });
    expect(full.telephony).toEqual({
      accountSid: "AC-test",
      authToken: "test-token",
      fromNumber: "+15550009999",
      voiceUrl: "http://demo.twilio.com/docs/voice.xml",
    });
  });

  it("should read a custom TwiML URL", () => {
    const config = loadChatConfig({
      TWILIO_ACCOUNT_SID: "AC-test",
      TWILIO_AUTH_TOKEN: "test-token",
      TWILIO_FROM_NUMBER: "+15550009999",
      TWILIO_VOICE_URL: "https://example.com/twiml.xml",
    });
    expect(config.telephony?.voiceUrl).toBe("https://example.com/twiml.xml");
  });
});

describe("createConfiguredModel", () => {
  it("should refuse to build a model without GROQ_API_KEY", () => {
    const config = loadChatConfig({});

    expect(() => createConfiguredModel(config)).toThrow(ConfigurationError);
    expect(() => createConfiguredModel(config)).toThrow("Missing GROQ_API_KEY. Set it in the environment and restart the server.");
  });

  it("should report an invalid model spec as a configuration error", () => {
    const config = loadChatConfig({ SAFESPACE_MODEL: "nocolon", GROQ_API_KEY: "test-groq-key" });
    expect(() => createConfiguredModel(config)).toThrow(ConfigurationError);
  });

  it("should report an unsupported provider as a configuration error", () => {
    const config = loadChatConfig({ SAFESPACE_MODEL: "azure:gpt-4", GROQ_API_KEY: "test-groq-key" });
    expect(() => createConfiguredModel(config)).toThrow("Unsupported model provider: azure");
  });

  it("should build the default groq model when the key is set", () => {
    const model = createConfiguredModel(loadChatConfig({ GROQ_API_KEY: "test-groq-key" }));
    expect(model.modelId).toBe("openai/gpt-oss-20b");
  });
});
