import { describe, it, expect } from "vitest";
import { getChatModel, getProviderFromSpec } from "../src/model-registry.js";

describe("getChatModel", () => {
  it("should throw on invalid spec without colon", () => {
    expect(() => getChatModel("invalid")).toThrow("Invalid model format");
  });

  it("should throw on unsupported provider", () => {
    expect(() => getChatModel("azure:gpt-4")).toThrow("Unsupported model provider: azure");
  });

  it("should resolve groq model ids containing a slash", () => {
    const model = getChatModel("groq:openai/gpt-oss-20b", { apiKey: "test-key" });
    expect(model.modelId).toBe("openai/gpt-oss-20b");
  });

  it("should resolve openai model", () => {
    const model = getChatModel("openai:gpt-4o-mini", { apiKey: "test-key" });
    expect(model.modelId).toBe("gpt-4o-mini");
  });

  it("should accept a custom base URL", () => {
    const model = getChatModel("groq:llama-3.1-8b-instant", {
      apiKey: "test-key",
      baseUrl: "https://llm-proxy.example.com/v1",
    });
    expect(model.modelId).toBe("llama-3.1-8b-instant");
  });
});

describe("getProviderFromSpec", () => {
  it("should extract groq from spec", () => {
    expect(getProviderFromSpec("groq:openai/gpt-oss-20b")).toBe("groq");
  });

  it("should throw on invalid spec without colon", () => {
    expect(() => getProviderFromSpec("nocolon")).toThrow("Invalid model format");
  });
});
