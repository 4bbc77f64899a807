import { describe, it, expect } from "vitest";
import { loadConfig, ConfigError } from "../config";
import { DEFAULT_CACHE_DIR } from "../docs/archive-fetcher";
import { createLLMProvider } from "../llm/client";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      llm: {
        provider: "openai",
        openaiApiKey: undefined,
        openaiBaseUrl: "https://api.openai.com/v1",
        openaiModel: "gpt-4o-mini",
        anthropicApiKey: undefined,
        anthropicModel: undefined,
      },
      docs: { host: "https://github.com", cacheDir: DEFAULT_CACHE_DIR },
      page: { readerUrl: "https://r.jina.ai" },
      agent: { maxIterations: 10 },
    });
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      LLM_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "test-secret",
      GITHUB_HOST: "https://git.example.com",
      DOCS_CACHE_DIR: "/tmp/repodocs",
      AGENT_MAX_ITERATIONS: "4",
    });

    expect(config.llm.provider).toBe("anthropic");
    expect(config.llm.anthropicApiKey).toBe("test-secret");
    expect(config.docs).toEqual({ host: "https://git.example.com", cacheDir: "/tmp/repodocs" });
    expect(config.agent.maxIterations).toBe(4);
  });

  it("treats blank keys as unset", () => {
    expect(loadConfig({ OPENAI_API_KEY: "  " }).llm.openaiApiKey).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ LLM_PROVIDER: "bedrock" })).toThrow(ConfigError);
    expect(() => loadConfig({ AGENT_MAX_ITERATIONS: "0" })).toThrow(/AGENT_MAX_ITERATIONS/);
  });
});

describe("createLLMProvider", () => {
  it("requires an OpenAI key for the hosted API", () => {
    expect(() => createLLMProvider(loadConfig({}).llm)).toThrow(ConfigError);
  });

  it("allows a keyless OpenAI-compatible server", () => {
    const provider = createLLMProvider(
      loadConfig({ OPENAI_BASE_URL: "http://localhost:11434/v1", OPENAI_MODEL: "llama3.1" }).llm
    );
    expect(provider.name).toBe("openai");
  });

  it("requires an Anthropic key", () => {
    expect(() => createLLMProvider({ provider: "anthropic" })).toThrow(
      "ANTHROPIC_API_KEY environment variable is required when using Anthropic provider"
    );
  });

  it("creates the Anthropic provider", () => {
    const provider = createLLMProvider({ provider: "anthropic", anthropicApiKey: "test-secret" });
    expect(provider.name).toBe("anthropic");
  });
});
