// Configuration
export { loadConfig, ConfigError, EnvSchema, type AppConfig, type Env } from "./config";

// Repository docs: reference resolution, archive download, extraction
export * from "./docs";

// Text index, index registry and search client
export * from "./rag";

// LLM
export * from "./llm/providers/types";
export { createLLMProvider, complete, completeWithTools } from "./llm/client";
export { OpenAIProvider, DEFAULT_OPENAI_BASE_URL, type OpenAIConfig } from "./llm/providers/openai";
export { AnthropicProvider, ANTHROPIC_API_URL, type AnthropicConfig } from "./llm/providers/anthropic";
export { withRetry, isRetryableError, RetryableError, type RetryOptions } from "./llm/retry";

// Tools
export * from "./tools";

// Agent
export {
  runAgentLoop,
  parseToolArgs,
  formatToolOutput,
  type AgentConfig,
  type AgentDependencies,
  type AgentState,
  type AgentEvent,
  type AgentEventHandler,
} from "./agent/loop";
export { buildDocsAssistantPrompt } from "./agent/prompts/docs-assistant";
