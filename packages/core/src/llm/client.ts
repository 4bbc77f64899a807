import type {
  LLMProvider,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionWithToolsOptions,
  LLMToolResponse,
  LLMConfig,
  LLMRetryOptions,
} from "./providers/types";
import { OpenAIProvider, DEFAULT_OPENAI_BASE_URL } from "./providers/openai";
import { AnthropicProvider } from "./providers/anthropic";
import { withRetry, type RetryOptions } from "./retry";
import { ConfigError } from "../config";

export function createLLMProvider(config: LLMConfig): LLMProvider {
  if (config.provider === "openai") {
    const baseUrl = config.openaiBaseUrl ?? DEFAULT_OPENAI_BASE_URL;
    // Self-hosted compatible servers (e.g. Ollama) need no key
    if (!config.openaiApiKey && baseUrl.startsWith(DEFAULT_OPENAI_BASE_URL)) {
      throw new ConfigError(
        "OPENAI_API_KEY environment variable is not set. Set it, or point OPENAI_BASE_URL at an OpenAI-compatible server."
      );
    }
    return new OpenAIProvider({
      apiKey: config.openaiApiKey,
      baseUrl,
      model: config.openaiModel,
    });
  }

  if (!config.anthropicApiKey) {
    throw new ConfigError("ANTHROPIC_API_KEY environment variable is required when using Anthropic provider");
  }
  return new AnthropicProvider({
    apiKey: config.anthropicApiKey,
    model: config.anthropicModel,
  });
}

function logRetry(error: unknown, attempt: number, delayMs: number): void {
  console.warn(
    `[LLM] Call failed, retrying (attempt ${attempt}, delay ${delayMs}ms):`,
    error instanceof Error ? error.message : error
  );
}

/**
 * Convert LLM retry options to internal retry options
 */
function toRetryOptions(
  retryConfig: LLMRetryOptions | false | undefined
): RetryOptions {
  if (retryConfig === false) {
    return { maxRetries: 0 };
  }
  if (!retryConfig) {
    return {
      maxRetries: 3,
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      onRetry: logRetry,
    };
  }
  return {
    ...retryConfig,
    onRetry: retryConfig.onRetry ?? logRetry,
  };
}

export async function complete(
  provider: LLMProvider,
  messages: LLMMessage[],
  options?: LLMCompletionOptions
): Promise<string> {
  return withRetry(
    () => provider.complete(messages, options),
    toRetryOptions(options?.retry)
  );
}

export async function completeWithTools(
  provider: LLMProvider,
  messages: LLMMessage[],
  options?: LLMCompletionWithToolsOptions
): Promise<LLMToolResponse> {
  return withRetry(
    () => provider.completeWithTools(messages, options),
    toRetryOptions(options?.retry)
  );
}
