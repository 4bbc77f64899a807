import type {
  LLMProvider,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionWithToolsOptions,
  LLMToolResponse,
  ToolCall,
} from "./types";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

export interface OpenAIConfig {
  /** Base URL of an OpenAI-compatible API, e.g. http://localhost:11434/v1 for Ollama */
  baseUrl?: string;
  apiKey?: string;
  model?: string;
}

interface ChatCompletionResponse {
  choices: Array<{
    message: {
      content?: string | null;
      tool_calls?: Array<{
        id: string;
        type: "function";
        function: {
          name: string;
          arguments: string;
        };
      }>;
    };
    finish_reason: string;
  }>;
}

export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";
  private baseUrl: string;
  private apiKey?: string;
  private model: string;

  constructor(config: OpenAIConfig = {}) {
    this.baseUrl = (config.baseUrl || DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model || "gpt-4o-mini";
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  private async post(body: Record<string, unknown>): Promise<ChatCompletionResponse> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${errorText}`);
    }

    return (await response.json()) as ChatCompletionResponse;
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<string> {
    const data = await this.post({
      model: this.model,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      temperature: options?.temperature ?? 0.7,
      max_tokens: options?.maxTokens ?? 2048,
      stream: false,
    });

    return data.choices[0]?.message?.content || "";
  }

  async completeWithTools(
    messages: LLMMessage[],
    options?: LLMCompletionWithToolsOptions
  ): Promise<LLMToolResponse> {
    // Tool results and tool-calling assistant turns keep their ids
    const formattedMessages = messages.map((m) => {
      if (m.role === "tool") {
        return {
          role: "tool" as const,
          content: m.content,
          tool_call_id: m.tool_call_id,
        };
      }
      if (m.role === "assistant" && m.tool_calls) {
        return {
          role: "assistant" as const,
          content: m.content || null,
          tool_calls: m.tool_calls,
        };
      }
      return {
        role: m.role,
        content: m.content,
      };
    });

    const requestBody: Record<string, unknown> = {
      model: this.model,
      messages: formattedMessages,
      temperature: options?.temperature ?? 0.7,
      max_tokens: options?.maxTokens ?? 4096,
      stream: false,
    };

    if (options?.tools && options.tools.length > 0) {
      requestBody.tools = options.tools;
      requestBody.tool_choice = options?.tool_choice ?? "auto";
    }

    const data = await this.post(requestBody);

    const choice = data.choices[0];
    const toolCalls: ToolCall[] | undefined = choice?.message?.tool_calls?.map(
      (tc) => ({
        id: tc.id,
        type: "function" as const,
        function: {
          name: tc.function.name,
          arguments: tc.function.arguments,
        },
      })
    );

    let finishReason: "stop" | "tool_calls" | "length" = "stop";
    if (choice?.finish_reason === "tool_calls" || toolCalls?.length) {
      finishReason = "tool_calls";
    } else if (choice?.finish_reason === "length") {
      finishReason = "length";
    }

    return {
      content: choice?.message?.content || undefined,
      tool_calls: toolCalls?.length ? toolCalls : undefined,
      finish_reason: finishReason,
    };
  }
}
