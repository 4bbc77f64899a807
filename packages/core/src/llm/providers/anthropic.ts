import type {
  LLMProvider,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionWithToolsOptions,
  LLMToolResponse,
  ToolCall,
  ToolDefinition,
} from "./types";

export const ANTHROPIC_API_URL = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_VERSION = "2023-06-01";

export interface AnthropicConfig {
  apiKey: string;
  model?: string;
  /** Messages endpoint, overridable for proxies */
  apiUrl?: string;
}

type AnthropicContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicContentBlock[];
}

interface AnthropicResponse {
  content: AnthropicContentBlock[];
  stop_reason: "end_turn" | "tool_use" | "max_tokens" | "stop_sequence";
}

function parseToolInput(argumentsJson: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(argumentsJson);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    // fall through to the raw wrapper
  }
  return { raw: argumentsJson };
}

/**
 * Convert chat messages to the Messages API shape. The system prompt travels
 * separately; consecutive tool results are grouped into one user turn.
 */
export function toAnthropicMessages(messages: LLMMessage[]): {
  system?: string;
  messages: AnthropicMessage[];
} {
  const system = messages.find((m) => m.role === "system")?.content;
  const result: AnthropicMessage[] = [];

  for (const msg of messages) {
    if (msg.role === "system") continue;

    if (msg.role === "tool") {
      const block: AnthropicContentBlock = {
        type: "tool_result",
        tool_use_id: msg.tool_call_id ?? "",
        content: msg.content,
      };
      const last = result[result.length - 1];
      if (last && last.role === "user" && Array.isArray(last.content)) {
        last.content.push(block);
      } else {
        result.push({ role: "user", content: [block] });
      }
      continue;
    }

    if (msg.role === "assistant" && msg.tool_calls?.length) {
      const blocks: AnthropicContentBlock[] = msg.content ? [{ type: "text", text: msg.content }] : [];
      for (const tc of msg.tool_calls) {
        blocks.push({
          type: "tool_use",
          id: tc.id,
          name: tc.function.name,
          input: parseToolInput(tc.function.arguments),
        });
      }
      result.push({ role: "assistant", content: blocks });
      continue;
    }

    result.push({ role: msg.role, content: msg.content });
  }

  return { system: system || undefined, messages: result };
}

function toAnthropicTools(tools: ToolDefinition[]) {
  return tools.map((tool) => ({
    name: tool.function.name,
    description: tool.function.description,
    input_schema: tool.function.parameters,
  }));
}

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  private apiKey: string;
  private model: string;
  private apiUrl: string;

  constructor(config: AnthropicConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || "claude-sonnet-4-20250514";
    this.apiUrl = config.apiUrl || ANTHROPIC_API_URL;
  }

  private async post(body: Record<string, unknown>): Promise<AnthropicResponse> {
    const response = await fetch(this.apiUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Anthropic API error: ${response.status} - ${errorText}`);
    }

    return (await response.json()) as AnthropicResponse;
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<string> {
    const response = await this.completeWithTools(messages, options);
    return response.content ?? "";
  }

  async completeWithTools(
    messages: LLMMessage[],
    options?: LLMCompletionWithToolsOptions
  ): Promise<LLMToolResponse> {
    const { system, messages: anthropicMessages } = toAnthropicMessages(messages);

    const requestBody: Record<string, unknown> = {
      model: this.model,
      max_tokens: options?.maxTokens ?? 4096,
      messages: anthropicMessages,
    };
    if (system) {
      requestBody.system = system;
    }
    if (options?.temperature !== undefined) {
      requestBody.temperature = options.temperature;
    }
    if (options?.tools && options.tools.length > 0 && options.tool_choice !== "none") {
      requestBody.tools = toAnthropicTools(options.tools);
    }

    const data = await this.post(requestBody);

    const toolCalls: ToolCall[] = [];
    let text = "";
    for (const block of data.content) {
      if (block.type === "text") {
        text += block.text;
      } else if (block.type === "tool_use") {
        toolCalls.push({
          id: block.id,
          type: "function",
          function: { name: block.name, arguments: JSON.stringify(block.input) },
        });
      }
    }

    let finishReason: LLMToolResponse["finish_reason"] = "stop";
    if (data.stop_reason === "tool_use") {
      finishReason = "tool_calls";
    } else if (data.stop_reason === "max_tokens") {
      finishReason = "length";
    }

    return {
      content: text || undefined,
      tool_calls: toolCalls.length > 0 ? toolCalls : undefined,
      finish_reason: finishReason,
    };
  }
}
