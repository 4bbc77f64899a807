import type { LLMMessage, LLMProvider, ToolCall } from "../llm/providers/types";
import { completeWithTools } from "../llm/client";
import type { ToolRegistry, ToolContext, ToolResult } from "../tools";

// Agent configuration
export interface AgentConfig {
  maxIterations: number;
  systemPrompt: string;
  temperature?: number;
}

// What the loop needs to talk to the model and run tools
export interface AgentDependencies {
  provider: LLMProvider;
  tools: ToolRegistry;
  context: ToolContext;
}

// Agent state - messages can be passed back in to continue a conversation
export interface AgentState {
  status: "running" | "completed" | "failed";
  messages: LLMMessage[];
  iterations: number;
  result?: string;
  error?: string;
  toolCallHistory: Array<{
    iteration: number;
    toolName: string;
    args: Record<string, unknown>;
    result: ToolResult;
    timestamp: string;
  }>;
}

// Events emitted during agent execution
export type AgentEvent =
  | { type: "iteration_start"; iteration: number }
  | { type: "tool_call"; toolName: string; args: Record<string, unknown> }
  | { type: "tool_result"; toolName: string; result: ToolResult }
  | { type: "completed"; result: string }
  | { type: "failed"; error: string };

export type AgentEventHandler = (event: AgentEvent) => void | Promise<void>;

// Parse tool call arguments from JSON string
export function parseToolArgs(argsString: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(argsString || "{}");
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    // If parsing fails, wrap the string in an object
  }
  return { raw: argsString };
}

// Tool output as the model sees it
export function formatToolOutput(result: ToolResult): string {
  return result.success ? result.output : `Error: ${result.error ?? "unknown error"}`;
}

async function executeTool(
  toolCall: ToolCall,
  args: Record<string, unknown>,
  deps: AgentDependencies
): Promise<ToolResult> {
  return deps.tools.execute(toolCall.function.name, args, deps.context);
}

/**
 * Run the tool-calling loop for one user message.
 *
 * `history` holds earlier messages of the same conversation (without the
 * system prompt); the returned state's messages can be passed back as the
 * next call's history.
 */
export async function runAgentLoop(
  input: string,
  config: AgentConfig,
  deps: AgentDependencies,
  history: LLMMessage[] = [],
  onEvent?: AgentEventHandler
): Promise<AgentState> {
  const state: AgentState = {
    status: "running",
    messages: [
      { role: "system", content: config.systemPrompt },
      ...history.filter((m) => m.role !== "system"),
      { role: "user", content: input },
    ],
    iterations: 0,
    toolCallHistory: [],
  };

  const emit = async (event: AgentEvent) => {
    if (onEvent) {
      await onEvent(event);
    }
  };

  const tools = deps.tools.getDefinitions();

  while (state.iterations < config.maxIterations && state.status === "running") {
    state.iterations++;
    await emit({ type: "iteration_start", iteration: state.iterations });

    try {
      const response = await completeWithTools(deps.provider, state.messages, {
        tools,
        tool_choice: "auto",
        temperature: config.temperature ?? 0.2,
        maxTokens: 4096,
      });

      if (!response.tool_calls || response.tool_calls.length === 0) {
        state.status = "completed";
        state.result = response.content ?? "";
        state.messages.push({ role: "assistant", content: state.result });
        await emit({ type: "completed", result: state.result });
        return state;
      }

      state.messages.push({
        role: "assistant",
        content: response.content || "",
        tool_calls: response.tool_calls,
      });

      for (const toolCall of response.tool_calls) {
        const args = parseToolArgs(toolCall.function.arguments);
        await emit({ type: "tool_call", toolName: toolCall.function.name, args });

        const result = await executeTool(toolCall, args, deps);
        await emit({ type: "tool_result", toolName: toolCall.function.name, result });

        state.toolCallHistory.push({
          iteration: state.iterations,
          toolName: toolCall.function.name,
          args,
          result,
          timestamp: new Date().toISOString(),
        });

        state.messages.push({
          role: "tool",
          content: formatToolOutput(result),
          tool_call_id: toolCall.id,
        });
      }
    } catch (error) {
      state.status = "failed";
      state.error = error instanceof Error ? error.message : String(error);
      await emit({ type: "failed", error: state.error });
      return state;
    }
  }

  if (state.status === "running") {
    state.status = "failed";
    state.error = `Reached maximum iterations (${config.maxIterations}) without a final answer`;
    await emit({ type: "failed", error: state.error });
  }

  return state;
}
