import type { ToolDefinition } from "../llm/providers/types";

// Result of tool execution
export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

// Context passed to tool execution
export interface ToolContext {
  /** Identifies the chat session or MCP connection issuing the call */
  sessionId: string;
}

// Tool implementation interface
export interface Tool {
  name: string;
  description: string;
  definition: ToolDefinition;
  execute(
    args: Record<string, unknown>,
    context: ToolContext
  ): Promise<ToolResult>;
}
