import type { ZodError } from "zod";
import type { ToolDefinition } from "../llm/providers/types";
import type { Tool, ToolResult, ToolContext } from "./types";

// Static table of tools exposed to the LLM and the MCP server
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  constructor(tools: Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  getDefinitions(): ToolDefinition[] {
    return this.getAll().map((tool) => tool.definition);
  }

  async execute(
    name: string,
    args: Record<string, unknown>,
    context: ToolContext
  ): Promise<ToolResult> {
    const tool = this.get(name);
    if (!tool) {
      return {
        success: false,
        output: "",
        error: `Unknown tool: ${name}`,
      };
    }

    console.log(`[ToolRegistry] ${context.sessionId}: ${name}(${JSON.stringify(args)})`);

    try {
      return await tool.execute(args, context);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      return {
        success: false,
        output: "",
        error: `Tool execution failed: ${errorMessage}`,
      };
    }
  }
}

// Format zod validation issues as a single line for the model
export function formatArgumentErrors(error: ZodError): string {
  const issues = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  return `Invalid arguments: ${issues.join("; ")}`;
}
