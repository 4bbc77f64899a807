import type { ToolDefinition } from "../../llm/providers/types";

/**
 * System prompt for the documentation assistant, listing the tools it can call
 */
export function buildDocsAssistantPrompt(tools: ToolDefinition[]): string {
  const toolLines = tools.map((tool, i) => {
    const params = Object.keys(tool.function.parameters.properties).join(", ");
    const summary = tool.function.description.split("\n")[0];
    return `${i + 1}. ${tool.function.name}(${params}): ${summary}`;
  });

  return `You are a helpful AI assistant with access to the following tools:

${toolLines.join("\n")}

Use these tools when needed to answer user questions. When asked about a library or project, search its GitHub documentation with search_docs and cite the filenames you used. Be concise and helpful.`;
}
