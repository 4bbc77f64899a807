/**
 * Docs Search Tool
 *
 * Agent tool for searching the documentation of any GitHub repository.
 */

import { z } from "zod";
import type { Tool, ToolResult } from "../tools/types";
import type { ToolDefinition } from "../llm/providers/types";
import { formatArgumentErrors } from "../tools/registry";
import type { DocsSearchClient } from "./client";
import { DEFAULT_NUM_RESULTS } from "./text-index";

const SearchDocsArgsSchema = z.object({
  github_url: z.string().min(1, "github_url is required"),
  query: z.string().min(1, "query is required"),
  // Models send null, "" or numeric strings; fractions are floored by the index
  num_results: z.preprocess(
    (value) => (value === null || value === "" ? undefined : value),
    z.coerce.number().finite().optional()
  ),
});

const definition: ToolDefinition = {
  type: "function",
  function: {
    name: "search_docs",
    description: `Search documentation in any GitHub repository.

Downloads the repository (if not cached), indexes all markdown files (.md and .mdx),
and returns the most relevant files for the query with a preview of their content.`,
    parameters: {
      type: "object",
      properties: {
        github_url: {
          type: "string",
          description:
            "GitHub repository URL (e.g. 'https://github.com/owner/repo', 'https://github.com/owner/repo/tree/branch' or 'owner/repo')",
        },
        query: {
          type: "string",
          description: "The search query string.",
        },
        num_results: {
          type: "number",
          description: `Number of results to return (default: ${DEFAULT_NUM_RESULTS}).`,
        },
      },
      required: ["github_url", "query"],
    },
  },
};

export function createSearchDocsTool(client: DocsSearchClient): Tool {
  return {
    name: "search_docs",
    description: definition.function.description,
    definition,

    execute: async (args: Record<string, unknown>): Promise<ToolResult> => {
      const parsed = SearchDocsArgsSchema.safeParse(args);
      if (!parsed.success) {
        return { success: false, output: "", error: formatArgumentErrors(parsed.error) };
      }

      const { github_url, query, num_results = DEFAULT_NUM_RESULTS } = parsed.data;

      try {
        const results = await client.search(github_url, query, num_results);
        return {
          success: true,
          output: JSON.stringify(results, null, 2),
          metadata: { resultCount: results.length },
        };
      } catch (error) {
        return {
          success: false,
          output: "",
          error: `Documentation search failed: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },
  };
}
