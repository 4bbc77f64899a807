// Export types
export * from "./types";

// Export registry
export * from "./registry";

import { ToolRegistry } from "./registry";
import { createSearchDocsTool } from "../rag/tool";
import type { DocsSearchClient } from "../rag/client";
import { createFetchPageTool, createCountWordTool, type PageFetchOptions } from "./web-page";

export interface ToolDependencies {
  docsClient: DocsSearchClient;
  page?: PageFetchOptions;
}

// Build the tool table once at startup
export function createToolRegistry(deps: ToolDependencies): ToolRegistry {
  return new ToolRegistry([
    createFetchPageTool(deps.page), // fetch a web page as markdown
    createCountWordTool(deps.page), // count a word on a web page
    createSearchDocsTool(deps.docsClient), // search any repository's docs
  ]);
}

// Re-export individual tools for direct access
export {
  createFetchPageTool,
  createCountWordTool,
  fetchPage,
  countWordOnPage,
  countOccurrences,
  PageFetchError,
  DEFAULT_READER_URL,
  type PageFetchOptions,
} from "./web-page";
