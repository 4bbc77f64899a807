import { z } from "zod";
import type { Tool, ToolResult } from "./types";
import type { ToolDefinition } from "../llm/providers/types";
import { formatArgumentErrors } from "./registry";

export const DEFAULT_READER_URL = "https://r.jina.ai";

export class PageFetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "PageFetchError";
  }
}

export interface PageFetchOptions {
  /** Reader service that converts pages to markdown */
  readerUrl?: string;
  fetch?: typeof fetch;
}

/**
 * Download the content of a web page as markdown through the reader service
 */
export async function fetchPage(url: string, options: PageFetchOptions = {}): Promise<string> {
  const readerUrl = (options.readerUrl ?? DEFAULT_READER_URL).replace(/\/+$/, "");
  const fetchImpl = options.fetch ?? fetch;
  const target = `${readerUrl}/${url}`;

  const response = await fetchImpl(target);
  if (!response.ok) {
    const errorText = await response.text();
    throw new PageFetchError(
      `Page fetch failed: ${response.status} - ${errorText.slice(0, 200)}`,
      url,
      response.status
    );
  }

  return response.text();
}

/**
 * Count case-insensitive, non-overlapping occurrences of `word` in `text`
 */
export function countOccurrences(text: string, word: string): number {
  const needle = word.toLowerCase();
  if (!needle) return 0;

  const haystack = text.toLowerCase();
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export async function countWordOnPage(
  url: string,
  word: string,
  options: PageFetchOptions = {}
): Promise<number> {
  const content = await fetchPage(url, options);
  return countOccurrences(content, word);
}

// ============================================================================
// Fetch Page Tool
// ============================================================================

const FetchPageArgsSchema = z.object({
  url: z.string().url(),
});

const fetchPageDefinition: ToolDefinition = {
  type: "function",
  function: {
    name: "fetch_page",
    description:
      "Fetch the content of a web page in markdown format. Use this to read articles, documentation pages or READMEs by URL.",
    parameters: {
      type: "object",
      properties: {
        url: {
          type: "string",
          description: "The URL of the web page to fetch.",
        },
      },
      required: ["url"],
    },
  },
};

export function createFetchPageTool(options: PageFetchOptions = {}): Tool {
  return {
    name: "fetch_page",
    description: fetchPageDefinition.function.description,
    definition: fetchPageDefinition,

    execute: async (args: Record<string, unknown>): Promise<ToolResult> => {
      const parsed = FetchPageArgsSchema.safeParse(args);
      if (!parsed.success) {
        return { success: false, output: "", error: formatArgumentErrors(parsed.error) };
      }

      try {
        const content = await fetchPage(parsed.data.url, options);
        return { success: true, output: content, metadata: { length: content.length } };
      } catch (error) {
        return {
          success: false,
          output: "",
          error: error instanceof Error ? error.message : String(error),
        };
      }
    },
  };
}

// ============================================================================
// Count Word Tool
// ============================================================================

const CountWordArgsSchema = z.object({
  url: z.string().url(),
  word: z.string().min(1, "word is required"),
});

const countWordDefinition: ToolDefinition = {
  type: "function",
  function: {
    name: "count_word",
    description:
      "Count how many times a specific word appears on a web page (case-insensitive).",
    parameters: {
      type: "object",
      properties: {
        url: {
          type: "string",
          description: "The URL of the web page to analyze.",
        },
        word: {
          type: "string",
          description: "The word to count (case-insensitive).",
        },
      },
      required: ["url", "word"],
    },
  },
};

export function createCountWordTool(options: PageFetchOptions = {}): Tool {
  return {
    name: "count_word",
    description: countWordDefinition.function.description,
    definition: countWordDefinition,

    execute: async (args: Record<string, unknown>): Promise<ToolResult> => {
      const parsed = CountWordArgsSchema.safeParse(args);
      if (!parsed.success) {
        return { success: false, output: "", error: formatArgumentErrors(parsed.error) };
      }

      const { url, word } = parsed.data;
      try {
        const count = await countWordOnPage(url, word, options);
        return { success: true, output: String(count), metadata: { count } };
      } catch (error) {
        return {
          success: false,
          output: "",
          error: error instanceof Error ? error.message : String(error),
        };
      }
    },
  };
}
