import { describe, it, expect, vi } from "vitest";
import {
  countOccurrences,
  countWordOnPage,
  createCountWordTool,
  createFetchPageTool,
  fetchPage,
  PageFetchError,
} from "../tools/web-page";

const context = { sessionId: "test-session" };

function readerReturning(body: string, status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(body, { status }));
}

describe("countOccurrences", () => {
  it("counts case-insensitively", () => {
    expect(countOccurrences("Data, data and DATA.", "data")).toBe(3);
  });

  it("counts non-overlapping matches", () => {
    expect(countOccurrences("aaaa", "aa")).toBe(2);
  });

  it("counts substrings", () => {
    expect(countOccurrences("database metadata", "data")).toBe(2);
  });

  it("returns 0 for an empty word", () => {
    expect(countOccurrences("anything", "")).toBe(0);
  });
});

describe("fetchPage", () => {
  it("requests the page through the reader service", async () => {
    const fetchMock = readerReturning("# Title");

    const content = await fetchPage("https://example.com/post", {
      readerUrl: "https://reader.test/",
      fetch: fetchMock,
    });

    expect(content).toBe("# Title");
    expect(fetchMock).toHaveBeenCalledWith("https://reader.test/https://example.com/post");
  });

  it("throws PageFetchError on a non-OK status", async () => {
    const error = await fetchPage("https://example.com/missing", {
      fetch: readerReturning("not found", 404),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PageFetchError);
    expect(error).toMatchObject({ status: 404, message: "Page fetch failed: 404 - not found" });
  });

  it("counts a word on the fetched page", async () => {
    const count = await countWordOnPage("https://example.com", "mcp", {
      fetch: readerReturning("MCP servers expose tools. An mcp client calls them."),
    });

    expect(count).toBe(2);
  });
});

describe("fetch_page tool", () => {
  it("returns the page content", async () => {
    const tool = createFetchPageTool({ fetch: readerReturning("hello page") });

    const result = await tool.execute({ url: "https://example.com" }, context);

    expect(result).toEqual({ success: true, output: "hello page", metadata: { length: 10 } });
  });

  it("rejects a malformed URL", async () => {
    const fetchMock = readerReturning("unused");
    const tool = createFetchPageTool({ fetch: fetchMock });

    const result = await tool.execute({ url: "example" }, context);

    expect(result).toEqual({ success: false, output: "", error: "Invalid arguments: url: Invalid url" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports reader failures", async () => {
    const tool = createFetchPageTool({ fetch: readerReturning("down", 503) });

    const result = await tool.execute({ url: "https://example.com" }, context);

    expect(result).toEqual({ success: false, output: "", error: "Page fetch failed: 503 - down" });
  });
});

describe("count_word tool", () => {
  it("returns the count as text", async () => {
    const tool = createCountWordTool({ fetch: readerReturning("one One ONE") });

    const result = await tool.execute({ url: "https://example.com", word: "one" }, context);

    expect(result).toEqual({ success: true, output: "3", metadata: { count: 3 } });
  });

  it("requires a word", async () => {
    const tool = createCountWordTool({ fetch: readerReturning("") });

    const result = await tool.execute({ url: "https://example.com", word: "" }, context);

    expect(result.error).toBe("Invalid arguments: word: word is required");
  });
});
