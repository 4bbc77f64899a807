import { describe, it, expect, afterEach, vi } from "vitest";
import { OpenAIProvider } from "../llm/providers/openai";
import type { ToolDefinition } from "../llm/providers/types";

const searchDefinition: ToolDefinition = {
  type: "function",
  function: {
    name: "search_docs",
    description: "Search docs",
    parameters: { type: "object", properties: {} },
  },
};

function stubChatCompletion(body: unknown, status = 200) {
  const fetchMock = vi.fn<typeof fetch>(
    async () => new Response(JSON.stringify(body), { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubChatCompletion>): Record<string, unknown> {
  const init = fetchMock.mock.calls[0]?.[1];
  return JSON.parse(String(init?.body));
}

describe("OpenAIProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts chat completions with the bearer key", async () => {
    const fetchMock = stubChatCompletion({
      choices: [{ message: { content: "hi" }, finish_reason: "stop" }],
    });
    const provider = new OpenAIProvider({ apiKey: "test-secret", baseUrl: "http://llm.test/v1/" });

    const text = await provider.complete([{ role: "user", content: "hello" }]);

    expect(text).toBe("hi");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://llm.test/v1/chat/completions");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(sentBody(fetchMock)).toMatchObject({ model: "gpt-4o-mini", stream: false });
  });

  it("returns tool calls", async () => {
    const fetchMock = stubChatCompletion({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              {
                id: "call_1",
                type: "function",
                function: { name: "search_docs", arguments: '{"query":"x"}' },
              },
            ],
          },
          finish_reason: "tool_calls",
        },
      ],
    });
    const provider = new OpenAIProvider({ baseUrl: "http://llm.test/v1" });

    const response = await provider.completeWithTools([{ role: "user", content: "find x" }], {
      tools: [searchDefinition],
    });

    expect(response).toEqual({
      content: undefined,
      tool_calls: [
        { id: "call_1", type: "function", function: { name: "search_docs", arguments: '{"query":"x"}' } },
      ],
      finish_reason: "tool_calls",
    });
    expect(sentBody(fetchMock)).toMatchObject({ tool_choice: "auto", tools: [searchDefinition] });
  });

  it("keeps tool call ids on follow-up messages", async () => {
    const fetchMock = stubChatCompletion({
      choices: [{ message: { content: "done" }, finish_reason: "stop" }],
    });
    const provider = new OpenAIProvider({ baseUrl: "http://llm.test/v1" });
    const toolCall = {
      id: "call_1",
      type: "function" as const,
      function: { name: "search_docs", arguments: "{}" },
    };

    await provider.completeWithTools([
      { role: "assistant", content: "", tool_calls: [toolCall] },
      { role: "tool", content: "result", tool_call_id: "call_1" },
    ]);

    expect(sentBody(fetchMock).messages).toEqual([
      { role: "assistant", content: null, tool_calls: [toolCall] },
      { role: "tool", content: "result", tool_call_id: "call_1" },
    ]);
  });

  it("throws with the status on API errors", async () => {
    stubChatCompletion({ error: { message: "rate limited" } }, 429);
    const provider = new OpenAIProvider({ baseUrl: "http://llm.test/v1" });

    await expect(provider.complete([{ role: "user", content: "hi" }])).rejects.toThrow(
      'OpenAI API error: 429 - {"error":{"message":"rate limited"}}'
    );
  });
});
