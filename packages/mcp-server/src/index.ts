#!/usr/bin/env node
/**
 * MCP Server for GitHub documentation search and web page tools
 *
 * Exposes search_docs, fetch_page and count_word via the Model Context Protocol.
 * Can be used with Claude Desktop or any MCP-compatible client.
 *
 * Usage:
 *   npx tsx packages/mcp-server/src/index.ts
 *
 * Environment Variables:
 *   GITHUB_HOST - Git host to download archives from (default: https://github.com)
 *   DOCS_CACHE_DIR - Directory for downloaded archives
 *   PAGE_READER_URL - Reader service for fetch_page (default: https://r.jina.ai)
 */

import * as dotenv from "dotenv";
dotenv.config();

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  ArchiveFetcher,
  DocsSearchClient,
  IndexRegistry,
  createToolRegistry,
  loadConfig,
} from "@repodocs/core";
import { createDocsMcpServer } from "./server";

// stdout carries the protocol, so library logging goes to stderr
console.log = (...args: unknown[]) => console.error(...args);

async function main() {
  const config = loadConfig();
  const registry = new IndexRegistry({ archives: new ArchiveFetcher(config.docs) });
  const tools = createToolRegistry({
    docsClient: new DocsSearchClient(registry),
    page: config.page,
  });

  const server = createDocsMcpServer(tools);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("repodocs MCP server running on stdio");
}

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
