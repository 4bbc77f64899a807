#!/usr/bin/env npx tsx
/**
 * Docs Agent CLI
 *
 * Commands:
 *   chat                         Chat with the documentation assistant (default)
 *   search <repo> <query>        Search a repository's markdown docs
 *   index <repo>                 Download and index a repository's docs
 *   help                         Show this help
 *
 * Usage:
 *   npx tsx scripts/docs-agent.ts
 *   npx tsx scripts/docs-agent.ts search vercel/next.js "middleware redirect" --limit 3
 *   npx tsx scripts/docs-agent.ts index https://github.com/vercel/next.js/tree/canary --force
 */

import * as dotenv from "dotenv";
dotenv.config();

import * as readline from "node:readline/promises";
import {
  ArchiveFetcher,
  DocsSearchClient,
  IndexRegistry,
  buildDocsAssistantPrompt,
  createLLMProvider,
  createToolRegistry,
  loadConfig,
  runAgentLoop,
  type AppConfig,
  type LLMMessage,
} from "../packages/core/src";

const args = process.argv.slice(2);
const command = args[0] ?? "chat";

const EXIT_WORDS = new Set(["quit", "exit", "q"]);

async function main() {
  const config = loadConfig();

  switch (command) {
    case "chat":
      await chat(config);
      break;
    case "search":
      await searchDocs(config);
      break;
    case "index":
      await indexDocs(config);
      break;
    case "help":
    case "--help":
    case "-h":
      printHelp();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

function printHelp() {
  console.log(`
Docs Agent CLI

Commands:
  chat                    Chat with the documentation assistant (default)
                          Type quit, exit or q to leave

  search <repo> <query>   Search a repository's markdown docs
                          Options: --limit <n>  (default: 5)

  index <repo>            Download and index a repository's docs
                          Options: --force  re-download the archive

<repo> is "owner/name" (branch main) or a GitHub URL. To pick a branch use
https://github.com/owner/name/tree/<branch>

Examples:
  npx tsx scripts/docs-agent.ts
  npx tsx scripts/docs-agent.ts search vercel/next.js "app router"
  npx tsx scripts/docs-agent.ts index vercel/next.js --force
`);
}

function createDocsClient(config: AppConfig): DocsSearchClient {
  return new DocsSearchClient(
    new IndexRegistry({ archives: new ArchiveFetcher(config.docs) })
  );
}

async function chat(config: AppConfig) {
  const provider = createLLMProvider(config.llm);
  const tools = createToolRegistry({
    docsClient: createDocsClient(config),
    page: config.page,
  });
  const systemPrompt = buildDocsAssistantPrompt(tools.getDefinitions());
  const sessionId = `cli-${Date.now()}`;

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let history: LLMMessage[] = [];

  console.log(`🤖 Docs assistant ready (${provider.name}). Type "quit" to exit.\n`);

  try {
    for (;;) {
      const input = (await rl.question("You: ")).trim();
      if (!input) continue;
      if (EXIT_WORDS.has(input.toLowerCase())) break;

      const state = await runAgentLoop(
        input,
        { maxIterations: config.agent.maxIterations, systemPrompt },
        { provider, tools, context: { sessionId } },
        history,
        async (event) => {
          if (event.type === "tool_call") {
            console.log(`\n🔧 ${event.toolName}(${JSON.stringify(event.args)})`);
          } else if (event.type === "tool_result") {
            const status = event.result.success ? "✅" : "❌";
            const text = event.result.success ? event.result.output : event.result.error ?? "";
            console.log(`   ${status} ${text.slice(0, 200)}${text.length > 200 ? "..." : ""}`);
          }
        }
      );

      if (state.status === "completed") {
        console.log(`\nAssistant: ${state.result ?? ""}\n`);
        history = state.messages;
      } else {
        console.log(`\n❌ Error: ${state.error ?? "unknown error"}\n`);
      }
    }
  } finally {
    rl.close();
  }

  console.log("Goodbye!");
}

async function searchDocs(config: AppConfig) {
  const repo = args[1];
  let limit = 5;
  const queryParts: string[] = [];

  for (let i = 2; i < args.length; i++) {
    if (args[i] === "--limit" && args[i + 1]) {
      limit = Number.parseInt(args[i + 1], 10);
      i++;
    } else {
      queryParts.push(args[i]);
    }
  }

  const query = queryParts.join(" ");
  if (!repo || !query || !Number.isFinite(limit)) {
    console.error("Usage: search <repo> <query> [--limit <n>]");
    process.exit(1);
  }

  console.log(`🔎 Searching ${repo} for: "${query}"\n`);

  const results = await createDocsClient(config).search(repo, query, limit);

  if (results.length === 0) {
    console.log("No results found.");
    return;
  }

  console.log(`Found ${results.length} result(s):\n`);

  results.forEach((result, i) => {
    console.log(`[${i + 1}] ${result.filename}`);
    console.log(`    ${result.content.slice(0, 150).replace(/\n/g, " ")}`);
    console.log();
  });
}

async function indexDocs(config: AppConfig) {
  const repo = args[1];
  if (!repo) {
    console.error("Usage: index <repo> [--force]");
    process.exit(1);
  }
  const force = args.includes("--force");

  console.log(`📚 Indexing docs from ${repo}${force ? " (forced)" : ""}...\n`);

  const result = await createDocsClient(config).index(repo, force);
  console.log(`   ✅ Indexed ${result.totalDocuments} docs for ${result.key}`);
}

main().catch((error) => {
  console.error("❌ Error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
