/**
 * Docs Search Module
 *
 * Keyword search over the markdown documentation of GitHub repositories.
 *
 * Features:
 * - BM25-ranked text index over file content and filename
 * - Registry of built indexes, one per owner/name/branch, with forced refresh
 * - Result previews for tools and the CLI
 * - Agent tool for doc search
 *
 * Usage:
 * ```typescript
 * import { DocsSearchClient, IndexRegistry } from './rag';
 *
 * const client = new DocsSearchClient(new IndexRegistry());
 * const results = await client.search('owner/repo', 'getting started');
 * ```
 */

// Types
export * from "./types";

// Text index
export { TextIndex, DEFAULT_NUM_RESULTS } from "./text-index";

// Registry
export { IndexRegistry, type IndexRegistryOptions } from "./registry";

// Search client
export { DocsSearchClient, toPreview, PREVIEW_LENGTH } from "./client";

// Agent tools
export { createSearchDocsTool } from "./tool";
