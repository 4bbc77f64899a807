/**
 * Docs Search Client
 *
 * High-level interface for searching repository documentation.
 * Wraps an IndexRegistry and shapes results for external callers.
 */

import { resolveReference } from "../docs/reference";
import type { Document } from "../docs/types";
import { IndexRegistry } from "./registry";
import { DEFAULT_NUM_RESULTS } from "./text-index";
import type { DocumentPreview, RefreshResult, RegistryStats } from "./types";

export const PREVIEW_LENGTH = 500;

const TRUNCATION_MARKER = "...";

/**
 * Shorten a document for display, counting code points so surrogate pairs
 * stay whole. The document itself is left untouched.
 */
export function toPreview(doc: Document, maxLength: number = PREVIEW_LENGTH): DocumentPreview {
  if (doc.content.length <= maxLength) {
    return { filename: doc.filename, content: doc.content };
  }

  const codePoints = Array.from(doc.content);
  return {
    filename: doc.filename,
    content:
      codePoints.length > maxLength
        ? codePoints.slice(0, maxLength).join("") + TRUNCATION_MARKER
        : doc.content,
  };
}

export class DocsSearchClient {
  constructor(private readonly registry: IndexRegistry = new IndexRegistry()) {}

  /**
   * Search documentation in a GitHub repository.
   *
   * @param reference - e.g. "https://github.com/owner/repo" or "owner/repo"
   */
  async search(
    reference: string,
    query: string,
    numResults: number = DEFAULT_NUM_RESULTS
  ): Promise<DocumentPreview[]> {
    const results = await this.registry.search(reference, query, numResults);

    console.log(
      `[DocsSearchClient] Search for "${query.slice(0, 50)}" in ${reference}: ${results.length} results`
    );

    return results.map((doc) => toPreview(doc));
  }

  /**
   * Make sure a repository is indexed, re-downloading when `force` is set
   */
  async index(reference: string, force = false): Promise<RefreshResult> {
    const ref = resolveReference(reference);
    const entry = await this.registry.getEntry(ref, force);
    return { key: entry.key, totalDocuments: entry.documents.length };
  }

  /**
   * Re-download and re-index a repository
   */
  async refresh(reference: string): Promise<RefreshResult> {
    return this.index(reference, true);
  }

  stats(): RegistryStats[] {
    return this.registry.stats();
  }
}
