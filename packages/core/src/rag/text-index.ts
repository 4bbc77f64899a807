/**
 * Text Index
 *
 * In-memory keyword index over a document collection, backed by MiniSearch
 * (BM25 scoring). Both the content and the filename are searchable text.
 * An index never changes after it is built; re-indexing builds a new one.
 */

import MiniSearch from "minisearch";
import type { Document } from "../docs/types";

export const DEFAULT_NUM_RESULTS = 5;

interface IndexedDocument {
  /** Position in the source collection, doubles as tie-breaker */
  id: number;
  filename: string;
  content: string;
}

export class TextIndex {
  private readonly engine: MiniSearch<IndexedDocument>;

  private constructor(private readonly docs: readonly Document[]) {
    this.engine = new MiniSearch<IndexedDocument>({
      idField: "id",
      fields: ["content", "filename"],
      storeFields: [],
    });
    this.engine.addAll(
      docs.map((doc, id) => ({ id, filename: doc.filename, content: doc.content }))
    );
  }

  /**
   * Build an index over a document collection (which may be empty)
   */
  static build(documents: readonly Document[]): TextIndex {
    return new TextIndex([...documents]);
  }

  get size(): number {
    return this.docs.length;
  }

  get documents(): readonly Document[] {
    return this.docs;
  }

  /**
   * Return up to `k` documents ranked by relevance to `query`.
   * Equal scores keep collection order.
   */
  search(query: string, k: number = DEFAULT_NUM_RESULTS): Document[] {
    const limit = Math.floor(k);
    if (!(limit > 0) || this.docs.length === 0 || !query.trim()) {
      return [];
    }

    const results = this.engine
      .search(query)
      .map((result) => ({ id: Number(result.id), score: result.score }))
      .sort((a, b) => b.score - a.score || a.id - b.id);

    const documents: Document[] = [];
    for (const { id } of results.slice(0, limit)) {
      const doc = this.docs[id];
      if (doc) documents.push(doc);
    }
    return documents;
  }
}
