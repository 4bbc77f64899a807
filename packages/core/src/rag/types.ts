/**
 * Docs Search Types
 *
 * Interfaces shared by the text index, the index registry and the
 * search client.
 */

import type { Document, RepositoryKey } from "../docs/types";
import type { TextIndex } from "./text-index";

/**
 * A built index together with the documents it was built from
 */
export interface RegistryEntry {
  key: RepositoryKey;
  documents: readonly Document[];
  index: TextIndex;
  /** When this entry was built */
  builtAt: Date;
}

/**
 * Per-repository registry statistics
 */
export interface RegistryStats {
  key: RepositoryKey;
  totalDocuments: number;
  builtAt: string;
}

/**
 * A search result as returned to external callers (tools, CLI)
 */
export interface DocumentPreview {
  filename: string;
  /** Content, truncated to the preview length with "..." appended */
  content: string;
}

/**
 * Outcome of a forced re-index
 */
export interface RefreshResult {
  key: RepositoryKey;
  totalDocuments: number;
}
