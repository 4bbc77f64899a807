/**
 * Index Registry
 *
 * Maps each repository key to its built text index and the documents it
 * was built from, so a repository is downloaded and indexed once per
 * process. Entries are replaced wholesale on a forced refresh and never
 * evicted.
 */

import { ArchiveFetcher } from "../docs/archive-fetcher";
import { extractDocuments } from "../docs/extractor";
import { repositoryKey, resolveReference } from "../docs/reference";
import type { ArchiveSource, Document, RepositoryKey, RepositoryRef } from "../docs/types";
import { DEFAULT_NUM_RESULTS, TextIndex } from "./text-index";
import type { RegistryEntry, RegistryStats } from "./types";

export interface IndexRegistryOptions {
  /** Archive source, defaults to an ArchiveFetcher with default config */
  archives?: ArchiveSource;
  /** Document extraction, defaults to extractDocuments */
  extract?: (archivePath: string) => Document[];
}

export class IndexRegistry {
  private entries: Map<RepositoryKey, RegistryEntry> = new Map();
  private pending: Map<RepositoryKey, Promise<RegistryEntry>> = new Map();
  private archives: ArchiveSource;
  private extract: (archivePath: string) => Document[];

  constructor(options: IndexRegistryOptions = {}) {
    this.archives = options.archives ?? new ArchiveFetcher();
    this.extract = options.extract ?? extractDocuments;
  }

  /**
   * Get or create the search index for a repository.
   * Downloads and indexes if not already done, or always when `force` is set.
   */
  async getIndex(ref: RepositoryRef, force = false): Promise<TextIndex> {
    const entry = await this.getEntry(ref, force);
    return entry.index;
  }

  /**
   * Get or create the full registry entry for a repository
   */
  async getEntry(ref: RepositoryRef, force = false): Promise<RegistryEntry> {
    const key = repositoryKey(ref);

    if (!force) {
      const cached = this.entries.get(key);
      if (cached) return cached;

      const inFlight = this.pending.get(key);
      if (inFlight) return inFlight;
    }

    const build = this.build(key, ref, force);
    if (!force) {
      this.pending.set(key, build);
    }

    try {
      return await build;
    } finally {
      if (this.pending.get(key) === build) {
        this.pending.delete(key);
      }
    }
  }

  /**
   * Search a repository, indexing it first if needed
   */
  async search(reference: string, query: string, k: number = DEFAULT_NUM_RESULTS): Promise<Document[]> {
    const ref = resolveReference(reference);
    const index = await this.getIndex(ref);
    return index.search(query, k);
  }

  has(ref: RepositoryRef): boolean {
    return this.entries.has(repositoryKey(ref));
  }

  getDocuments(ref: RepositoryRef): readonly Document[] | undefined {
    return this.entries.get(repositoryKey(ref))?.documents;
  }

  keys(): RepositoryKey[] {
    return Array.from(this.entries.keys());
  }

  stats(): RegistryStats[] {
    return Array.from(this.entries.values()).map((entry) => ({
      key: entry.key,
      totalDocuments: entry.documents.length,
      builtAt: entry.builtAt.toISOString(),
    }));
  }

  // The entry is stored only once every step succeeded
  private async build(key: RepositoryKey, ref: RepositoryRef, force: boolean): Promise<RegistryEntry> {
    const archivePath = await this.archives.fetch(ref, force);
    const documents = this.extract(archivePath);
    const index = TextIndex.build(documents);

    const entry: RegistryEntry = {
      key,
      documents: index.documents,
      index,
      builtAt: new Date(),
    };
    this.entries.set(key, entry);

    console.log(`[IndexRegistry] Indexed ${documents.length} documents from ${key}`);
    return entry;
  }
}
