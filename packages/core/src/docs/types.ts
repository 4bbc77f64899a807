/**
 * Repository Docs Types
 *
 * Types for resolving repositories and the documents extracted from their archives.
 */

import { z } from "zod";

/**
 * A repository reference resolved to its parts
 */
export interface RepositoryRef {
  readonly owner: string;
  readonly name: string;
  readonly branch: string;
}

/**
 * Cache identity of a repository state: `owner/name/branch`
 */
export type RepositoryKey = string;

export const DocumentSchema = z.object({
  /** Path relative to the repository root, archive root folder stripped */
  filename: z.string(),
  /** UTF-8 decoded file content */
  content: z.string(),
});

/**
 * One indexable documentation file
 */
export type Document = Readonly<z.infer<typeof DocumentSchema>>;

/**
 * Create a validated, frozen document
 */
export function createDocument(filename: string, content: string): Document {
  return Object.freeze(DocumentSchema.parse({ filename, content }));
}

/**
 * Where archives are downloaded from and cached to
 */
export interface ArchiveFetchConfig {
  /** Base URL of the git host */
  host: string;
  /** Directory holding cached archives */
  cacheDir: string;
}

/**
 * Anything that can turn a repository reference into a local archive path.
 * Implemented by ArchiveFetcher; tests substitute their own.
 */
export interface ArchiveSource {
  fetch(ref: RepositoryRef, force?: boolean): Promise<string>;
}

export const DEFAULT_BRANCH = "main";

export const DEFAULT_HOST = "https://github.com";

/** File extensions treated as documentation */
export const DOC_EXTENSIONS = [".md", ".mdx"] as const;
