/**
 * Repository Docs Module
 *
 * Turns a repository reference into the markdown documents of that
 * repository: resolve the reference, download (or reuse) the branch
 * archive, extract the .md/.mdx files.
 *
 * Usage:
 * ```typescript
 * import { resolveReference, ArchiveFetcher, extractDocuments } from './docs';
 *
 * const ref = resolveReference('https://github.com/owner/repo/tree/dev');
 * const archivePath = await new ArchiveFetcher().fetch(ref);
 * const documents = extractDocuments(archivePath);
 * ```
 */

// Types
export * from "./types";

// Errors
export { InvalidReferenceError, FetchError, DecodeError } from "./errors";

// Reference resolution
export { resolveReference, repositoryKey } from "./reference";

// Archive download and cache
export {
  ArchiveFetcher,
  getArchiveUrl,
  getArchivePath,
  DEFAULT_ARCHIVE_CONFIG,
  DEFAULT_CACHE_DIR,
  type ArchiveFetcherOptions,
} from "./archive-fetcher";

// Extraction
export { extractDocuments, isDocEntry, normalizeEntryName, stripRootFolder } from "./extractor";
