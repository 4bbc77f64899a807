/**
 * Document Extractor
 *
 * Reads markdown documentation out of a repository zip archive.
 */

import AdmZip from "adm-zip";
import { DecodeError } from "./errors";
import { createDocument, DOC_EXTENSIONS, type Document } from "./types";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Use forward slashes in entry names; zips written on Windows may use backslashes
 */
export function normalizeEntryName(entryName: string): string {
  return entryName.replace(/\\/g, "/");
}

/**
 * Check if an archive entry name is a documentation file
 */
export function isDocEntry(entryName: string, isDirectory = false): boolean {
  if (isDirectory || entryName.endsWith("/")) return false;
  return DOC_EXTENSIONS.some((ext) => entryName.endsWith(ext));
}

/**
 * Remove the archive's top-level folder (e.g. "repo-main/") from an entry name
 */
export function stripRootFolder(entryName: string): string {
  const slash = entryName.indexOf("/");
  return slash === -1 ? entryName : entryName.slice(slash + 1);
}

/**
 * Extract md and mdx files from a zip archive, in archive order.
 * Entries that cannot be decoded as UTF-8 are logged and skipped.
 */
export function extractDocuments(archivePath: string): Document[] {
  const zip = new AdmZip(archivePath);
  const documents: Document[] = [];

  for (const entry of zip.getEntries()) {
    const entryName = normalizeEntryName(entry.entryName);
    if (!isDocEntry(entryName, entry.isDirectory)) continue;

    try {
      const content = utf8.decode(entry.getData());
      documents.push(createDocument(stripRootFolder(entryName), content));
    } catch (error) {
      const decodeError = new DecodeError(entry.entryName, { cause: error });
      console.warn(`[DocsExtractor] ${decodeError.message}`);
    }
  }

  return documents;
}
