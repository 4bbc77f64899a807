/**
 * Archive Fetcher
 *
 * Downloads repository snapshots as zip archives and keeps them in an
 * on-disk cache keyed by owner, name and branch. A file already present
 * under the expected name is a cache hit; its contents are not checked.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { FetchError } from "./errors";
import {
  DEFAULT_HOST,
  type ArchiveFetchConfig,
  type ArchiveSource,
  type RepositoryRef,
} from "./types";

export const DEFAULT_CACHE_DIR = fileURLToPath(new URL("../../downloads", import.meta.url));

export const DEFAULT_ARCHIVE_CONFIG: ArchiveFetchConfig = {
  host: DEFAULT_HOST,
  cacheDir: DEFAULT_CACHE_DIR,
};

export interface ArchiveFetcherOptions extends Partial<ArchiveFetchConfig> {
  /** Fetch implementation, defaults to the global fetch */
  fetch?: typeof fetch;
}

/**
 * Get the zip download URL for a repository branch
 */
export function getArchiveUrl(ref: RepositoryRef, host: string = DEFAULT_HOST): string {
  const base = host.replace(/\/+$/, "");
  return `${base}/${ref.owner}/${ref.name}/archive/refs/heads/${ref.branch}.zip`;
}

/**
 * Get the cache file path for a repository branch
 */
export function getArchivePath(ref: RepositoryRef, cacheDir: string = DEFAULT_CACHE_DIR): string {
  return path.join(cacheDir, `${ref.owner}-${ref.name}-${ref.branch}.zip`);
}

export class ArchiveFetcher implements ArchiveSource {
  private config: ArchiveFetchConfig;
  private fetchImpl?: typeof fetch;

  constructor(options: ArchiveFetcherOptions = {}) {
    const { fetch: fetchImpl, ...config } = options;
    this.config = {
      host: config.host ?? DEFAULT_ARCHIVE_CONFIG.host,
      cacheDir: config.cacheDir ?? DEFAULT_ARCHIVE_CONFIG.cacheDir,
    };
    this.fetchImpl = fetchImpl;
  }

  get cacheDir(): string {
    return this.config.cacheDir;
  }

  /**
   * Return the local archive for a repository, downloading it when it is
   * not cached yet or when `force` is set.
   */
  async fetch(ref: RepositoryRef, force = false): Promise<string> {
    fs.mkdirSync(this.config.cacheDir, { recursive: true });
    const archivePath = getArchivePath(ref, this.config.cacheDir);

    if (!force && fs.existsSync(archivePath)) {
      console.log(`[ArchiveFetcher] Zip file already exists at ${archivePath}`);
      return archivePath;
    }

    const url = getArchiveUrl(ref, this.config.host);
    console.log(`[ArchiveFetcher] Downloading ${ref.owner}/${ref.name} (${ref.branch}) from ${url}...`);

    const data = await this.download(url);
    fs.writeFileSync(archivePath, data);

    console.log(`[ArchiveFetcher] Downloaded to ${archivePath} (${data.length} bytes)`);
    return archivePath;
  }

  private async download(url: string): Promise<Buffer> {
    const fetchImpl = this.fetchImpl ?? fetch;
    let response: Response;
    try {
      response = await fetchImpl(url, { redirect: "follow" });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Failed to download ${url}: ${reason}`, url, undefined, { cause: error });
    }

    if (!response.ok) {
      throw new FetchError(
        `Failed to download ${url}: HTTP ${response.status} ${response.statusText}`.trim(),
        url,
        response.status
      );
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Failed to read archive body from ${url}: ${reason}`, url, response.status, {
        cause: error,
      });
    }
  }
}
