import { InvalidReferenceError } from "./errors";
import { DEFAULT_BRANCH, type RepositoryKey, type RepositoryRef } from "./types";

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

function toRef(reference: string, owner: string | undefined, name: string | undefined, branch: string): RepositoryRef {
  if (!owner || !name) {
    throw new InvalidReferenceError(reference);
  }
  return Object.freeze({ owner, name, branch });
}

/**
 * Parse a repository reference into owner, name and branch.
 *
 * Supports:
 * - owner/repo (anything without a scheme, so "httpie/cli" is bare)
 * - https://github.com/owner/repo
 * - https://github.com/owner/repo/tree/branch
 */
export function resolveReference(reference: string): RepositoryRef {
  if (!SCHEME.test(reference)) {
    const parts = reference.split("/");
    if (parts.length < 2) {
      throw new InvalidReferenceError(reference);
    }
    return toRef(reference, parts[0], parts[1], DEFAULT_BRANCH);
  }

  let url: URL;
  try {
    url = new URL(reference);
  } catch {
    throw new InvalidReferenceError(reference);
  }

  const pathParts = url.pathname.replace(/^\/+|\/+$/g, "").split("/");
  if (pathParts.length < 2) {
    throw new InvalidReferenceError(reference);
  }

  const [owner, name, marker, branch] = pathParts;
  return toRef(reference, owner, name, marker === "tree" && branch ? branch : DEFAULT_BRANCH);
}

export function repositoryKey(ref: RepositoryRef): RepositoryKey {
  return `${ref.owner}/${ref.name}/${ref.branch}`;
}
