/**
 * Errors raised while resolving, downloading and reading repository archives
 */

export class InvalidReferenceError extends Error {
  constructor(public readonly reference: string) {
    super(`Invalid GitHub URL format: ${reference}`);
    this.name = "InvalidReferenceError";
  }
}

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

/**
 * A single archive entry that could not be read as UTF-8 text.
 * Logged and skipped during extraction, never thrown out of it.
 */
export class DecodeError extends Error {
  constructor(
    public readonly entryName: string,
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? "unknown");
    super(`Error reading ${entryName}: ${reason}`, options);
    this.name = "DecodeError";
  }
}
