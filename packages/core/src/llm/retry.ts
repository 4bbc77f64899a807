/**
 * Retry with exponential backoff for LLM API calls.
 * Document search itself never retries; only model calls go through here.
 */

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Randomize delays by ±25% (default: true) */
  jitter?: boolean;
  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback fired before each retry attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

type BackoffSettings = Required<Omit<RetryOptions, "isRetryable" | "onRetry">>;

const DEFAULT_OPTIONS: BackoffSettings = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

const TRANSIENT_NETWORK_MESSAGES = [
  "econnrefused",
  "econnreset",
  "etimedout",
  "socket hang up",
  "fetch failed",
  "network",
  "timeout",
];

/**
 * An error explicitly marked as worth retrying
 */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "RetryableError";
  }
}

/**
 * Pull the HTTP status out of provider errors shaped "<Provider> API error: <status> - <body>"
 */
export function statusFromApiError(error: unknown): number | undefined {
  if (!(error instanceof Error)) return undefined;
  const match = error.message.match(/API error: (\d{3})/);
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Rate limits, server errors and dropped connections are retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RetryableError) {
    return true;
  }

  const status = statusFromApiError(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return TRANSIENT_NETWORK_MESSAGES.some((fragment) => message.includes(fragment));
  }

  return false;
}

/**
 * Delay before retry number `attempt` (0-based)
 */
export function backoffDelay(
  attempt: number,
  settings: BackoffSettings,
  retryAfterMs?: number
): number {
  if (retryAfterMs) {
    return Math.min(retryAfterMs, settings.maxDelayMs);
  }

  const delay = Math.min(
    settings.initialDelayMs * Math.pow(settings.backoffMultiplier, attempt),
    settings.maxDelayMs
  );

  return settings.jitter ? Math.floor(delay * (0.75 + Math.random() * 0.5)) : delay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function, retrying retryable failures with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const settings: BackoffSettings = {
    maxRetries: options?.maxRetries ?? DEFAULT_OPTIONS.maxRetries,
    initialDelayMs: options?.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs: options?.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier: options?.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier,
    jitter: options?.jitter ?? DEFAULT_OPTIONS.jitter,
  };
  const checkRetryable = options?.isRetryable ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= settings.maxRetries || !checkRetryable(error)) {
        throw error;
      }

      const retryAfterMs = error instanceof RetryableError ? error.retryAfterMs : undefined;
      const delayMs = backoffDelay(attempt, settings, retryAfterMs);
      options?.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}
