import { log } from "./logger";

const DEFAULT_RETRY_DELAY_MS = 4000;
const DEFAULT_MAX_RETRIES = 3;

type RetryOptions = {
  maxRetries?: number;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wraps a fetch call with retry logic for HTTP 429 rate limits.
 * Reads Retry-After header to determine wait time.
 * Only retries on 429 — every other response is returned as-is.
 */
export async function withRetry(
  fn: () => Promise<Response>,
  options?: RetryOptions
): Promise<Response> {
  const maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const label = options?.label ?? "request";
  const wait = options?.sleep ?? sleep;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const response = await fn();

    if (response.status !== 429) return response;

    if (attempt === maxRetries) {
      log(`[retry] ${label} — 429 after ${maxRetries} retries, giving up`);
      return response;
    }

    const retryAfter = response.headers.get("retry-after");
    const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
    const delayMs = Number.isFinite(seconds) ? seconds * 1000 : DEFAULT_RETRY_DELAY_MS;

    log(
      `[retry] ${label} — 429, waiting ${delayMs / 1000}s (attempt ${attempt + 1}/${maxRetries})`
    );
    await wait(delayMs);
  }

  // Unreachable, but TypeScript needs it
  throw new Error("Retry loop exited unexpectedly");
}
