/**
 * Fetch with retries and exponential backoff for collector HTTP calls.
 * 429 and 5xx get a longer floor; Retry-After (seconds) is honored. Other 4xx return immediately.
 */
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_INITIAL_MS = 500;
const RATE_LIMIT_BACKOFF_MS = 2000;
const SERVER_ERROR_BACKOFF_MS = 1000;

export interface RetryConfig {
  maxRetries?: number;
  initialMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isRetryable(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

export function backoffDelay(attempt: number, initialMs: number, res?: Response): number {
  let delay = initialMs * Math.pow(2, attempt);
  if (!res) return delay;
  if (res.status === 429) delay = Math.max(delay, RATE_LIMIT_BACKOFF_MS);
  else if (res.status >= 500) delay = Math.max(delay, SERVER_ERROR_BACKOFF_MS);
  const retryAfter = res.headers.get("Retry-After");
  if (retryAfter) {
    const sec = parseInt(retryAfter, 10);
    if (!Number.isNaN(sec)) delay = Math.max(delay, sec * 1000);
  }
  return delay;
}

export async function fetchWithRetry(url: string, options: RequestInit = {}, config: RetryConfig = {}): Promise<Response> {
  const { maxRetries = DEFAULT_MAX_RETRIES, initialMs = DEFAULT_INITIAL_MS, sleep = defaultSleep } = config;
  let lastError: Error | null = null;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let res: Response | undefined;
    try {
      res = await fetch(url, options);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
    }
    if (res) {
      if (res.ok || !isRetryable(res.status) || attempt === maxRetries) return res;
      lastError = new Error(`HTTP ${res.status}`);
    }
    if (attempt < maxRetries) {
      const delay = backoffDelay(attempt, initialMs, res);
      console.warn(`[fetch] ${lastError?.message ?? "error"} for ${url}; retry ${attempt + 1}/${maxRetries} in ${delay}ms`);
      await sleep(delay);
    }
  }
  throw lastError ?? new Error("fetch failed");
}
