export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAYS_MS = [100, 300];

export interface FetchTextOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelaysMs?: number[];
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`GET ${url} returned ${status}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
  }
}

function shouldRetryStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function retryDelay(delays: number[], attempt: number): number {
  return delays[attempt - 1] ?? delays[delays.length - 1] ?? 0;
}

/**
 * GET a page and return its body as text.
 * Network errors, 429 and 5xx are retried; any other non-2xx status throws at once.
 */
export async function fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const delays = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let res: Response;

    try {
      res = await fetchImpl(url, {
        headers: { 'User-Agent': DEFAULT_USER_AGENT, ...options.headers },
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < maxAttempts) {
        await sleep(retryDelay(delays, attempt));
      }
      continue;
    }

    if (!res.ok) {
      const statusError = new HttpStatusError(url, res.status);
      if (!shouldRetryStatus(res.status)) {
        throw statusError;
      }

      lastError = statusError;
      if (attempt < maxAttempts) {
        await sleep(retryDelay(delays, attempt));
      }
      continue;
    }

    return res.text();
  }

  throw lastError ?? new Error(`GET ${url} failed after ${maxAttempts} attempts`);
}
