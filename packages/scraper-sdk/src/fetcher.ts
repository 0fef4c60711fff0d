export type QueryParams = Record<string, string | number | undefined>;

export type FetchFailureKind = 'timeout' | 'http_error' | 'connection_error';

export interface FetchFailure {
  kind: FetchFailureKind;
  status?: number;
  message: string;
}

export type FetchOutcome = { ok: true; text: string; url: string } | { ok: false; failure: FetchFailure };

/**
 * "Fetch a URL, get text or a typed failure." Adapters treat every failure
 * as a page that contributed nothing.
 */
export interface Fetcher {
  fetch(url: string, params?: QueryParams): Promise<FetchOutcome>;
}

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

const DEFAULT_DELAY_MS = 2000;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_ATTEMPTS = 3;

export interface HttpFetcherOptions {
  /** Politeness delay between consecutive requests of this instance. */
  delayMs?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;

  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    target.searchParams.set(key, String(value));
  }

  return target.toString();
}

function toFailure(error: unknown): FetchFailure {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { kind: 'timeout', message };
  }

  return { kind: 'connection_error', message };
}

export class HttpFetcher implements Fetcher {
  private delayMs: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  private lastRequestAt = 0;

  constructor(options: HttpFetcherOptions = {}) {
    this.delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.headers = { ...BROWSER_HEADERS, ...options.headers };
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** Current politeness delay; doubles every time the source answers 403. */
  get currentDelayMs(): number {
    return this.delayMs;
  }

  async fetch(url: string, params?: QueryParams): Promise<FetchOutcome> {
    const target = buildUrl(url, params);
    await this.waitForRateWindow();

    let lastFailure: FetchFailure = { kind: 'connection_error', message: `No attempt made for ${target}` };

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const outcome = await this.requestOnce(target);
      if (outcome.ok) {
        return outcome;
      }

      lastFailure = outcome.failure;
      const waitMs = this.getRetryDelayMs(outcome.failure, attempt);
      if (waitMs === undefined) {
        return outcome;
      }

      if (attempt < this.maxAttempts - 1) {
        await sleep(waitMs);
      }
    }

    return { ok: false, failure: lastFailure };
  }

  private async requestOnce(url: string): Promise<FetchOutcome> {
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        return {
          ok: false,
          failure: {
            kind: 'http_error',
            status: response.status,
            message: `Request to ${url} failed with status ${response.status}`,
          },
        };
      }

      return { ok: true, text: await response.text(), url: response.url || url };
    } catch (error) {
      return { ok: false, failure: toFailure(error) };
    }
  }

  /**
   * Undefined means the failure is final. 403 doubles the politeness delay,
   * 429 waits progressively longer, network failures back off linearly.
   */
  private getRetryDelayMs(failure: FetchFailure, attempt: number): number | undefined {
    if (failure.kind === 'http_error') {
      if (failure.status === 403) {
        this.delayMs *= 2;
        return this.delayMs;
      }

      if (failure.status === 429) {
        return this.delayMs * (attempt + 1) * 2;
      }

      return undefined;
    }

    return this.delayMs * (attempt + 1);
  }

  private async waitForRateWindow(): Promise<void> {
    const now = Date.now();
    if (this.lastRequestAt === 0) {
      this.lastRequestAt = now;
      return;
    }

    const target = this.lastRequestAt + this.delayMs;
    if (target > now) {
      await sleep(target - now);
    }

    this.lastRequestAt = Date.now();
  }
}
