import { SCRAPING_CONFIG } from './constants';
import type { HttpClient, ScrapeOptions } from './types';

export type PageFetch =
  | { kind: 'ok'; url: string; html: string }
  | { kind: 'absent'; url: string; status: number };

export class PageBudgetExhaustedError extends Error {
  constructor(maxPages: number) {
    super(`Page budget of ${maxPages} exhausted`);
    this.name = 'PageBudgetExhaustedError';
  }
}

/**
 * Successful page fetches allowed in one run. Owned by the scraper that runs
 * the batch and handed to its Fetcher; a new run gets a new budget.
 */
export class PageBudget {
  private used = 0;

  constructor(public readonly maxPages: number) {}

  get fetched(): number {
    return this.used;
  }

  get exhausted(): boolean {
    return this.used >= this.maxPages;
  }

  charge(): void {
    this.used += 1;
  }
}

export const sleep = (ms: number): Promise<void> =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export interface FetcherOptions {
  budget: PageBudget;
  delaySeconds: number;
  timeoutMs?: number;
  userAgent?: string;
  httpClient?: HttpClient;
}

export class Fetcher {
  private readonly budget: PageBudget;
  private readonly delayMs: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly httpClient: HttpClient;

  constructor(options: FetcherOptions) {
    this.budget = options.budget;
    // Negative or NaN delays collapse to no delay
    this.delayMs = Math.max(0, Math.floor((Number(options.delaySeconds) || 0) * 1000));
    this.timeoutMs = options.timeoutMs ?? SCRAPING_CONFIG.TIMEOUTS.REQUEST;
    this.userAgent = options.userAgent ?? SCRAPING_CONFIG.USER_AGENT;
    this.httpClient = options.httpClient ?? ((url, init) => fetch(url, init));
  }

  /**
   * Issues one GET for `url`. Anything but HTTP 200 comes back as `absent`;
   * connection failures and timeouts reject.
   */
  async fetchPage(url: string): Promise<PageFetch> {
    if (this.budget.exhausted) {
      throw new PageBudgetExhaustedError(this.budget.maxPages);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let html: string;
    try {
      const response = await this.httpClient(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: SCRAPING_CONFIG.ACCEPT,
          'Accept-Language': SCRAPING_CONFIG.ACCEPT_LANGUAGE,
          'Cache-Control': 'no-cache',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (response.status !== 200) {
        return { kind: 'absent', url, status: response.status };
      }
      html = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Request timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }

    this.budget.charge();
    await this.politeDelay();
    return { kind: 'ok', url, html };
  }

  private async politeDelay(): Promise<void> {
    if (this.delayMs <= 0) return;
    try {
      await sleep(this.delayMs);
    } catch (error) {
      console.warn('Polite delay interrupted, continuing without it:', error);
    }
  }
}

/** A fresh budget and the Fetcher that charges it, for one scraping run. */
export function createRunFetcher(
  options: ScrapeOptions,
  defaultDelaySeconds: number
): { budget: PageBudget; fetcher: Fetcher } {
  const budget = new PageBudget(options.maxPages ?? SCRAPING_CONFIG.DEFAULTS.MAX_PAGES);
  const fetcher = new Fetcher({
    budget,
    delaySeconds: options.delaySeconds ?? defaultDelaySeconds,
    ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
    ...(options.userAgent && { userAgent: options.userAgent }),
    ...(options.httpClient && { httpClient: options.httpClient }),
  });
  return { budget, fetcher };
}
