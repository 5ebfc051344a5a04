/**
 * HTTP fetching with timeout and retries for source scraping
 */

import { FetchError, errorMessage } from "../errors";
import { logger } from "../logger";
import { sleep } from "../backoff";

export interface HttpOptions {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  userAgent: string;
}

export const SCRAPING_CONFIG: HttpOptions & { delayBetweenSourcesMs: number; maxArticlesPerSource: number } = {
  timeoutMs: 30_000,
  maxRetries: 3,
  retryDelayMs: 2_000,
  userAgent: "Agriculture Digest Bot 1.0",
  delayBetweenSourcesMs: 2_000,
  maxArticlesPerSource: 10,
};

/**
 * GET a URL as text. Retries with a fixed delay, then throws FetchError.
 */
export async function fetchText(url: string, options: HttpOptions, signal?: AbortSignal): Promise<string> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxRetries; attempt++) {
    signal?.throwIfAborted();

    const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    try {
      const response = await fetch(url, {
        signal: requestSignal,
        headers: {
          "User-Agent": options.userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      return await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      lastError = error;
      logger.warn(`Request attempt ${attempt}/${options.maxRetries} failed for ${url}: ${errorMessage(error)}`);

      if (attempt < options.maxRetries) {
        await sleep(options.retryDelayMs, signal);
      }
    }
  }

  throw new FetchError(url, options.maxRetries, lastError);
}
