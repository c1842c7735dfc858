import type { Logger } from "pino";

export type FetchResult =
  | { success: true; body: string; url: string }
  | { success: false; error: string; url: string };

export type FetchOptions = {
  readonly timeoutMs: number;
  readonly userAgent: string;
  readonly retries: number;
  readonly retryDelayMs: number;
};

export const FEED_ACCEPT_HEADER =
  "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8";

async function fetchOnce(
  url: string,
  options: FetchOptions,
): Promise<FetchResult> {
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept: FEED_ACCEPT_HEADER,
      },
    });

    if (!response.ok) {
      return {
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        url,
      };
    }

    const body = await response.text();
    return { success: true, body, url };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message, url };
  }
}

/**
 * Fetches raw feed content from a single URL with timeout support.
 * Failed attempts are retried up to `options.retries` times with exponential
 * backoff. Never throws; the last failure is returned in the result.
 */
export async function fetchFeed(
  url: string,
  options: FetchOptions,
  logger: Logger,
): Promise<FetchResult> {
  let result = await fetchOnce(url, options);

  for (let attempt = 1; attempt <= options.retries; attempt++) {
    if (result.success) break;

    const delayMs = options.retryDelayMs * 2 ** (attempt - 1);
    logger.debug(
      { feedUrl: url, attempt, delayMs, error: result.error },
      "retrying feed fetch",
    );
    if (delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
    result = await fetchOnce(url, options);
  }

  if (!result.success) {
    logger.warn({ feedUrl: url, error: result.error }, "feed fetch failed");
  }

  return result;
}
