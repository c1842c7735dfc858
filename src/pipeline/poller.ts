import type { Logger } from "pino";
import { fetchFeed } from "./fetcher";
import type { FetchOptions } from "./fetcher";
import { extractEntries } from "./extractor";
import type { ExtractOptions } from "./extractor";
import { normalizeEntry } from "./normalizer";
import type { NormalizeOptions } from "./normalizer";
import type { FeedSource, NormalizedItem, PollResult } from "./types";

export type PollOptions = {
  readonly fetch: FetchOptions;
  readonly extraction: ExtractOptions;
  readonly normalize: NormalizeOptions;
};

/**
 * Fetches one feed and turns its entries into normalized items.
 * Transport failures are returned in the result; an entry that fails to
 * normalize is skipped without affecting the rest of the feed.
 */
export async function pollFeed(
  source: FeedSource,
  options: PollOptions,
  logger: Logger,
): Promise<PollResult> {
  const fetched = await fetchFeed(source.url, options.fetch, logger);
  if (!fetched.success) {
    return { source, items: [], error: fetched.error };
  }

  const entries = extractEntries(fetched.body, options.extraction, logger);
  const items: Array<NormalizedItem> = [];

  for (const entry of entries) {
    try {
      items.push(normalizeEntry(entry, source, options.normalize, logger));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(
        { feedUrl: source.url, link: entry.link, error: message },
        "skipping entry that failed to normalize",
      );
    }
  }

  logger.info(
    { feedUrl: source.url, source: source.label, itemCount: items.length },
    "feed polled successfully",
  );
  return { source, items, error: null };
}
