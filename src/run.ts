// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { toFeedSources } from "./config";
import {
  filterNewItems,
  mergeSeenIdentities,
  pollFeed,
  sortByPublishedDesc,
} from "./pipeline";
import type { FeedSource, NormalizedItem, PollOptions, PollResult } from "./pipeline";
import { dispatchToSinks } from "./sinks";
import type { DispatchResult, Sink } from "./sinks";
import type { RunStateStore } from "./state";

export type RunDeps = {
  readonly config: AppConfig;
  readonly store: RunStateStore;
  readonly sinks: ReadonlyArray<Sink>;
  readonly logger: Logger;
  readonly now?: () => Date;
};

export type FeedFailure = {
  readonly url: string;
  readonly error: string;
};

export type RunSummary = {
  readonly startedAt: Date;
  readonly feedCount: number;
  readonly failedFeeds: ReadonlyArray<FeedFailure>;
  readonly itemsFound: number;
  readonly newItems: ReadonlyArray<NormalizedItem>;
  readonly sentCount: number;
  readonly dispatch: DispatchResult;
  readonly stateSaved: boolean;
  readonly errors: ReadonlyArray<string>;
};

async function pollIsolated(
  source: FeedSource,
  options: PollOptions,
  logger: Logger,
): Promise<PollResult> {
  try {
    return await pollFeed(source, options, logger);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { feedUrl: source.url, error: message },
      "unexpected error during feed processing",
    );
    return { source, items: [], error: message };
  }
}

function collectErrors(
  failedFeeds: ReadonlyArray<FeedFailure>,
  dispatch: DispatchResult,
): Array<string> {
  const errors = failedFeeds.map((f) => `feed ${f.url}: ${f.error}`);

  for (const report of dispatch.reports) {
    if (report.error !== null) {
      errors.push(`sink ${report.sink}: ${report.error}`);
    }
    for (const delivery of report.deliveries) {
      if (!delivery.success) {
        errors.push(`sink ${report.sink} item ${delivery.identity}: ${delivery.error}`);
      }
    }
  }

  return errors;
}

/**
 * Runs the pipeline once: load state, poll every feed, keep unseen items,
 * dispatch them, then save the merged state.
 *
 * Feeds may be polled concurrently, but items are collected in configured feed
 * order and sorted before filtering, so output never depends on completion
 * order. The state is saved exactly once, after dispatch was attempted; with
 * new items but no sinks it is not saved at all.
 */
export async function runOnce(deps: RunDeps): Promise<RunSummary> {
  const { config, store, sinks, logger } = deps;
  const startedAt = deps.now ? deps.now() : new Date();
  const sources = toFeedSources(config.feeds);

  logger.info({ feedCount: sources.length }, "run starting");

  const state = await store.load();

  const pollOptions: PollOptions = {
    fetch: config.fetch,
    extraction: config.extraction,
    normalize: config.normalize,
  };
  const limit = pLimit(config.fetch.maxConcurrency);
  const polls = await Promise.all(
    sources.map((source) => limit(() => pollIsolated(source, pollOptions, logger))),
  );

  const allItems: Array<NormalizedItem> = [];
  const failedFeeds: Array<FeedFailure> = [];
  for (const poll of polls) {
    if (poll.error !== null) {
      failedFeeds.push({ url: poll.source.url, error: poll.error });
      continue;
    }
    allItems.push(...poll.items);
  }

  const newItems = filterNewItems(allItems, state, config.dedup.policy);
  logger.info(
    { itemsFound: allItems.length, newCount: newItems.length, policy: config.dedup.policy },
    "deduplication complete",
  );

  let dispatch: DispatchResult = { reports: [], sentCount: 0 };
  const undeliverable = newItems.length > 0 && sinks.length === 0;
  if (undeliverable) {
    logger.warn(
      { newCount: newItems.length },
      "no sinks configured, leaving new items unseen",
    );
  } else if (newItems.length > 0) {
    dispatch = await dispatchToSinks(
      sinks,
      { newItems, allItems: sortByPublishedDesc(allItems), generatedAt: startedAt },
      logger,
    );
  } else {
    logger.info("no new items, skipping dispatch");
  }

  const errors = collectErrors(failedFeeds, dispatch);

  // State is left untouched when nothing could be delivered, so the items
  // stay new for the next run.
  let stateSaved = false;
  if (undeliverable) {
    errors.push(`dispatch: no sinks configured, ${newItems.length} new items not delivered`);
  } else {
    try {
      await store.save(mergeSeenIdentities(state, newItems, startedAt));
      stateSaved = true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "failed to save run state");
      errors.push(`run state: ${message}`);
    }
  }

  const summary: RunSummary = {
    startedAt,
    feedCount: sources.length,
    failedFeeds,
    itemsFound: allItems.length,
    newItems,
    sentCount: dispatch.sentCount,
    dispatch,
    stateSaved,
    errors,
  };

  logger.info(
    {
      feedCount: summary.feedCount,
      failedFeedCount: failedFeeds.length,
      itemsFound: summary.itemsFound,
      newCount: newItems.length,
      sentCount: summary.sentCount,
      errorCount: errors.length,
      stateSaved,
    },
    "run complete",
  );

  return summary;
}
