export { fetchFeed, FEED_ACCEPT_HEADER } from "./fetcher";
export { extractEntries, splitEntrySegments, decodeEntities, UNTITLED } from "./extractor";
export {
  normalizeEntry,
  deriveIdentity,
  contentHash,
  extractImageUrl,
  convertDescription,
  parsePublishedAt,
} from "./normalizer";
export { pollFeed } from "./poller";
export { filterNewItems, sortByPublishedDesc, mergeSeenIdentities } from "./dedup";
export type {
  FeedSource,
  RawEntry,
  NormalizedItem,
  PollResult,
  RunState,
  IdentityStrategy,
  DescriptionFormat,
  DedupPolicy,
} from "./types";
export type { FetchResult, FetchOptions } from "./fetcher";
export type { ExtractOptions } from "./extractor";
export type { NormalizeOptions } from "./normalizer";
export type { PollOptions } from "./poller";
