// pattern: functional-core
import type { DedupPolicy, NormalizedItem, RunState } from "./types";

/**
 * Orders items by publish time, newest first. Undated items go last, and
 * items with equal keys keep their input order.
 */
export function sortByPublishedDesc(
  items: ReadonlyArray<NormalizedItem>,
): Array<NormalizedItem> {
  return [...items].sort((a, b) => {
    if (a.publishedAt && b.publishedAt) {
      return b.publishedAt.getTime() - a.publishedAt.getTime();
    }
    if (a.publishedAt) return -1;
    if (b.publishedAt) return 1;
    return 0;
  });
}

function isNovel(
  item: NormalizedItem,
  state: RunState,
  policy: DedupPolicy,
): boolean {
  if (state.seenIdentities.has(item.identity)) return false;
  if (policy === "identity") return true;

  return (
    item.publishedAt !== null &&
    item.publishedAt.getTime() > state.lastRunTimestamp.getTime()
  );
}

/**
 * Selects the items of this run that have not been dispatched before.
 *
 * `identity` keeps every item whose identity is unseen, dated or not.
 * `identity-and-time` additionally requires a publish time strictly after the
 * previous run, so undated items are never new under it. An identity that
 * repeats within the run is kept once, at its first position in sorted order.
 */
export function filterNewItems(
  items: ReadonlyArray<NormalizedItem>,
  state: RunState,
  policy: DedupPolicy,
): Array<NormalizedItem> {
  const kept = new Set<string>();
  const fresh: Array<NormalizedItem> = [];

  for (const item of sortByPublishedDesc(items)) {
    if (kept.has(item.identity) || !isNovel(item, state, policy)) continue;
    kept.add(item.identity);
    fresh.push(item);
  }

  return fresh;
}

/**
 * Returns the state to persist after dispatch: the previous identities plus
 * those of `dispatched`, stamped with this run's time.
 */
export function mergeSeenIdentities(
  state: RunState,
  dispatched: ReadonlyArray<NormalizedItem>,
  timestamp: Date,
): RunState {
  const seenIdentities = new Set(state.seenIdentities);
  for (const item of dispatched) {
    seenIdentities.add(item.identity);
  }
  return { lastRunTimestamp: timestamp, seenIdentities };
}
