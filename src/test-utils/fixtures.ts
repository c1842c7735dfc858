import { vi } from "vitest";
import type { AppConfig } from "../config";
import type { NormalizedItem, RunState } from "../pipeline/types";
import type { RunStateStore } from "../state/types";

/**
 * Creates a default AppConfig suitable for testing. File sinks are disabled
 * and fetches never wait between retries.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    feeds: ["https://feeds.example.com/rss"],
    fetch: {
      timeoutMs: 1000,
      retries: 0,
      retryDelayMs: 0,
      maxConcurrency: 1,
      userAgent: "FeedRelay/test",
    },
    extraction: { maxItemsPerFeed: 10 },
    normalize: { identity: "link", descriptionFormat: "text" },
    dedup: { policy: "identity" },
    state: {
      driver: "file",
      path: "./data/run-state.json",
      defaultWindowHours: 24,
    },
    sinks: {
      files: {
        enabled: false,
        directory: "./data",
        basename: "new_items",
        scope: "new",
        formats: ["json", "csv", "html"],
      },
    },
    ...overrides,
  };
}

export function createTestItem(overrides?: Partial<NormalizedItem>): NormalizedItem {
  return {
    identity: "https://example.com/posts/1",
    title: "Test Item",
    description: "A test description",
    link: "https://example.com/posts/1",
    imageUrl: null,
    category: null,
    publishedAt: new Date("2024-01-15T10:00:00Z"),
    source: "example.com",
    ...overrides,
  };
}

export type FeedEntryFixture = {
  readonly title?: string;
  readonly link?: string;
  readonly description?: string;
  readonly pubDate?: string;
  readonly category?: string;
};

/**
 * Builds an RSS 2.0 document. Field values are inserted verbatim, so callers
 * escape or wrap in CDATA as the test requires.
 */
export function buildRssFeed(entries: ReadonlyArray<FeedEntryFixture>): string {
  const items = entries.map((e) =>
    [
      "<item>",
      e.title !== undefined ? `<title>${e.title}</title>` : "",
      e.link !== undefined ? `<link>${e.link}</link>` : "",
      e.description !== undefined ? `<description>${e.description}</description>` : "",
      e.pubDate !== undefined ? `<pubDate>${e.pubDate}</pubDate>` : "",
      e.category !== undefined ? `<category>${e.category}</category>` : "",
      "</item>",
    ].join(""),
  );

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0"><channel>',
    "<title>Test Channel</title><link>https://example.com/</link>",
    ...items,
    "</channel></rss>",
  ].join("\n");
}

export type FakeResponse = {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  readonly text: () => Promise<string>;
};

export function textResponse(body: string, status = 200, statusText = "OK"): FakeResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(body),
  };
}

/**
 * Replaces global fetch with a stub answering from `routes` by exact URL.
 * Unknown URLs reject like a DNS failure; Error routes reject with that error.
 */
export function stubFetch(routes: Readonly<Record<string, FakeResponse | Error>>) {
  const fetchMock = vi.fn(
    async (url: string, _init?: RequestInit): Promise<FakeResponse> => {
      const route = routes[url];
      if (route === undefined) throw new Error(`getaddrinfo ENOTFOUND ${url}`);
      if (route instanceof Error) throw route;
      return route;
    },
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/**
 * In-process run-state store recording every save.
 */
export function createMemoryStateStore(
  initial: RunState,
): RunStateStore & { readonly saves: Array<RunState> } {
  let current = initial;
  const saves: Array<RunState> = [];

  return {
    saves,
    load: () => Promise.resolve(current),
    save: (state) => {
      saves.push(state);
      current = state;
      return Promise.resolve();
    },
  };
}
