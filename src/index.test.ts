import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Writable } from "node:stream";
import pino from "pino";
import { loadConfig, toFeedSources } from "./config";
import { createLogger } from "./logger";
import { createStateStore } from "./state";

/**
 * Startup wiring: configuration loading, logging and store selection.
 */

describe("entry point wiring", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "feed-relay-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, yaml: string): string {
    const configPath = join(tmpDir, name);
    writeFileSync(configPath, yaml);
    return configPath;
  }

  describe("loadConfig", () => {
    it("should apply defaults to a minimal config", () => {
      const config = loadConfig(
        writeConfig("minimal.yaml", "feeds:\n  - https://example.com/rss\n"),
      );

      expect(config).toEqual({
        feeds: ["https://example.com/rss"],
        fetch: {
          timeoutMs: 15000,
          retries: 0,
          retryDelayMs: 1000,
          maxConcurrency: 1,
          userAgent: "FeedRelay/1.0 (+https://github.com/feed-relay/feed-relay)",
        },
        extraction: { maxItemsPerFeed: 10 },
        normalize: { identity: "link", descriptionFormat: "text" },
        dedup: { policy: "identity" },
        state: { driver: "file", path: "./data/run-state.json", defaultWindowHours: 24 },
        sinks: {
          files: {
            enabled: true,
            directory: "./data",
            basename: "new_items",
            scope: "new",
            formats: ["json", "csv", "html"],
          },
        },
      });
    });

    it("should load the bundled example config", () => {
      const examplePath = fileURLToPath(new URL("../config.example.yaml", import.meta.url));

      const config = loadConfig(examplePath);

      expect(config.feeds).toHaveLength(3);
      expect(config.fetch.retries).toBe(1);
      expect(config.sinks.remote).toEqual({
        endpoint: "https://api.example.com/collections/news/items",
        headers: { "x-site-id": "your-site-id", "x-account-id": "your-account-id" },
        timeoutMs: 15000,
      });
    });

    it("should throw when feeds are missing", () => {
      const configPath = writeConfig("no-feeds.yaml", "dedup:\n  policy: identity\n");

      expect(() => loadConfig(configPath)).toThrow("invalid feed-relay config");
      expect(() => loadConfig(configPath)).toThrow(/feeds/);
    });

    it("should name the file and report an empty document at the root", () => {
      const configPath = writeConfig("empty.yaml", "");

      expect(() => loadConfig(configPath)).toThrow(
        `invalid feed-relay config ${configPath}:\n  - (root): Expected object, received null`,
      );
    });

    it("should throw when the feed list is empty", () => {
      const configPath = writeConfig("empty-feeds.yaml", "feeds: []\n");

      expect(() => loadConfig(configPath)).toThrow("invalid feed-relay config");
    });

    it("should throw on a feed that is not a URL", () => {
      const configPath = writeConfig(
        "bad-url.yaml",
        "feeds:\n  - https://example.com/rss\n  - not-a-url\n",
      );

      expect(() => loadConfig(configPath)).toThrow(/feeds\.1/);
    });

    it("should throw on an unknown dedup policy", () => {
      const configPath = writeConfig(
        "bad-policy.yaml",
        "feeds:\n  - https://example.com/rss\ndedup:\n  policy: newest\n",
      );

      expect(() => loadConfig(configPath)).toThrow(/dedup\.policy/);
    });

    it("should throw on too many retries", () => {
      const configPath = writeConfig(
        "bad-retries.yaml",
        "feeds:\n  - https://example.com/rss\nfetch:\n  retries: 9\n",
      );

      expect(() => loadConfig(configPath)).toThrow(/fetch\.retries/);
    });

    it("should throw on malformed YAML", () => {
      const configPath = writeConfig("broken.yaml", "feeds: [https://example.com/rss\n");

      expect(() => loadConfig(configPath)).toThrow(
        /^feed-relay config .*broken\.yaml is not valid YAML: /,
      );
    });

    it("should throw when the file does not exist", () => {
      expect(() => loadConfig(join(tmpDir, "missing.yaml"))).toThrow(
        `cannot read feed-relay config ${join(tmpDir, "missing.yaml")}: `,
      );
    });
  });

  describe("toFeedSources", () => {
    it("should label feeds by name or host", () => {
      expect(
        toFeedSources([
          "https://feeds.example.com/rss",
          { url: "https://blog.example.org/feed", name: "Example Blog" },
          { url: "https://news.example.net/atom" },
        ]),
      ).toEqual([
        { url: "https://feeds.example.com/rss", label: "feeds.example.com" },
        { url: "https://blog.example.org/feed", label: "Example Blog" },
        { url: "https://news.example.net/atom", label: "news.example.net" },
      ]);
    });
  });

  describe("createStateStore", () => {
    const logger = pino({ level: "silent" });
    const state = {
      lastRunTimestamp: new Date("2024-01-15T12:00:00Z"),
      seenIdentities: new Set(["https://example.com/1"]),
    };

    it("should persist through the file driver", async () => {
      const path = join(tmpDir, "state", "run-state.json");
      const { store, close } = createStateStore(
        { driver: "file", path, defaultWindowHours: 24 },
        logger,
      );

      await store.save(state);
      const loaded = await store.load();
      close();

      expect(loaded).toEqual(state);
    });

    it("should persist through the sqlite driver", async () => {
      const path = join(tmpDir, "state", "run-state.db");
      const first = createStateStore({ driver: "sqlite", path, defaultWindowHours: 24 }, logger);
      await first.store.save(state);
      first.close();

      const second = createStateStore({ driver: "sqlite", path, defaultWindowHours: 24 }, logger);
      const loaded = await second.store.load();
      second.close();

      expect(loaded).toEqual(state);
    });
  });

  describe("structured log output", () => {
    function captureStream(chunks: Array<string>): Writable {
      return new Writable({
        write(chunk: Buffer, _encoding: string, callback: () => void) {
          chunks.push(chunk.toString("utf-8"));
          callback();
        },
      });
    }

    it("should log JSON with label levels, ISO time and context fields", () => {
      const chunks: Array<string> = [];
      const logger = createLogger("info", captureStream(chunks));

      logger.info({ feedUrl: "https://example.com/rss" }, "feed polled successfully");

      expect(chunks).toHaveLength(1);
      const line: unknown = JSON.parse(chunks[0] ?? "");
      expect(line).toMatchObject({
        level: "info",
        msg: "feed polled successfully",
        feedUrl: "https://example.com/rss",
        time: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
      });
    });

    it("should drop messages below the configured level", () => {
      const chunks: Array<string> = [];
      const logger = createLogger("warn", captureStream(chunks));

      logger.info("hidden");
      logger.warn("shown");

      expect(chunks).toHaveLength(1);
      expect(JSON.parse(chunks[0] ?? "")).toMatchObject({ level: "warn", msg: "shown" });
    });
  });
});
