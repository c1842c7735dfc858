import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { createFileStateStore } from "./file-store";

const logger = pino({ level: "silent" });
const now = () => new Date("2024-03-01T12:00:00Z");

describe("createFileStateStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "run-state-"));
    path = join(dir, "run-state.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function store() {
    return createFileStateStore({ path, logger, defaultWindowHours: 24, now });
  }

  it("should use defaults when no state file exists", async () => {
    const state = await store().load();

    expect(state.lastRunTimestamp.toISOString()).toBe("2024-02-29T12:00:00.000Z");
    expect(state.seenIdentities.size).toBe(0);
  });

  it("should round-trip saved state", async () => {
    const saved = {
      lastRunTimestamp: new Date("2024-02-10T08:30:00Z"),
      seenIdentities: new Set(["https://example.com/1", "sha256:abc"]),
    };

    await store().save(saved);
    const loaded = await store().load();

    expect(loaded.lastRunTimestamp).toEqual(saved.lastRunTimestamp);
    expect([...loaded.seenIdentities]).toEqual(["https://example.com/1", "sha256:abc"]);
  });

  it("should write a readable JSON document", async () => {
    await store().save({
      lastRunTimestamp: new Date("2024-02-10T08:30:00Z"),
      seenIdentities: new Set(["a"]),
    });

    const written = await readFile(path, "utf-8");

    expect(JSON.parse(written)).toEqual({
      version: 1,
      lastRunTimestamp: "2024-02-10T08:30:00.000Z",
      seenIdentities: ["a"],
    });
    expect(written.endsWith("}\n")).toBe(true);
  });

  it("should leave no temporary files behind", async () => {
    await store().save({ lastRunTimestamp: now(), seenIdentities: new Set(["a"]) });
    await store().save({ lastRunTimestamp: now(), seenIdentities: new Set(["a", "b"]) });

    expect(await readdir(dir)).toEqual(["run-state.json"]);
  });

  it("should replace the previous state on save", async () => {
    await store().save({ lastRunTimestamp: now(), seenIdentities: new Set(["a", "b"]) });
    await store().save({ lastRunTimestamp: now(), seenIdentities: new Set(["c"]) });

    const loaded = await store().load();

    expect([...loaded.seenIdentities]).toEqual(["c"]);
  });

  it("should create missing parent directories", async () => {
    path = join(dir, "nested", "deeper", "run-state.json");

    await store().save({ lastRunTimestamp: now(), seenIdentities: new Set() });

    expect(await readdir(join(dir, "nested", "deeper"))).toEqual(["run-state.json"]);
  });

  it("should use defaults when the file is not valid JSON", async () => {
    await writeFile(path, "{ not json", "utf-8");

    const state = await store().load();

    expect(state.lastRunTimestamp.toISOString()).toBe("2024-02-29T12:00:00.000Z");
    expect(state.seenIdentities.size).toBe(0);
  });

  it("should use defaults when the document has the wrong shape", async () => {
    await writeFile(
      path,
      JSON.stringify({ version: 1, lastRunTimestamp: "yesterday", seenIdentities: "a" }),
      "utf-8",
    );

    const state = await store().load();

    expect(state.lastRunTimestamp.toISOString()).toBe("2024-02-29T12:00:00.000Z");
    expect(state.seenIdentities.size).toBe(0);
  });

  it("should use defaults when the file is empty", async () => {
    await writeFile(path, "", "utf-8");

    const state = await store().load();

    expect(state.seenIdentities.size).toBe(0);
  });

  it("should reject when the state cannot be written", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "file, not a directory", "utf-8");
    path = join(blocker, "run-state.json");

    await expect(
      store().save({ lastRunTimestamp: now(), seenIdentities: new Set() }),
    ).rejects.toThrow();
  });
});
