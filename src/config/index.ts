import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, FeedConfig } from "./schema";
import type { FeedSource } from "../pipeline/types";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>): string {
  return issues
    .map((issue) => `  - ${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Reads and validates a feed-relay YAML config. Every failure names the file
 * and the stage that rejected it.
 */
export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new Error(`cannot read feed-relay config ${configPath}: ${errorMessage(err)}`);
  }

  let document: unknown;
  try {
    document = parse(raw);
  } catch (err) {
    throw new Error(`feed-relay config ${configPath} is not valid YAML: ${errorMessage(err)}`);
  }

  const result = appConfigSchema.safeParse(document);
  if (!result.success) {
    throw new Error(
      `invalid feed-relay config ${configPath}:\n${formatIssues(result.error.issues)}`,
    );
  }

  return result.data;
}

/**
 * Resolves configured feed entries into sources, labelling each with its
 * configured name or the host of its URL.
 */
export function toFeedSources(
  feeds: ReadonlyArray<FeedConfig>,
): ReadonlyArray<FeedSource> {
  return feeds.map((feed) => {
    const url = typeof feed === "string" ? feed : feed.url;
    const name = typeof feed === "string" ? undefined : feed.name;
    return { url, label: name ?? hostLabel(url) };
  });
}

function hostLabel(url: string): string {
  try {
    return new URL(url).hostname || url;
  } catch {
    return url;
  }
}

export type { AppConfig };
