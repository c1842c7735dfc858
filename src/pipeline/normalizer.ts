// pattern: functional-core
import { createHash } from "node:crypto";
import * as cheerio from "cheerio";
import TurndownService from "turndown";
import type { Logger } from "pino";
import type {
  DescriptionFormat,
  FeedSource,
  IdentityStrategy,
  NormalizedItem,
  RawEntry,
} from "./types";

export type NormalizeOptions = {
  readonly identity: IdentityStrategy;
  readonly descriptionFormat: DescriptionFormat;
};

const BLOCK_ELEMENTS =
  "p, div, li, tr, h1, h2, h3, h4, h5, h6, blockquote, pre, figcaption, section, article";

let turndownInstance: TurndownService | null = null;

function getTurndown(): TurndownService {
  if (!turndownInstance) {
    turndownInstance = new TurndownService({
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      bulletListMarker: "-",
    });
    turndownInstance.remove(["script", "style"]);
  }
  return turndownInstance;
}

/**
 * Hex SHA-256 over the given parts, prefixed with the algorithm so that a
 * hashed identity can never collide with a link.
 */
export function contentHash(...parts: ReadonlyArray<string>): string {
  const digest = createHash("sha256").update(parts.join("\n")).digest("hex");
  return `sha256:${digest}`;
}

/**
 * Derives the deduplication key for an entry.
 *
 * With the `link` strategy the link is the identity, and entries without a
 * link hash their title together with the feed URL so that distinct
 * link-less entries of different feeds stay distinct. With the `hash`
 * strategy the identity is always a hash of title and link.
 */
export function deriveIdentity(
  entry: RawEntry,
  source: FeedSource,
  strategy: IdentityStrategy,
): string {
  const link = entry.link.trim();

  if (strategy === "hash") {
    return contentHash(entry.title, link);
  }

  return link !== "" ? link : contentHash(entry.title, source.url);
}

/**
 * Returns the `src` of the first `<img>` in the markup, or null.
 */
export function extractImageUrl(markup: string): string | null {
  if (!/<img/i.test(markup)) return null;

  const $ = cheerio.load(markup, null, false);
  const src = $("img[src]").first().attr("src")?.trim();
  return src ? src : null;
}

/**
 * Strips markup down to text. Block elements and `<br>` become line breaks,
 * runs of whitespace collapse, and blank lines are dropped.
 */
export function toPlainText(markup: string): string {
  const $ = cheerio.load(markup, null, false);
  $("script, style").remove();
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).append("\n");

  return $.root()
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

export function toMarkdown(markup: string): string {
  return getTurndown().turndown(markup).trim();
}

/**
 * Converts description markup to the configured format. Falls back to the
 * original text when conversion fails.
 */
export function convertDescription(
  markup: string,
  format: DescriptionFormat,
  logger: Logger,
): string {
  if (markup === "") return "";

  try {
    return format === "markdown" ? toMarkdown(markup) : toPlainText(markup);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug({ format, error: message }, "description conversion failed, keeping original");
    return markup;
  }
}

// "Mon, 15 Jan 2024 10:30:00 GMT", "15 Jan 2024 10:30 +0100"
const RFC_822_DATE =
  /^(?:[a-z]{3,9},?\s+)?\d{1,2}\s+[a-z]{3,9}\s+\d{2,4}\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*(?:[a-z]{1,5}|[+-]\d{4}))?$/i;
// "2024-02-01", "2024-02-01T08:00:00Z", "2024-02-01 08:00:00.123+01:00"
const ISO_8601_DATE =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parses an RFC 822 or ISO 8601 timestamp. Anything else yields null, since
 * the platform date parser guesses dates from arbitrary text.
 */
export function parsePublishedAt(raw: string): Date | null {
  const trimmed = raw.trim();
  if (!RFC_822_DATE.test(trimmed) && !ISO_8601_DATE.test(trimmed)) return null;

  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function normalizeEntry(
  entry: RawEntry,
  source: FeedSource,
  options: NormalizeOptions,
  logger: Logger,
): NormalizedItem {
  return {
    identity: deriveIdentity(entry, source, options.identity),
    title: entry.title,
    description: convertDescription(entry.description, options.descriptionFormat, logger),
    link: entry.link.trim(),
    imageUrl: extractImageUrl(entry.description) ?? entry.mediaImageUrl,
    category: entry.category !== "" ? entry.category : null,
    publishedAt: parsePublishedAt(entry.publishedRaw),
    source: source.label,
  };
}
