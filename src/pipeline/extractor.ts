// pattern: functional-core
import type { Logger } from "pino";
import type { RawEntry } from "./types";

/**
 * Relaxed RSS/Atom entry scanner.
 *
 * This is intentionally not an XML parser. The document is cut into segments
 * at `<item>` / `<entry>` opening tags and each segment is searched for the
 * first occurrence of every known field by tag name. Missing closing tags,
 * unknown namespaces and unexpected nesting degrade to empty fields instead of
 * failing the feed.
 */

export const UNTITLED = "Untitled";

export type ExtractOptions = {
  readonly maxItemsPerFeed: number;
};

type TagMatch = {
  readonly attributes: Readonly<Record<string, string>>;
  readonly text: string;
};

const TITLE_TAGS = ["title"] as const;
const DESCRIPTION_TAGS = [
  "description",
  "content:encoded",
  "summary",
  "content",
] as const;
const PUBLISHED_TAGS = ["pubDate", "published", "dc:date", "updated"] as const;

const ENTRY_OPEN = /<(?:[\w.-]+:)?(item|entry)(?=[\s>/])([^>]*)>/gi;
const ATTRIBUTE = /([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;
const CDATA = /<!\[CDATA\[([\s\S]*?)(?:\]\]>|$)/g;
const ENTITY = /&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: '"',
  apos: "'",
  nbsp: "\u00a0",
};

/**
 * Decodes the predefined XML entities, `&nbsp;` and numeric character
 * references. Unknown references are left as they are.
 */
export function decodeEntities(text: string): string {
  return text.replace(ENTITY, (whole: string, ref: string) => {
    if (ref.startsWith("#")) {
      const hex = ref[1] === "x" || ref[1] === "X";
      const code = hex ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
      return Number.isInteger(code) && code >= 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : whole;
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? whole;
  });
}

function decodeText(raw: string): string {
  const pattern = new RegExp(CDATA.source, "g");
  let text = "";
  let last = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(raw)) !== null) {
    text += decodeEntities(raw.slice(last, match.index)) + (match[1] ?? "");
    last = match.index + match[0].length;
  }

  text += decodeEntities(raw.slice(last));
  return text.trim();
}

function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const pattern = new RegExp(ATTRIBUTE.source, "g");
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(raw)) !== null) {
    const name = match[1];
    if (!name) continue;
    attributes[name.toLowerCase()] = decodeEntities(
      match[2] ?? match[3] ?? match[4] ?? "",
    );
  }

  return attributes;
}

function openTagPattern(name: string, flags: string): RegExp {
  return new RegExp(`<${name}(?=[\\s>/])([^>]*)>`, flags);
}

// Text of an element whose closing tag is missing runs to the next tag.
function unterminatedText(rest: string): string {
  const leading = rest.length - rest.trimStart().length;
  if (rest.startsWith("<![CDATA[", leading)) {
    const end = rest.indexOf("]]>", leading);
    return end === -1 ? rest : rest.slice(0, end + 3);
  }
  const next = rest.indexOf("<");
  return next === -1 ? rest : rest.slice(0, next);
}

function findTag(segment: string, name: string): TagMatch | null {
  const open = openTagPattern(name, "i").exec(segment);
  if (!open) return null;

  const rawAttributes = open[1] ?? "";
  const attributes = parseAttributes(rawAttributes);
  if (rawAttributes.trimEnd().endsWith("/")) {
    return { attributes, text: "" };
  }

  const rest = segment.slice(open.index + open[0].length);
  const close = new RegExp(`</${name}\\s*>`, "i").exec(rest);
  const raw = close ? rest.slice(0, close.index) : unterminatedText(rest);

  return { attributes, text: decodeText(raw) };
}

function findAllAttributes(
  segment: string,
  name: string,
): Array<Record<string, string>> {
  const pattern = openTagPattern(name, "gi");
  const found: Array<Record<string, string>> = [];
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(segment)) !== null) {
    found.push(parseAttributes(match[1] ?? ""));
  }

  return found;
}

function readFirst(segment: string, names: ReadonlyArray<string>): string {
  for (const name of names) {
    const tag = findTag(segment, name);
    if (tag && tag.text) return tag.text;
  }
  return "";
}

function readLink(segment: string): string {
  const first = findTag(segment, "link");
  if (first?.text) return first.text;

  // Atom: <link rel="alternate" href="..."/>
  const links = findAllAttributes(segment, "link").filter((a) => a["href"]);
  const alternate = links.find((a) => !a["rel"] || a["rel"] === "alternate");
  return (alternate ?? links[0])?.["href"]?.trim() ?? "";
}

function readCategory(segment: string): string {
  const tag = findTag(segment, "category");
  if (!tag) return "";
  return tag.text || (tag.attributes["term"] ?? "").trim();
}

function firstUrl(
  candidates: ReadonlyArray<Record<string, string>>,
  accept: (attributes: Record<string, string>) => boolean,
): string | null {
  for (const attributes of candidates) {
    const url = attributes["url"]?.trim();
    if (url && accept(attributes)) return url;
  }
  return null;
}

function isImageType(attributes: Record<string, string>): boolean {
  return (attributes["type"] ?? "").toLowerCase().startsWith("image/");
}

function readMediaImage(segment: string): string | null {
  return (
    firstUrl(findAllAttributes(segment, "media:thumbnail"), () => true) ??
    firstUrl(
      findAllAttributes(segment, "media:content"),
      (a) => a["medium"] === "image" || isImageType(a),
    ) ??
    firstUrl(findAllAttributes(segment, "enclosure"), isImageType)
  );
}

/**
 * Splits a feed document into the raw markup of its entries, in document
 * order. A segment ends at its closing tag, or at the next entry when the
 * closing tag is missing.
 */
export function splitEntrySegments(xml: string): Array<string> {
  const pattern = new RegExp(ENTRY_OPEN.source, "gi");
  const opens: Array<{
    start: number;
    bodyStart: number;
    name: string;
    selfClosing: boolean;
  }> = [];
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(xml)) !== null) {
    opens.push({
      start: match.index,
      bodyStart: match.index + match[0].length,
      name: match[1] ?? "item",
      selfClosing: (match[2] ?? "").trimEnd().endsWith("/"),
    });
  }

  return opens.map((open, i) => {
    if (open.selfClosing) return "";
    const end = opens[i + 1]?.start ?? xml.length;
    const body = xml.slice(open.bodyStart, end);
    const close = new RegExp(`</(?:[\\w.-]+:)?${open.name}\\s*>`, "i").exec(body);
    return close ? body.slice(0, close.index) : body;
  });
}

export function readEntry(segment: string): RawEntry {
  return {
    title: readFirst(segment, TITLE_TAGS) || UNTITLED,
    link: readLink(segment),
    description: readFirst(segment, DESCRIPTION_TAGS),
    publishedRaw: readFirst(segment, PUBLISHED_TAGS),
    category: readCategory(segment),
    mediaImageUrl: readMediaImage(segment),
  };
}

/**
 * Extracts up to `maxItemsPerFeed` raw entries from feed markup.
 * An entry that cannot be read is logged and skipped; its siblings are kept.
 */
export function extractEntries(
  xml: string,
  options: ExtractOptions,
  logger: Logger,
): ReadonlyArray<RawEntry> {
  const segments = splitEntrySegments(xml);
  const entries: Array<RawEntry> = [];

  for (const [index, segment] of segments.entries()) {
    if (entries.length >= options.maxItemsPerFeed) break;

    try {
      entries.push(readEntry(segment));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ entryIndex: index, error: message }, "skipping unreadable feed entry");
    }
  }

  if (segments.length > entries.length) {
    logger.debug(
      { found: segments.length, kept: entries.length },
      "feed entries truncated",
    );
  }

  return entries;
}
