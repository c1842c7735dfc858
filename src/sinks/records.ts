import type { NormalizedItem } from "../pipeline/types";

/**
 * Flat, serialisable form of a normalized item used by the file sinks.
 */
export type ItemRecord = {
  readonly identity: string;
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly imageUrl: string | null;
  readonly category: string | null;
  readonly publishedAt: string | null;
  readonly source: string;
};

export const ITEM_RECORD_FIELDS = [
  "identity",
  "title",
  "description",
  "link",
  "imageUrl",
  "category",
  "publishedAt",
  "source",
] as const satisfies ReadonlyArray<keyof ItemRecord>;

export function toItemRecord(item: NormalizedItem): ItemRecord {
  return {
    identity: item.identity,
    title: item.title,
    description: item.description,
    link: item.link,
    imageUrl: item.imageUrl,
    category: item.category,
    publishedAt: item.publishedAt?.toISOString() ?? null,
    source: item.source,
  };
}
