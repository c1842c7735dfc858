import type { NormalizedItem } from "../pipeline/types";
import { ITEM_RECORD_FIELDS, toItemRecord } from "./records";

/**
 * Quotes a field when it contains a delimiter, quote or line break, doubling
 * embedded quotes (RFC 4180).
 */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Renders one header row and one row per item, CRLF-terminated (RFC 4180).
 */
export function renderItemsCsv(items: ReadonlyArray<NormalizedItem>): string {
  const header = ITEM_RECORD_FIELDS.join(",");
  const rows = items.map((item) => {
    const record = toItemRecord(item);
    return ITEM_RECORD_FIELDS.map((field) => escapeCsvField(record[field] ?? "")).join(",");
  });

  return `${[header, ...rows].join("\r\n")}\r\n`;
}
