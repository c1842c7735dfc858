// pattern: functional-core
import { UNTITLED } from "../pipeline/extractor";
import type { NormalizedItem } from "../pipeline/types";

export const PAGE_TITLE = "Feed Relay Digest";

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// Only absolute http(s) URLs are rendered as links or images.
function safeUrl(url: string | null): string | null {
  if (!url) return null;
  return /^https?:\/\//i.test(url) ? url : null;
}

function formatDate(date: Date): string {
  return date.toISOString().split("T")[0] ?? date.toISOString();
}

function groupBySource(
  items: ReadonlyArray<NormalizedItem>,
): Map<string, Array<NormalizedItem>> {
  const groups = new Map<string, Array<NormalizedItem>>();
  for (const item of items) {
    const group = groups.get(item.source) ?? [];
    group.push(item);
    groups.set(item.source, group);
  }
  return groups;
}

function renderItem(item: NormalizedItem): string {
  const title = escapeHtml(item.title || UNTITLED);
  const href = safeUrl(item.link);
  const heading = href
    ? `<a href="${escapeHtml(href)}" style="color:#1a56db;font-size:16px;font-weight:600;text-decoration:none;">${title}</a>`
    : `<span style="font-size:16px;font-weight:600;">${title}</span>`;

  const dateline = item.publishedAt
    ? `<p style="margin:4px 0 0 0;color:#6b7280;font-size:12px;">${formatDate(item.publishedAt)}${item.category ? ` · ${escapeHtml(item.category)}` : ""}</p>`
    : item.category
      ? `<p style="margin:4px 0 0 0;color:#6b7280;font-size:12px;">${escapeHtml(item.category)}</p>`
      : "";

  const imageUrl = safeUrl(item.imageUrl);
  const image = imageUrl
    ? `<img src="${escapeHtml(imageUrl)}" alt="" style="display:block;max-width:100%;margin:8px 0 0 0;border-radius:4px;">`
    : "";

  const description = item.description
    ? `<p style="margin:8px 0 0 0;color:#374151;font-size:14px;line-height:1.5;">${escapeHtml(item.description).replace(/\n/g, "<br>")}</p>`
    : "";

  return `<div style="margin:0 0 20px 0;padding:0 0 16px 0;border-bottom:1px solid #e5e7eb;">${heading}${dateline}${image}${description}</div>`;
}

/**
 * Renders items as a standalone HTML page grouped by source, with inline
 * styles only. All feed text is escaped.
 */
export function renderItemsHtml(
  items: ReadonlyArray<NormalizedItem>,
  generatedAt: Date,
): string {
  const count = items.length;
  const countLabel = `${count} item${count !== 1 ? "s" : ""}`;

  const sections = Array.from(groupBySource(items).entries())
    .map(
      ([source, group]) =>
        `<h2 style="margin:24px 0 12px 0;font-size:18px;color:#111827;border-bottom:2px solid #111827;padding-bottom:4px;">${escapeHtml(source)}</h2>${group.map(renderItem).join("")}`,
    )
    .join("");

  return [
    "<!DOCTYPE html>",
    "<html>",
    `<head><meta charset="utf-8"><title>${PAGE_TITLE}</title></head>`,
    `<body style="margin:0;padding:24px;font-family:Arial,Helvetica,sans-serif;background:#ffffff;">`,
    `<div style="max-width:720px;margin:0 auto;">`,
    `<h1 style="margin:0;font-size:24px;color:#111827;">${PAGE_TITLE}</h1>`,
    `<p style="margin:4px 0 0 0;color:#6b7280;font-size:13px;">${countLabel} · generated ${formatDate(generatedAt)}</p>`,
    sections,
    "</div>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}
