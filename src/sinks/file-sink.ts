// pattern: Imperative Shell
import { join } from "node:path";
import { writeFileAtomic } from "../atomic-write";
import type { NormalizedItem } from "../pipeline/types";
import { renderItemsCsv } from "./csv";
import { renderItemsJson } from "./json";
import { renderItemsHtml } from "./renderer";
import type { Sink } from "./types";

export type FileFormat = "json" | "csv" | "html";

export type FileSinkOptions = {
  readonly directory: string;
  readonly basename: string;
  readonly scope: "new" | "all";
};

const RENDERERS: Readonly<
  Record<FileFormat, (items: ReadonlyArray<NormalizedItem>, generatedAt: Date) => string>
> = {
  json: (items) => renderItemsJson(items),
  csv: (items) => renderItemsCsv(items),
  html: renderItemsHtml,
};

/**
 * Creates a sink that snapshots items to `<directory>/<basename>.<format>`.
 * The file is replaced atomically; a write failure is returned in the report.
 */
export function createFileSink(
  format: FileFormat,
  options: FileSinkOptions,
): Sink {
  const name = `file:${format}`;
  const path = join(options.directory, `${options.basename}.${format}`);

  return {
    name,
    kind: "file",
    async deliver(batch, logger) {
      const items = options.scope === "all" ? batch.allItems : batch.newItems;

      try {
        await writeFileAtomic(path, RENDERERS[format](items, batch.generatedAt));
        logger.info({ sink: name, path, itemCount: items.length }, "items written");
        return { sink: name, kind: "file", delivered: items.length, error: null, deliveries: [] };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ sink: name, path, error: message }, "file sink write failed");
        return { sink: name, kind: "file", delivered: 0, error: message, deliveries: [] };
      }
    },
  };
}
