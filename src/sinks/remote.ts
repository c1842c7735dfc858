// pattern: Imperative Shell
import type { Logger } from "pino";
import type { NormalizedItem } from "../pipeline/types";
import type { ItemDelivery, Sink } from "./types";

export type RemoteSinkOptions = {
  readonly endpoint: string;
  readonly token: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
};

/**
 * Item shape expected by the remote collection.
 */
export type CollectionPayload = {
  readonly title: string;
  readonly summary: string;
  readonly image: string;
  readonly link: string;
  readonly category: string;
  readonly publishedDate: string;
  readonly featured: boolean;
};

export type SubmissionSummary = {
  readonly sentCount: number;
  readonly results: ReadonlyArray<ItemDelivery>;
};

export function toCollectionPayload(item: NormalizedItem): CollectionPayload {
  return {
    title: item.title,
    summary: item.description,
    image: item.imageUrl ?? "",
    link: item.link,
    category: item.category ?? "",
    publishedDate: item.publishedAt?.toISOString() ?? "",
    featured: false,
  };
}

function parseResponseBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

async function submitItem(
  item: NormalizedItem,
  options: RemoteSinkOptions,
): Promise<ItemDelivery> {
  try {
    const response = await fetch(options.endpoint, {
      method: "POST",
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        ...options.headers,
        Authorization: options.token,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(toCollectionPayload(item)),
    });

    if (!response.ok) {
      return {
        identity: item.identity,
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
      };
    }

    const body = await response.text();
    return { identity: item.identity, success: true, response: parseResponseBody(body) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { identity: item.identity, success: false, error: message };
  }
}

/**
 * Submits items one at a time, in order. A failed submission is recorded and
 * the remaining items are still sent.
 */
export async function submitItems(
  items: ReadonlyArray<NormalizedItem>,
  options: RemoteSinkOptions,
  logger: Logger,
): Promise<SubmissionSummary> {
  const results: Array<ItemDelivery> = [];

  for (const item of items) {
    const result = await submitItem(item, options);
    results.push(result);

    if (result.success) {
      logger.info({ identity: item.identity, title: item.title }, "item sent to remote sink");
    } else {
      logger.warn(
        { identity: item.identity, title: item.title, error: result.error },
        "remote submission failed",
      );
    }
  }

  const sentCount = results.filter((r) => r.success).length;
  return { sentCount, results };
}

/**
 * Creates a sink that POSTs each new item to the remote collection endpoint.
 * Delivery is at-least-once: items are not retried once the run state has
 * recorded them, so the receiver should tolerate duplicates keyed on `link`.
 */
export function createRemoteSink(options: RemoteSinkOptions): Sink {
  return {
    name: "remote",
    kind: "remote",
    async deliver(batch, logger) {
      const { sentCount, results } = await submitItems(batch.newItems, options, logger);
      logger.info(
        { sink: "remote", sentCount, failedCount: results.length - sentCount },
        "remote dispatch complete",
      );
      return { sink: "remote", kind: "remote", delivered: sentCount, error: null, deliveries: results };
    },
  };
}
