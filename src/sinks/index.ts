import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { createFileSink } from "./file-sink";
import { createRemoteSink } from "./remote";
import type { Sink } from "./types";

export { createFileSink } from "./file-sink";
export type { FileFormat, FileSinkOptions } from "./file-sink";
export { createRemoteSink, submitItems, toCollectionPayload } from "./remote";
export type { CollectionPayload, RemoteSinkOptions, SubmissionSummary } from "./remote";
export { dispatchToSinks } from "./dispatcher";
export type { DispatchResult } from "./dispatcher";
export { renderItemsHtml } from "./renderer";
export { renderItemsCsv } from "./csv";
export { renderItemsJson } from "./json";
export type { DispatchBatch, ItemDelivery, Sink, SinkKind, SinkReport } from "./types";

/**
 * Builds the configured sinks: one file sink per enabled format, then the
 * remote sink when an endpoint is configured and a token is available.
 */
export function createSinks(
  config: AppConfig["sinks"],
  remoteToken: string | undefined,
  logger: Logger,
): Array<Sink> {
  const sinks: Array<Sink> = [];

  if (config.files.enabled) {
    for (const format of new Set(config.files.formats)) {
      sinks.push(createFileSink(format, config.files));
    }
  }

  if (config.remote) {
    if (remoteToken) {
      sinks.push(createRemoteSink({ ...config.remote, token: remoteToken }));
    } else {
      logger.warn(
        { endpoint: config.remote.endpoint },
        "REMOTE_SINK_TOKEN not set, remote sink disabled",
      );
    }
  }

  return sinks;
}
