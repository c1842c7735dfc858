// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DispatchBatch, Sink, SinkReport } from "./types";

export type DispatchResult = {
  readonly reports: ReadonlyArray<SinkReport>;
  /** Items accepted by remote sinks. */
  readonly sentCount: number;
};

/**
 * Delivers a batch to every sink in turn. A sink that throws is recorded as
 * failed and the remaining sinks are still attempted.
 */
export async function dispatchToSinks(
  sinks: ReadonlyArray<Sink>,
  batch: DispatchBatch,
  logger: Logger,
): Promise<DispatchResult> {
  const reports: Array<SinkReport> = [];

  for (const sink of sinks) {
    try {
      reports.push(await sink.deliver(batch, logger));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ sink: sink.name, error: message }, "sink delivery failed");
      reports.push({
        sink: sink.name,
        kind: sink.kind,
        delivered: 0,
        error: message,
        deliveries: [],
      });
    }
  }

  const sentCount = reports
    .filter((r) => r.kind === "remote")
    .reduce((sum, r) => sum + r.delivered, 0);

  return { reports, sentCount };
}
