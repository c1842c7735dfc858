import type { Logger } from "pino";
import type { NormalizedItem } from "../pipeline/types";

export type SinkKind = "file" | "remote";

export type DispatchBatch = {
  readonly newItems: ReadonlyArray<NormalizedItem>;
  readonly allItems: ReadonlyArray<NormalizedItem>;
  readonly generatedAt: Date;
};

/**
 * Outcome of submitting one item to a sink that accepts items individually.
 */
export type ItemDelivery =
  | { readonly identity: string; readonly success: true; readonly response: unknown }
  | { readonly identity: string; readonly success: false; readonly error: string };

export type SinkReport = {
  readonly sink: string;
  readonly kind: SinkKind;
  readonly delivered: number;
  readonly error: string | null;
  readonly deliveries: ReadonlyArray<ItemDelivery>;
};

/**
 * A destination for dispatched items. `deliver` reports failures in the
 * returned report rather than throwing.
 */
export type Sink = {
  readonly name: string;
  readonly kind: SinkKind;
  readonly deliver: (batch: DispatchBatch, logger: Logger) => Promise<SinkReport>;
};
