import type { NormalizedItem } from "../pipeline/types";
import { toItemRecord } from "./records";

export function renderItemsJson(items: ReadonlyArray<NormalizedItem>): string {
  return `${JSON.stringify(items.map(toItemRecord), null, 2)}\n`;
}
