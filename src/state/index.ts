import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { createDatabase } from "../db";
import { createFileStateStore } from "./file-store";
import { createSqliteStateStore } from "./sqlite-store";
import type { RunStateStore } from "./types";

export { createFileStateStore } from "./file-store";
export { createSqliteStateStore } from "./sqlite-store";
export { defaultRunState } from "./types";
export type { RunStateStore, RunStateStoreOptions } from "./types";

/**
 * Opens the run-state store selected by `state.driver`. `close` releases the
 * underlying database handle, if any.
 */
export function createStateStore(
  config: AppConfig["state"],
  logger: Logger,
): { readonly store: RunStateStore; readonly close: () => void } {
  if (config.driver === "sqlite") {
    const { db, close } = createDatabase(config.path);
    return {
      store: createSqliteStateStore({
        db,
        logger,
        defaultWindowHours: config.defaultWindowHours,
      }),
      close,
    };
  }

  return {
    store: createFileStateStore({
      path: config.path,
      logger,
      defaultWindowHours: config.defaultWindowHours,
    }),
    close: () => {},
  };
}
