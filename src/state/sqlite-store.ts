// pattern: Imperative Shell
import { eq } from "drizzle-orm";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import { runState, seenItems } from "../db/schema";
import { defaultRunState } from "./types";
import type { RunStateStore, RunStateStoreOptions } from "./types";

const STATE_ROW_ID = 1;
const INSERT_CHUNK_SIZE = 500;

export type SqliteStateStoreOptions = RunStateStoreOptions & {
  readonly db: AppDatabase;
  readonly logger: Logger;
};

/**
 * Run state kept in SQLite. `save` rewrites both tables inside one
 * transaction.
 */
export function createSqliteStateStore(
  options: SqliteStateStoreOptions,
): RunStateStore {
  const { db, logger } = options;
  const now = options.now ?? (() => new Date());

  return {
    async load() {
      try {
        const row = db
          .select({ lastRunAt: runState.lastRunAt })
          .from(runState)
          .where(eq(runState.id, STATE_ROW_ID))
          .get();
        const seenIdentities = new Set(
          db
            .select({ identity: seenItems.identity })
            .from(seenItems)
            .all()
            .map((r) => r.identity),
        );

        if (!row) {
          logger.info("no run state recorded, using default window");
          const fallback = defaultRunState(now(), options.defaultWindowHours);
          return { ...fallback, seenIdentities };
        }

        logger.debug({ seenCount: seenIdentities.size }, "run state loaded");
        return { lastRunTimestamp: row.lastRunAt, seenIdentities };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ error: message }, "failed to read run state, using defaults");
        return defaultRunState(now(), options.defaultWindowHours);
      }
    },

    async save(state) {
      const identities = [...state.seenIdentities];

      db.transaction((tx) => {
        tx.delete(seenItems).run();

        for (let i = 0; i < identities.length; i += INSERT_CHUNK_SIZE) {
          tx.insert(seenItems)
            .values(
              identities
                .slice(i, i + INSERT_CHUNK_SIZE)
                .map((identity) => ({ identity })),
            )
            .run();
        }

        tx.insert(runState)
          .values({ id: STATE_ROW_ID, lastRunAt: state.lastRunTimestamp })
          .onConflictDoUpdate({
            target: runState.id,
            set: { lastRunAt: state.lastRunTimestamp },
          })
          .run();
      });

      logger.debug({ seenCount: identities.length }, "run state saved");
    },
  };
}
