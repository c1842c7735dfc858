// pattern: Imperative Shell
import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Logger } from "pino";
import { writeFileAtomic } from "../atomic-write";
import type { RunState } from "../pipeline/types";
import { defaultRunState } from "./types";
import type { RunStateStore, RunStateStoreOptions } from "./types";

const persistedRunStateSchema = z.object({
  version: z.literal(1),
  lastRunTimestamp: z.string().datetime(),
  seenIdentities: z.array(z.string()),
});

type PersistedRunState = z.infer<typeof persistedRunStateSchema>;

export type FileStateStoreOptions = RunStateStoreOptions & {
  readonly path: string;
  readonly logger: Logger;
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Run state kept as a JSON document, for example:
 *
 * ```json
 * { "version": 1, "lastRunTimestamp": "2024-01-15T12:00:00.000Z", "seenIdentities": ["https://…"] }
 * ```
 */
export function createFileStateStore(
  options: FileStateStoreOptions,
): RunStateStore {
  const { path, logger } = options;
  const now = options.now ?? (() => new Date());
  const fallback = (): RunState =>
    defaultRunState(now(), options.defaultWindowHours);

  return {
    async load() {
      let raw: string;
      try {
        raw = await readFile(path, "utf-8");
      } catch (err) {
        if (isNotFound(err)) {
          logger.info({ path }, "no run state found, using defaults");
        } else {
          const message = err instanceof Error ? err.message : String(err);
          logger.warn({ path, error: message }, "failed to read run state, using defaults");
        }
        return fallback();
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ path, error: message }, "run state is not valid JSON, using defaults");
        return fallback();
      }

      const result = persistedRunStateSchema.safeParse(parsed);
      if (!result.success) {
        const issues = result.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ");
        logger.warn({ path, error: issues }, "run state failed validation, using defaults");
        return fallback();
      }

      logger.debug(
        { path, seenCount: result.data.seenIdentities.length },
        "run state loaded",
      );
      return {
        lastRunTimestamp: new Date(result.data.lastRunTimestamp),
        seenIdentities: new Set(result.data.seenIdentities),
      };
    },

    async save(state) {
      const document: PersistedRunState = {
        version: 1,
        lastRunTimestamp: state.lastRunTimestamp.toISOString(),
        seenIdentities: [...state.seenIdentities],
      };

      await writeFileAtomic(path, `${JSON.stringify(document, null, 2)}\n`);
      logger.debug(
        { path, seenCount: document.seenIdentities.length },
        "run state saved",
      );
    },
  };
}
