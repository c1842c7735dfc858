import type { RunState } from "../pipeline/types";

/**
 * Persists run state between invocations.
 *
 * `load` never throws: missing or unreadable state yields the default from
 * {@link defaultRunState}. `save` replaces the stored state atomically and
 * rejects when it cannot.
 */
export type RunStateStore = {
  readonly load: () => Promise<RunState>;
  readonly save: (state: RunState) => Promise<void>;
};

export type RunStateStoreOptions = {
  readonly defaultWindowHours: number;
  readonly now?: () => Date;
};

const HOUR_MS = 60 * 60 * 1000;

export function defaultRunState(now: Date, windowHours: number): RunState {
  return {
    lastRunTimestamp: new Date(now.getTime() - windowHours * HOUR_MS),
    seenIdentities: new Set(),
  };
}
