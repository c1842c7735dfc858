import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Single row (id = 1) holding the time of the last completed run.
export const runState = sqliteTable("run_state", {
  id: integer("id").primaryKey(),
  lastRunAt: integer("last_run_at", { mode: "timestamp_ms" }).notNull(),
});

export const seenItems = sqliteTable("seen_items", {
  identity: text("identity").primaryKey(),
});
