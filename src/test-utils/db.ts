import { createDatabase } from "../db";
import type { AppDatabase } from "../db";

/**
 * Creates an in-memory SQLite test database with the run-state tables.
 * @returns The database and a function closing it.
 */
export function createTestDatabase(): { readonly db: AppDatabase; readonly close: () => void } {
  return createDatabase(":memory:");
}
