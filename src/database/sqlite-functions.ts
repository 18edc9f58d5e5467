import type { Database } from 'better-sqlite3';

/**
 * SQLite's built-in `lower()` folds ASCII letters only. Replacing it with the
 * JavaScript folding keeps `LOWER(column) LIKE :pattern` in step with patterns
 * built by `containsPattern` and with the autocomplete ranker.
 */
export function registerSqliteFunctions(db: Database): void {
  db.function('lower', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  );
}
