import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export const LEDGER_DIR = '.notezim';
export const LEDGER_FILE = 'ledger.db';

export interface OpenLedgerOptions {
  /**
   * Work on an in-memory copy. Nothing is created or changed on disk, but
   * queries see the same history a real run would.
   */
  dryRun?: boolean;
}

export function ledgerPath(notebookPath: string): string {
  return join(notebookPath, LEDGER_DIR, LEDGER_FILE);
}

/** Create the ledger tables on an open connection if they are missing. */
export function initLedgerSchema(db: Database.Database): void {
  db.exec('PRAGMA foreign_keys = ON;');

  db.exec(`
    CREATE TABLE IF NOT EXISTS notes (
      id               TEXT PRIMARY KEY,
      source_path      TEXT NOT NULL UNIQUE,
      slug             TEXT NOT NULL UNIQUE,
      title            TEXT NOT NULL,
      source_created   TEXT NOT NULL,
      source_modified  TEXT NOT NULL,
      imported_at      TEXT NOT NULL,
      updated_at       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS runs (
      id           TEXT PRIMARY KEY,
      started_at   TEXT NOT NULL,
      finished_at  TEXT,
      dry_run      INTEGER NOT NULL DEFAULT 0,
      imported     INTEGER NOT NULL DEFAULT 0,
      updated      INTEGER NOT NULL DEFAULT 0,
      skipped      INTEGER NOT NULL DEFAULT 0,
      failed       INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_notes_slug ON notes(slug);
    CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
  `);
}

/**
 * Open the import ledger kept inside the notebook at `.notezim/ledger.db`.
 *
 * The rollback journal is used rather than WAL: a dry run copies the main
 * file into memory, and that copy must hold every committed row.
 */
export function openLedger(notebookPath: string, options: OpenLedgerOptions = {}): Database.Database {
  const dbPath = ledgerPath(notebookPath);

  let db: Database.Database;
  if (options.dryRun) {
    db = existsSync(dbPath) ? new Database(readFileSync(dbPath)) : new Database(':memory:');
  } else {
    const dbDir = join(notebookPath, LEDGER_DIR);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
    db = new Database(dbPath);
  }

  initLedgerSchema(db);
  return db;
}
