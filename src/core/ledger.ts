import type Database from 'better-sqlite3';
import { nanoid } from 'nanoid';

export interface NoteRow {
  id: string;
  source_path: string;
  slug: string;
  title: string;
  source_created: string;
  source_modified: string;
  imported_at: string;
  updated_at: string;
}

export interface RunRow {
  id: string;
  started_at: string;
  finished_at: string | null;
  dry_run: number;
  imported: number;
  updated: number;
  skipped: number;
  failed: number;
}

export interface NoteRecordInput {
  sourcePath: string;
  slug: string;
  title: string;
  sourceCreated: Date;
  sourceModified: Date;
}

export interface RunCounts {
  imported: number;
  updated: number;
  skipped: number;
  failed: number;
}

/**
 * Get the ledger record of a source note by its path relative to the notes
 * directory. Returns undefined if the note was never written.
 */
export function getNoteBySourcePath(db: Database.Database, sourcePath: string): NoteRow | undefined {
  return db.prepare<[string], NoteRow>('SELECT * FROM notes WHERE source_path = ?').get(sourcePath);
}

/**
 * Get all recorded notes.
 */
export function getAllNotes(db: Database.Database): NoteRow[] {
  return db.prepare<[], NoteRow>('SELECT * FROM notes ORDER BY source_path').all();
}

/**
 * Record that a managed page was written for a note.
 *
 * A slug belongs to one source at a time: a stale row still holding the slug
 * (its source deleted or renamed) is released first.
 */
export function upsertNote(db: Database.Database, input: NoteRecordInput, at: Date = new Date()): void {
  const stamp = at.toISOString();
  const write = db.transaction(() => {
    db.prepare('DELETE FROM notes WHERE slug = ? AND source_path != ?').run(input.slug, input.sourcePath);
    db.prepare(`
      INSERT INTO notes (id, source_path, slug, title, source_created, source_modified, imported_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_path) DO UPDATE SET
        slug = excluded.slug,
        title = excluded.title,
        source_created = excluded.source_created,
        source_modified = excluded.source_modified,
        updated_at = excluded.updated_at
    `).run(
      nanoid(),
      input.sourcePath,
      input.slug,
      input.title,
      input.sourceCreated.toISOString(),
      input.sourceModified.toISOString(),
      stamp,
      stamp
    );
  });
  write();
}

/**
 * Drop the records of sources that no longer exist, releasing their slugs.
 */
export function forgetNotes(db: Database.Database, sourcePaths: string[]): void {
  const remove = db.prepare<[string]>('DELETE FROM notes WHERE source_path = ?');
  const forget = db.transaction((paths: string[]) => {
    for (const sourcePath of paths) remove.run(sourcePath);
  });
  forget(sourcePaths);
}

/**
 * Open a run record. Returns the run ID.
 */
export function startRun(db: Database.Database, dryRun: boolean, at: Date = new Date()): string {
  const id = nanoid();
  db.prepare('INSERT INTO runs (id, started_at, dry_run) VALUES (?, ?, ?)').run(id, at.toISOString(), dryRun ? 1 : 0);
  return id;
}

export function finishRun(db: Database.Database, id: string, counts: RunCounts, at: Date = new Date()): void {
  db.prepare(`
    UPDATE runs SET
      finished_at = ?,
      imported = ?,
      updated = ?,
      skipped = ?,
      failed = ?
    WHERE id = ?
  `).run(at.toISOString(), counts.imported, counts.updated, counts.skipped, counts.failed, id);
}

/**
 * Most recent runs first.
 */
export function getRecentRuns(db: Database.Database, limit = 5): RunRow[] {
  return db.prepare<[number], RunRow>('SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?').all(limit);
}

/**
 * Get counts of recorded notes and runs. Dry runs only ever touch an
 * in-memory copy, so a ledger on disk holds real runs alone.
 */
export function getLedgerCounts(db: Database.Database): { notes: number; runs: number } {
  const count = (sql: string) => db.prepare<[], { count: number }>(sql).get()?.count ?? 0;
  return {
    notes: count('SELECT COUNT(*) as count FROM notes'),
    runs: count('SELECT COUNT(*) as count FROM runs'),
  };
}
