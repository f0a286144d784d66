import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { initLedgerSchema, ledgerPath, openLedger } from '../core/db.js';
import {
  finishRun,
  forgetNotes,
  getAllNotes,
  getLedgerCounts,
  getNoteBySourcePath,
  getRecentRuns,
  startRun,
  upsertNote,
} from '../core/ledger.js';

const record = {
  sourcePath: 'daily-review.md',
  slug: 'daily_review',
  title: 'Daily Review',
  sourceCreated: new Date('2025-01-01T23:30:00Z'),
  sourceModified: new Date('2025-01-02T08:00:00Z'),
};

describe('ledger', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    initLedgerSchema(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should record and update notes by source path', () => {
    upsertNote(db, record, new Date('2025-03-01T00:00:00Z'));
    upsertNote(db, { ...record, sourceModified: new Date('2025-01-05T00:00:00Z') }, new Date('2025-03-02T00:00:00Z'));

    const row = getNoteBySourcePath(db, 'daily-review.md');
    expect(row).toMatchObject({
      slug: 'daily_review',
      title: 'Daily Review',
      source_created: '2025-01-01T23:30:00.000Z',
      source_modified: '2025-01-05T00:00:00.000Z',
      imported_at: '2025-03-01T00:00:00.000Z',
      updated_at: '2025-03-02T00:00:00.000Z',
    });
    expect(getAllNotes(db)).toHaveLength(1);
  });

  it('should move a source to a new slug', () => {
    upsertNote(db, record);
    upsertNote(db, { ...record, slug: 'weekly_review', title: 'Weekly Review' });

    expect(getAllNotes(db).map(r => [r.source_path, r.slug])).toEqual([['daily-review.md', 'weekly_review']]);
  });

  it('should release a slug still held by another source', () => {
    upsertNote(db, record);
    upsertNote(db, { ...record, sourcePath: 'renamed.md' });

    expect(getAllNotes(db).map(r => [r.source_path, r.slug])).toEqual([['renamed.md', 'daily_review']]);
  });

  it('should forget the given sources only', () => {
    upsertNote(db, record);
    upsertNote(db, { ...record, sourcePath: 'other.md', slug: 'other' });
    forgetNotes(db, ['daily-review.md', 'never-recorded.md']);

    expect(getAllNotes(db).map(r => r.source_path)).toEqual(['other.md']);
  });

  it('should track runs', () => {
    const first = startRun(db, false, new Date('2025-03-01T00:00:00Z'));
    finishRun(db, first, { imported: 2, updated: 0, skipped: 1, failed: 1 }, new Date('2025-03-01T00:01:00Z'));
    startRun(db, true, new Date('2025-03-02T00:00:00Z'));

    const runs = getRecentRuns(db);
    expect(runs.map(r => r.dry_run)).toEqual([1, 0]);
    expect(runs[0].finished_at).toBeNull();
    expect(runs[1]).toMatchObject({ imported: 2, updated: 0, skipped: 1, failed: 1, finished_at: '2025-03-01T00:01:00.000Z' });
    expect(getLedgerCounts(db)).toEqual({ notes: 0, runs: 2 });
  });
});

describe('openLedger', () => {
  let notebook: string;

  beforeEach(() => {
    notebook = fs.mkdtempSync(path.join(os.tmpdir(), 'notezim-ledger-'));
  });

  afterEach(() => {
    fs.rmSync(notebook, { recursive: true, force: true });
  });

  it('should create the ledger inside the notebook', () => {
    const db = openLedger(notebook);
    upsertNote(db, record);
    db.close();

    expect(fs.existsSync(ledgerPath(notebook))).toBe(true);
    const reopened = openLedger(notebook);
    expect(getNoteBySourcePath(reopened, 'daily-review.md')?.slug).toBe('daily_review');
    reopened.close();
  });

  it('should not create anything for a dry run', () => {
    const db = openLedger(notebook, { dryRun: true });
    upsertNote(db, record);
    db.close();
    expect(fs.readdirSync(notebook)).toEqual([]);
  });

  it('should give a dry run a private copy of the existing ledger', () => {
    const real = openLedger(notebook);
    upsertNote(real, record);
    real.close();

    const copy = openLedger(notebook, { dryRun: true });
    expect(getAllNotes(copy)).toHaveLength(1);
    upsertNote(copy, { ...record, sourcePath: 'other.md', slug: 'other' });
    copy.close();

    const again = openLedger(notebook);
    expect(getAllNotes(again).map(r => r.source_path)).toEqual(['daily-review.md']);
    again.close();
  });
});
