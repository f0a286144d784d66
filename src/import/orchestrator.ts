/**
 * One import run: notes directory in, managed pages and journal backlinks out.
 *
 * Per note the pipeline is
 *   allocate slug → detect change → convert → repair heading →
 *   link from journal → write page → record in ledger
 *
 * The journal is written before the page and the ledger last, so a crash
 * leaves either nothing or an extra (deduplicated) journal link, and the next
 * run redoes the note. A failing note is logged and counted; the run goes on.
 */

import type Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import type { MarkupConverter } from '../convert/converter.js';
import { finishRun, forgetNotes, getAllNotes, startRun, upsertNote, type NoteRow } from '../core/ledger.js';
import { formatLocalDisplay, localDateKey, toLocal, type LocalDateTime } from '../core/time.js';
import { ConversionError, errorMessage, isNotezimError } from '../errors.js';
import { readNote, resolvedCreated, resolvedModified, resolvedTitle, type Note } from '../scanner/note.js';
import { walkNotes } from '../scanner/walk.js';
import { mtimeIfExists } from '../zim/files.js';
import { removeDuplicateHeading } from '../zim/headings.js';
import { JournalMaintainer, type JournalEvent } from '../zim/journal.js';
import {
  ensureStoreRootPage,
  listStoreSlugs,
  managedPageName,
  managedPagePath,
  readPageTitle,
  renderPage,
  writePage,
} from '../zim/page.js';
import { SlugAllocator, type ExistingPage } from '../zim/slug.js';
import { formatTags } from '../zim/tags.js';
import { detectChange } from './change-detector.js';

export const STORE_ROOT_TITLE = 'Raw AI Notes';

export interface ImportOptions {
  notesPath: string;
  notebookPath: string;
  recursive: boolean;
  /** Namespace directory holding the managed pages. */
  store: string;
  /** Journal namespace. */
  journal: string;
  /** Journal section collecting the backlinks. */
  section: string;
  /** IANA zone for local dates; the process zone when absent. */
  timeZone?: string;
  dryRun: boolean;
}

export interface ImportDeps {
  converter: MarkupConverter;
  logger: Logger;
  ledger: Database.Database;
  /** Clock for ledger stamps and new journal pages. */
  now?: () => Date;
}

export type NoteOutcome = 'imported' | 'updated' | 'skipped' | 'failed';

export interface NoteResult {
  relativePath: string;
  outcome: NoteOutcome;
  slug?: string;
  error?: string;
}

export interface ImportSummary {
  runId: string;
  imported: number;
  updated: number;
  skipped: number;
  failed: number;
  results: NoteResult[];
}

/** Oldest first, so the first-seen note of a title keeps the base slug. */
export function compareNotes(a: Note, b: Note): number {
  const byCreated = resolvedCreated(a).getTime() - resolvedCreated(b).getTime();
  if (byCreated !== 0) return byCreated;
  return a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0;
}

interface RunContext {
  options: ImportOptions;
  deps: ImportDeps;
  now: () => Date;
  allocator: SlugAllocator;
  journal: JournalMaintainer;
  records: Map<string, NoteRow>;
}

function local(context: RunContext, date: Date): LocalDateTime {
  return toLocal(date, context.options.timeZone);
}

async function importNote(context: RunContext, note: Note, position: string): Promise<NoteResult> {
  const { options, deps } = context;
  const log = deps.logger.child({ note: note.relativePath });

  const title = resolvedTitle(note);
  const created = resolvedCreated(note);
  const modified = resolvedModified(note);

  const slug = context.allocator.allocate(title, note.relativePath);
  const pagePath = managedPagePath(options.notebookPath, options.store, slug);
  const pageName = managedPageName(options.store, slug);

  const record = context.records.get(note.relativePath);
  const pageModified = mtimeIfExists(pagePath);
  const decision = detectChange({
    pageExists: pageModified !== undefined,
    recordedModified: record && record.slug === slug ? new Date(record.source_modified) : undefined,
    pageModified,
    noteModified: modified,
  });

  if (decision.action === 'skip') {
    // An adopted page (source renamed, or ledger lost) changes owner in the ledger only.
    if (record?.slug !== slug) {
      upsertNote(
        deps.ledger,
        { sourcePath: note.relativePath, slug, title, sourceCreated: created, sourceModified: modified },
        context.now()
      );
    }
    log.info({ page: pageName, reason: decision.reason }, `${position} Skipped ${note.relativePath}`);
    return { relativePath: note.relativePath, outcome: 'skipped', slug };
  }

  const event: JournalEvent = decision.action === 'import' ? 'created' : 'updated';
  const createdLocal = local(context, created);
  const modifiedLocal = local(context, modified);
  const eventDate = event === 'created' ? createdLocal : modifiedLocal;

  // Dry runs decide and link (in memory) but never start the converter.
  let content: string | undefined;
  if (!options.dryRun) {
    const converted = await deps.converter.convert(note.body);
    content = renderPage({
      title,
      created: createdLocal,
      modified: modifiedLocal,
      body: removeDuplicateHeading(converted, note.metadata.title, note.baseName),
      tags: formatTags(note.metadata.tags),
      journal: options.journal,
    });
  }

  context.journal.link({ date: eventDate, target: pageName, label: title, event });
  if (content !== undefined) writePage(pagePath, content);

  upsertNote(
    deps.ledger,
    { sourcePath: note.relativePath, slug, title, sourceCreated: created, sourceModified: modified },
    context.now()
  );

  const outcome: NoteOutcome = decision.action === 'import' ? 'imported' : 'updated';
  const verb = outcome === 'imported' ? 'Imported' : 'Updated';
  log.info(
    {
      page: pageName,
      journal: localDateKey(eventDate),
      created: formatLocalDisplay(createdLocal),
      modified: formatLocalDisplay(modifiedLocal),
      reason: decision.reason,
      dryRun: options.dryRun || undefined,
    },
    `${position} ${options.dryRun ? '[dry run] ' : ''}${verb} ${note.relativePath}`
  );
  return { relativePath: note.relativePath, outcome, slug };
}

function failure(logger: Logger, relativePath: string, error: unknown, position?: string): NoteResult {
  logger.error(
    {
      note: relativePath,
      code: isNotezimError(error) ? error.code : undefined,
      stderr: error instanceof ConversionError && error.stderr ? error.stderr : undefined,
      err: error,
    },
    `${position ? `${position} ` : ''}Failed ${relativePath}: ${errorMessage(error)}`
  );
  return { relativePath, outcome: 'failed', error: errorMessage(error) };
}

/**
 * Import every note under `options.notesPath` into the notebook.
 *
 * Resolves with the per-note results once all notes were tried. Rejects only
 * when the notes directory itself cannot be listed.
 */
export async function runImport(options: ImportOptions, deps: ImportDeps): Promise<ImportSummary> {
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger;

  const files = walkNotes(options.notesPath, { recursive: options.recursive });
  logger.info(
    { notes: options.notesPath, notebook: options.notebookPath, dryRun: options.dryRun || undefined },
    `Found ${files.length} note${files.length === 1 ? '' : 's'}`
  );

  const runId = startRun(deps.ledger, options.dryRun, now());
  const results: NoteResult[] = [];

  const notes: Note[] = [];
  for (const file of files) {
    try {
      notes.push(readNote(file, logger));
    } catch (error) {
      results.push(failure(logger, file.relativePath, error));
    }
  }
  notes.sort(compareNotes);

  // A slug stays owned only while its source note still exists.
  const gone = getAllNotes(deps.ledger)
    .map(row => row.source_path)
    .filter(sourcePath => !fs.existsSync(path.join(options.notesPath, sourcePath)));
  if (gone.length > 0) {
    forgetNotes(deps.ledger, gone);
    logger.debug({ sources: gone }, `Released ${gone.length} page${gone.length === 1 ? '' : 's'} of removed notes`);
  }

  const records = new Map(getAllNotes(deps.ledger).map(row => [row.source_path, row]));
  const owners = new Map([...records.values()].map(row => [row.slug, row.source_path]));
  const existing = new Map<string, ExistingPage>(
    listStoreSlugs(options.notebookPath, options.store).map(slug => [slug, { owner: owners.get(slug) }])
  );

  const context: RunContext = {
    options,
    deps,
    now,
    records,
    allocator: new SlugAllocator({
      existing,
      readTitle: slug => readPageTitle(managedPagePath(options.notebookPath, options.store, slug)),
    }),
    journal: new JournalMaintainer({
      notebookPath: options.notebookPath,
      journal: options.journal,
      section: options.section,
      dryRun: options.dryRun,
      now: () => toLocal(now(), options.timeZone),
      logger,
    }),
  };

  if (!options.dryRun && notes.length > 0) {
    try {
      if (ensureStoreRootPage(options.notebookPath, options.store, STORE_ROOT_TITLE, toLocal(now(), options.timeZone))) {
        logger.debug({ store: options.store }, 'Created store root page');
      }
    } catch (error) {
      logger.warn({ err: error }, `Cannot create store root page: ${errorMessage(error)}`);
    }
  }

  for (const [index, note] of notes.entries()) {
    const position = `[${index + 1}/${notes.length}]`;
    try {
      results.push(await importNote(context, note, position));
    } catch (error) {
      results.push(failure(logger, note.relativePath, error, position));
    }
  }

  const count = (outcome: NoteOutcome) => results.filter(r => r.outcome === outcome).length;
  const summary: ImportSummary = {
    runId,
    imported: count('imported'),
    updated: count('updated'),
    skipped: count('skipped'),
    failed: count('failed'),
    results,
  };

  finishRun(deps.ledger, runId, summary, now());
  logger.info(
    {
      imported: summary.imported,
      updated: summary.updated,
      skipped: summary.skipped,
      failed: summary.failed,
      dryRun: options.dryRun || undefined,
    },
    `${options.dryRun ? 'Dry run finished' : 'Import finished'}: ` +
      `${summary.imported} imported, ${summary.updated} updated, ${summary.skipped} skipped, ${summary.failed} failed`
  );
  return summary;
}
