/**
 * Managed pages: one Zim page per imported note, stored as
 *   <notebook>/<store>/<slug>.txt   (page name `<store>:<slug>`)
 *
 * Pages are always rendered from scratch and written whole.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { LocalDateTime } from '../core/time.js';
import { PageWriteError, errorMessage } from '../errors.js';
import { journalLinksSection, pageHeader, titleHeading } from './format.js';
import { parseHeading } from './headings.js';
import { formatTagLine } from './tags.js';
import { readFileIfExists, writeFileAtomic } from './files.js';

export interface PageContent {
  title: string;
  /** Local time of the note's resolved creation; becomes Creation-Date. */
  created: LocalDateTime;
  /** Local time of the note's resolved modification. */
  modified?: LocalDateTime;
  /** Converted and repaired body. */
  body: string;
  tags: readonly string[];
  /** Journal namespace the page links into. */
  journal: string;
}

export function renderPage(page: PageContent): string {
  const sections = [
    pageHeader(page.created),
    titleHeading(page.title),
    page.body.replace(/\s+$/, '').replace(/^(?:[ \t]*\r?\n)+/, ''),
    journalLinksSection(page.journal, page.created, page.modified),
    formatTagLine(page.tags),
  ];
  return sections.filter(s => s.length > 0).join('\n\n') + '\n';
}

export function managedPagePath(notebookPath: string, store: string, slug: string): string {
  return path.join(notebookPath, store, `${slug}.txt`);
}

/** Page name as used inside Zim links. */
export function managedPageName(store: string, slug: string): string {
  return `${store}:${slug}`;
}

export function writePage(filePath: string, content: string): void {
  try {
    writeFileAtomic(filePath, content);
  } catch (error) {
    throw new PageWriteError(`Cannot write page ${filePath}: ${errorMessage(error)}`, {
      cause: error,
      context: { filePath },
    });
  }
}

/** Slugs of the pages currently in the store directory. */
export function listStoreSlugs(notebookPath: string, store: string): string[] {
  const dir = path.join(notebookPath, store);
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.endsWith('.txt') && !entry.name.startsWith('.'))
    .map(entry => entry.name.slice(0, -'.txt'.length));
}

/** Text of the first level-1 heading of a page file. */
export function readPageTitle(filePath: string): string | undefined {
  const content = readFileIfExists(filePath);
  if (content === undefined) return undefined;
  for (const line of content.split(/\r?\n/)) {
    if (/^\s*={6}[^=]/.test(line)) return parseHeading(line);
  }
  return undefined;
}

/**
 * Create `<notebook>/<store>.txt` so the namespace shows up as a page in
 * Zim's index. Returns true when the page was written.
 */
export function ensureStoreRootPage(notebookPath: string, store: string, title: string, created: LocalDateTime): boolean {
  const filePath = path.join(notebookPath, `${store}.txt`);
  if (fs.existsSync(filePath)) return false;
  writePage(filePath, `${pageHeader(created)}\n\n${titleHeading(title)}\n`);
  return true;
}
