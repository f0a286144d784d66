/**
 * Journal backlinks.
 *
 * Each local day has one journal page, `<notebook>/<journal>/YYYY/MM/DD.txt`.
 * Links to managed pages are collected under a dedicated section:
 *
 *   ===== AI Notes =====
 *   * [[raw_ai_notes:daily_review|Daily Review]]
 *   * [[raw_ai_notes:daily_review|Daily Review]] (updated)
 *
 * A (target, event) pair appears at most once per page, so re-running an
 * import never grows the list. Pages are read, updated in memory and written
 * back whole; edits made earlier in the same run are kept in an overlay, which
 * also keeps dry runs consistent without touching disk.
 */

import path from 'node:path';
import type { Logger } from 'pino';
import { formatFullDate, localDateKey, type LocalDateTime } from '../core/time.js';
import { PageWriteError, errorMessage } from '../errors.js';
import { journalPathSegments, journalTitle, linkLabel, pageHeader, sectionHeading, titleHeading } from './format.js';
import { parseHeading } from './headings.js';
import { readFileIfExists, writeFileAtomic } from './files.js';

export type JournalEvent = 'created' | 'updated';

export interface JournalLink {
  /** Local date (and time) the event happened. Picks the journal page. */
  date: LocalDateTime;
  /** Zim page name of the managed page, e.g. `raw_ai_notes:daily_review`. */
  target: string;
  label: string;
  event: JournalEvent;
}

export type JournalOutcome = 'created-page' | 'appended' | 'present';

export interface JournalResult {
  outcome: JournalOutcome;
  filePath: string;
}

export interface JournalOptions {
  notebookPath: string;
  /** Journal namespace, `Journal` by default in Zim. */
  journal: string;
  /** Section collecting the backlinks. */
  section: string;
  dryRun: boolean;
  /** Clock for the Creation-Date of new journal pages. */
  now: () => LocalDateTime;
  logger?: Logger;
}

const LINK_RE = /^\*\s+\[\[([^|\]]+)(?:\|[^\]]*)?\]\](?:\s+\((updated)\))?\s*$/;

/** Parse a backlink line into its target and event, if it is one. */
export function parseLinkLine(line: string): { target: string; event: JournalEvent } | undefined {
  const match = LINK_RE.exec(line.trim());
  if (!match) return undefined;
  return { target: match[1].trim(), event: match[2] === 'updated' ? 'updated' : 'created' };
}

export function formatLinkLine(link: Pick<JournalLink, 'target' | 'label' | 'event'>): string {
  const base = `* [[${link.target}|${linkLabel(link.label)}]]`;
  return link.event === 'updated' ? `${base} (updated)` : base;
}

/** Fresh journal page following Zim's journal template. */
export function newJournalPage(date: LocalDateTime, created: LocalDateTime): string {
  return `${pageHeader(created)}\n\n${titleHeading(journalTitle(date))}\nCreated ${formatFullDate(date)}\n`;
}

/**
 * Insert a link line at the end of the named section, adding the section when
 * missing. Returns the content unchanged when the (target, event) pair is
 * already listed in that section.
 */
export function addLinkToJournal(
  content: string,
  section: string,
  link: Pick<JournalLink, 'target' | 'label' | 'event'>
): { content: string; added: boolean } {
  const lines = content.replace(/\s+$/, '').split(/\r?\n/);
  const wanted = section.trim();

  const start = lines.findIndex(line => parseHeading(line)?.trim() === wanted);
  if (start === -1) {
    const updated = [...lines, '', sectionHeading(section), formatLinkLine(link)];
    return { content: updated.join('\n') + '\n', added: true };
  }

  let end = start + 1;
  while (end < lines.length && parseHeading(lines[end]) === undefined) end++;

  for (let i = start + 1; i < end; i++) {
    const existing = parseLinkLine(lines[i]);
    if (existing && existing.target === link.target && existing.event === link.event) {
      return { content, added: false };
    }
  }

  // Append after the section's last non-blank line.
  let insertAt = end;
  while (insertAt > start + 1 && lines[insertAt - 1].trim() === '') insertAt--;
  const updated = [...lines.slice(0, insertAt), formatLinkLine(link), ...lines.slice(insertAt)];
  return { content: updated.join('\n') + '\n', added: true };
}

export class JournalMaintainer {
  private readonly overlay = new Map<string, string>();

  constructor(private readonly options: JournalOptions) {}

  pagePath(date: LocalDateTime): string {
    return path.join(this.options.notebookPath, ...journalPathSegments(this.options.journal, date));
  }

  link(link: JournalLink): JournalResult {
    const filePath = this.pagePath(link.date);
    const current = this.overlay.get(filePath) ?? readFileIfExists(filePath);
    const base = current ?? newJournalPage(link.date, this.options.now());

    const { content, added } = addLinkToJournal(base, this.options.section, link);
    if (!added) {
      this.options.logger?.debug({ journal: filePath, target: link.target, event: link.event }, 'Journal link already present');
      return { outcome: 'present', filePath };
    }

    this.overlay.set(filePath, content);
    if (!this.options.dryRun) {
      try {
        writeFileAtomic(filePath, content);
      } catch (error) {
        this.overlay.delete(filePath);
        throw new PageWriteError(`Cannot write journal page ${filePath}: ${errorMessage(error)}`, {
          cause: error,
          context: { filePath },
        });
      }
    }

    const outcome: JournalOutcome = current === undefined ? 'created-page' : 'appended';
    this.options.logger?.info(
      { journal: localDateKey(link.date), target: link.target, event: link.event, dryRun: this.options.dryRun || undefined },
      outcome === 'created-page' ? 'Created journal page with link' : 'Appended journal link'
    );
    return { outcome, filePath };
  }
}
