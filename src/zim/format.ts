import {
  formatJournalTitle,
  formatLocalIso,
  formatLongDate,
  sameLocalDay,
  type LocalDateTime,
} from '../core/time.js';
import { singleLine } from './text.js';

export const ZIM_CONTENT_TYPE = 'text/x-zim-wiki';
export const ZIM_WIKI_FORMAT = 'zim 0.6';

/** The header block every Zim page file starts with. */
export function pageHeader(creation: LocalDateTime): string {
  return [
    `Content-Type: ${ZIM_CONTENT_TYPE}`,
    `Wiki-Format: ${ZIM_WIKI_FORMAT}`,
    `Creation-Date: ${formatLocalIso(creation)}`,
  ].join('\n');
}

/** Top-level (level 1) heading. */
export function titleHeading(title: string): string {
  return `====== ${singleLine(title)} ======`;
}

export function sectionHeading(title: string): string {
  return `===== ${singleLine(title)} =====`;
}

/** Link label safe to put between `[[…|` and `]]`. */
export function linkLabel(text: string): string {
  return singleLine(text).replace(/\|/g, '/').replace(/\[\[|\]\]/g, '');
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Zim page name of a journal day, e.g. `Journal:2025:01:01`. */
export function journalPageName(journal: string, local: LocalDateTime): string {
  return `${journal}:${local.year}:${pad(local.month)}:${pad(local.day)}`;
}

/** Path segments of a journal day below the notebook root. */
export function journalPathSegments(journal: string, local: LocalDateTime): string[] {
  return [journal, String(local.year), pad(local.month), `${pad(local.day)}.txt`];
}

export function journalTitle(local: LocalDateTime): string {
  return formatJournalTitle(local);
}

/** `[[Journal:2025:08:18|Created on August 18 2025]]` */
export function journalDateLink(journal: string, local: LocalDateTime, label: 'Created' | 'Modified'): string {
  return `[[${journalPageName(journal, local)}|${label} on ${formatLongDate(local)}]]`;
}

/**
 * The page's own "Journal Links" section: the day it was created and, when it
 * differs, the day it was last modified.
 */
export function journalLinksSection(journal: string, created?: LocalDateTime, modified?: LocalDateTime): string {
  const links: string[] = [];
  if (created) links.push(`* ${journalDateLink(journal, created, 'Created')}`);
  if (modified && !(created && sameLocalDay(created, modified))) {
    links.push(`* ${journalDateLink(journal, modified, 'Modified')}`);
  }
  if (links.length === 0) return '';
  return ['**Journal Links:**', ...links].join('\n');
}
