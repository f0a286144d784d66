/**
 * Decides whether a managed page must be (re)generated.
 *
 * Both sides are compared as epoch milliseconds, so the answer does not depend
 * on the local zone or on daylight-saving transitions.
 */

export type ChangeAction = 'import' | 'update' | 'skip';

export interface ChangeInput {
  pageExists: boolean;
  /** Note modification time recorded when the page was last written. */
  recordedModified?: Date;
  /** Filesystem mtime of the page, used when nothing was recorded. */
  pageModified?: Date;
  /** Metadata modification time of the note, else its filesystem mtime. */
  noteModified: Date;
}

export interface ChangeDecision {
  action: ChangeAction;
  /** The page-side time the note was compared against. */
  reference?: Date;
  reason: string;
}

export function detectChange(input: ChangeInput): ChangeDecision {
  if (!input.pageExists) {
    return { action: 'import', reason: 'no managed page yet' };
  }

  const reference = input.recordedModified ?? input.pageModified;
  if (!reference) {
    // Page on disk but no way to date it: regenerate rather than guess.
    return { action: 'update', reason: 'managed page has no recorded time' };
  }

  if (input.noteModified.getTime() > reference.getTime()) {
    return { action: 'update', reference, reason: 'note modified after last import' };
  }
  return { action: 'skip', reference, reason: 'managed page is up to date' };
}
