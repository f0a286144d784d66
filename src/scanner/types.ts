import path from 'node:path';

/** Extensions the notes app writes. Matched case-insensitively. */
export const NOTE_EXTENSIONS: ReadonlySet<string> = new Set(['.md', '.markdown']);

/** Directories never descended into, besides hidden ones. */
export const SKIP_DIRS: ReadonlySet<string> = new Set(['@attachments', 'node_modules']);

export function isNoteFile(name: string): boolean {
  return !name.startsWith('.') && NOTE_EXTENSIONS.has(path.extname(name).toLowerCase());
}

export function isSkippedDir(name: string): boolean {
  return name.startsWith('.') || SKIP_DIRS.has(name);
}
