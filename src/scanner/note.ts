import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { parseFrontMatter, type NoteMetadata } from './frontmatter.js';
import type { NoteFile } from './walk.js';

/** One source note, read and parsed. Immutable input to the import. */
export interface Note {
  absolutePath: string;
  /** Path relative to the notes directory; the note's identity in the ledger. */
  relativePath: string;
  /** File name without extension. Title fallback. */
  baseName: string;
  body: string;
  metadata: NoteMetadata;
  fileModified: Date;
}

export function readNote(file: NoteFile, logger?: Logger): Note {
  const raw = fs.readFileSync(file.absolutePath, 'utf-8');
  const stat = fs.statSync(file.absolutePath);
  const { metadata, body } = parseFrontMatter(raw, logger, file.relativePath);

  return {
    absolutePath: file.absolutePath,
    relativePath: file.relativePath,
    baseName: path.basename(file.absolutePath, path.extname(file.absolutePath)),
    body,
    metadata,
    fileModified: stat.mtime,
  };
}

export function resolvedTitle(note: Note): string {
  return note.metadata.title ?? note.baseName;
}

/** Metadata creation time, else the file's modification time. */
export function resolvedCreated(note: Note): Date {
  return note.metadata.created ?? note.fileModified;
}

/** Metadata modification time, else the file's modification time. */
export function resolvedModified(note: Note): Date {
  return note.metadata.modified ?? note.fileModified;
}
