import fs from 'node:fs';
import path from 'node:path';
import { isNoteFile, isSkippedDir } from './types.js';

export interface NoteFile {
  relativePath: string; // POSIX separators, stable across platforms
  absolutePath: string;
}

export interface WalkOptions {
  recursive?: boolean;
}

export function walkNotes(notesPath: string, options: WalkOptions = {}): NoteFile[] {
  const results: NoteFile[] = [];
  collect(notesPath, notesPath, options.recursive ?? false, results);

  // Code-unit order, independent of locale.
  results.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  return results;
}

function collect(root: string, dir: string, recursive: boolean, results: NoteFile[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive && !isSkippedDir(entry.name)) {
        collect(root, fullPath, recursive, results);
      }
    } else if (entry.isFile() && isNoteFile(entry.name)) {
      results.push({
        relativePath: path.relative(root, fullPath).split(path.sep).join('/'),
        absolutePath: fullPath,
      });
    }
  }
}
