import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { VersionSymbol } from '../core/registry.js';
import { renderNoteFile } from './render-note.js';

/** File extension of generated notes. */
export const NOTE_FILE_EXTENSION = '.asciidoc';

/** Target path for one symbol's note. */
export function noteFilePath(outputDir: string, name: string): string {
  return path.join(outputDir, `${name}${NOTE_FILE_EXTENSION}`);
}

/**
 * Write one note per symbol, replacing existing files.
 * Writes run one after another; files written before a failure are left in place.
 */
export async function writeNotes(outputDir: string, symbols: readonly VersionSymbol[]): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const written: string[] = [];
  for (const symbol of symbols) {
    const filePath = noteFilePath(outputDir, symbol.name);
    await writeFile(filePath, renderNoteFile(symbol), 'utf8');
    written.push(filePath);
  }

  return written;
}
