/**
 * Note file storage: read, write, rename, trash
 */

import fs from 'fs/promises';
import path from 'path';

export const TRASH_DIR = '.trash';

/**
 * Normalize line endings to LF for internal processing.
 */
export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n/g, '\n');
}

export function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Read a note as UTF-8 with any BOM removed and CRLF folded to LF
 */
export async function readNoteFile(fullPath: string): Promise<string> {
  const raw = await fs.readFile(fullPath, 'utf-8');
  return normalizeLineEndings(stripBom(raw));
}

export async function writeNoteFile(fullPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, content, 'utf-8');
}

export async function fileExists(fullPath: string): Promise<boolean> {
  try {
    await fs.access(fullPath);
    return true;
  } catch {
    return false;
  }
}

export async function renameNoteFile(fromPath: string, toPath: string): Promise<void> {
  await fs.rename(fromPath, toPath);
}

/**
 * Move a note into <root>/.trash. An earlier trashed copy of the same name
 * is kept; the new one gets a numeric suffix.
 *
 * @returns absolute path of the trashed file
 */
export async function moveToTrash(vaultRoot: string, fullPath: string): Promise<string> {
  const trashDir = path.join(vaultRoot, TRASH_DIR);
  await fs.mkdir(trashDir, { recursive: true });

  const stem = path.basename(fullPath, '.md');
  let target = path.join(trashDir, `${stem}.md`);
  for (let n = 1; await fileExists(target); n++) {
    target = path.join(trashDir, `${stem} ${n}.md`);
  }

  await fs.rename(fullPath, target);
  return target;
}
