/**
 * Vault scanner - finds all markdown files in a vault
 */

import * as fs from 'fs';
import * as path from 'path';
import { serverLog } from '../shared/serverLog.js';

/** File info returned by the scanner */
export interface VaultFile {
  name: string;          // File stem without .md
  path: string;          // Relative path from vault root
  absolutePath: string;  // Full filesystem path
}

/**
 * Recursively scan a vault directory for markdown files.
 *
 * Any file or directory whose name starts with "." is skipped, which keeps
 * .obsidian, .trash and .git out of the index. Entries are visited in name
 * order so the scan is repeatable.
 */
export async function scanVault(vaultPath: string): Promise<VaultFile[]> {
  const files: VaultFile[] = [];

  async function scan(dir: string, relativePath: string = ''): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      // Skip directories we can't read (permissions, races with deletes)
      serverLog('index', `Could not read directory ${dir}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;

      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        await scan(fullPath, relPath);
      } else if (entry.isFile() && entry.name.endsWith('.md')) {
        files.push({
          name: entry.name.slice(0, -'.md'.length),
          path: relPath,
          absolutePath: fullPath,
        });
      }
    }
  }

  await scan(vaultPath);
  return files;
}
