/**
 * Markdown parser - extracts wikilinks, tags, and frontmatter
 *
 * Handles edge cases:
 * - Malformed YAML frontmatter (empty mapping, body kept intact)
 * - BOM-prefixed and CRLF files
 * - Wikilinks inside fenced code (ignored)
 */

import { decodeFrontMatter } from '../write/frontmatter.js';
import { readNoteFile } from '../write/writer.js';
import { fencedLineMask } from './markdown.js';
import type { FrontMatter, Note } from './types.js';
import type { VaultFile } from './vault.js';

/** Regex to match wikilinks: [[target]], [[target|alias]], [[target#heading]] */
export const WIKILINK_REGEX = /\[\[([^\]|#]+)(?:#[^\]|]*)?(?:\|([^\]]+))?\]\]/g;

/**
 * Extract wikilink targets from markdown content, in order, duplicates kept
 */
export function extractWikilinks(content: string): string[] {
  const links: string[] = [];
  const lines = content.split('\n');
  const fenced = fencedLineMask(lines);

  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    if (fenced[lineNum]) continue;

    for (const match of lines[lineNum].matchAll(WIKILINK_REGEX)) {
      const target = match[1].trim();
      if (target) {
        links.push(target);
      }
    }
  }

  return links;
}

/**
 * Extract tags from frontmatter. A single string is a one-tag list; list
 * elements are stringified; anything else has no tags.
 */
export function extractTags(frontmatter: FrontMatter): string[] {
  const fmTags = frontmatter.tags;
  if (Array.isArray(fmTags)) {
    return fmTags.map(tag => String(tag));
  }
  if (typeof fmTags === 'string') {
    return [fmTags];
  }
  return [];
}

/**
 * Build a Note from already-normalized file text
 */
export function parseNoteText(file: VaultFile, text: string): Note {
  const { frontMatter, rawFrontMatter, body } = decodeFrontMatter(text);

  return {
    name: file.name,
    path: file.absolutePath,
    relativePath: file.path,
    frontMatter,
    rawFrontMatter,
    body,
    outgoingLinks: extractWikilinks(body),
    tags: extractTags(frontMatter),
  };
}

/**
 * Read and parse a markdown file into a Note
 */
export async function parseNote(file: VaultFile): Promise<Note> {
  const text = await readNoteFile(file.absolutePath);
  return parseNoteText(file, text);
}
