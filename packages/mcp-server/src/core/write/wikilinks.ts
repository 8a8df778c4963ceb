/**
 * Wikilink scanning and cascading rewrites.
 *
 * Scanning skips fenced code. Rewrites cover the whole file text, front
 * matter and fenced code included.
 */

import { fencedLineMask } from '../read/markdown.js';

/** [[Target]], [[Target#Section]], either with an optional |alias */
const SECTION_LINK_REGEX = /\[\[([^\]#|]+)(?:#([^\]|]+))?(?:\|[^\]]*)?\]\]/g;

export interface SectionLink {
  target: string;
  section: string | null;
  line: number;        // 1-indexed within the scanned content
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * List every wikilink with its optional section, in document order
 */
export function scanSectionLinks(content: string): SectionLink[] {
  const lines = content.split('\n');
  const fenced = fencedLineMask(lines);
  const links: SectionLink[] = [];

  lines.forEach((line, i) => {
    if (fenced[i]) return;
    for (const match of line.matchAll(SECTION_LINK_REGEX)) {
      const target = match[1].trim();
      if (!target) continue;
      const section = match[2]?.trim();
      links.push({ target, section: section ? section : null, line: i + 1 });
    }
  });

  return links;
}

export interface RewriteResult {
  content: string;
  count: number;
}

/**
 * Point [[oldName]], [[oldName|alias]] and [[oldName#section]] at newName
 * anywhere in the file, keeping the alias or section suffix.
 */
export function rewriteWikilinks(text: string, oldName: string, newName: string): RewriteResult {
  const pattern = new RegExp(`\\[\\[${escapeRegex(oldName)}([|#][^\\]]*?)?\\]\\]`, 'g');
  let count = 0;

  const content = text.replace(pattern, (_match: string, suffix: string | undefined) => {
    count++;
    return `[[${newName}${suffix ?? ''}]]`;
  });

  return { content: count === 0 ? text : content, count };
}
