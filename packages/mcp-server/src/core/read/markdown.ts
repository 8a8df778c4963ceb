/**
 * Fence-aware markdown structure: code fences, headings and section bounds.
 *
 * Every consumer that needs to know "is this line code?" goes through
 * scanFences, so headings, sections, validation and link handling all agree.
 */

import type { Heading, SectionBounds } from './types.js';

export const HEADING_REGEX = /^(#+)\s+(.+)$/;

const FENCE_REGEX = /^(`{3,})/;

export interface FenceScan {
  /** Closed fences as [openLine, closeLine], 1-indexed */
  closed: Array<[number, number]>;
  /** Opening lines of fences never closed, 1-indexed */
  unclosed: number[];
}

function fenceTicks(line: string): number {
  const match = line.trim().match(FENCE_REGEX);
  return match ? match[1].length : 0;
}

/**
 * Scan code fences. Only one fence is open at a time; while open, a fence
 * line closes it only when its backtick run is at least as long as the opener.
 */
export function scanFences(lines: string[]): FenceScan {
  const closed: Array<[number, number]> = [];
  let open: { line: number; ticks: number } | null = null;

  for (let i = 0; i < lines.length; i++) {
    const ticks = fenceTicks(lines[i]);
    if (ticks === 0) continue;

    if (open === null) {
      open = { line: i + 1, ticks };
    } else if (ticks >= open.ticks) {
      closed.push([open.line, i + 1]);
      open = null;
    }
  }

  return { closed, unclosed: open ? [open.line] : [] };
}

/**
 * Per-line flag: true for fence delimiters and everything between them.
 * An unclosed fence runs to the end of the document.
 */
export function fencedLineMask(lines: string[]): boolean[] {
  const mask = new Array<boolean>(lines.length).fill(false);
  const { closed, unclosed } = scanFences(lines);

  for (const [start, end] of closed) {
    for (let n = start; n <= end; n++) mask[n - 1] = true;
  }
  for (const start of unclosed) {
    for (let n = start; n <= lines.length; n++) mask[n - 1] = true;
  }

  return mask;
}

/**
 * Extract all headings outside fenced code
 */
export function extractHeadings(content: string): Heading[] {
  const lines = content.split('\n');
  const fenced = fencedLineMask(lines);
  const headings: Heading[] = [];

  for (let i = 0; i < lines.length; i++) {
    if (fenced[i]) continue;

    const match = lines[i].match(HEADING_REGEX);
    if (match) {
      headings.push({
        level: match[1].length,
        text: match[2].trim(),
        line: i,
      });
    }
  }

  return headings;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function headingLevel(trimmed: string): number {
  const match = trimmed.match(/^(#+)\s/);
  return match ? match[1].length : 0;
}

/**
 * Locate a section by heading selector.
 *
 * "## Notes" matches a heading line exactly; a bare "Notes" matches a
 * heading of any level with that text. The section runs until the next
 * heading of the same or a higher level.
 */
export function findSectionBounds(lines: string[], selector: string): SectionBounds | null {
  const fenced = fencedLineMask(lines);
  const wanted = selector.trim();

  let headingIndex = -1;
  let level = 0;

  if (wanted.startsWith('#')) {
    level = (wanted.match(/^#+/)?.[0] ?? '').length;
    headingIndex = lines.findIndex((line, i) => !fenced[i] && line.trim() === wanted);
  } else {
    const pattern = new RegExp(`^(#+)\\s*${escapeRegex(wanted)}\\s*$`);
    for (let i = 0; i < lines.length; i++) {
      if (fenced[i]) continue;
      const match = lines[i].trim().match(pattern);
      if (match) {
        headingIndex = i;
        level = match[1].length;
        break;
      }
    }
  }

  if (headingIndex === -1) return null;

  const start = headingIndex + 1;
  let end = lines.length;
  for (let i = start; i < lines.length; i++) {
    if (fenced[i]) continue;
    const found = headingLevel(lines[i].trim());
    if (found > 0 && found <= level) {
      end = i;
      break;
    }
  }

  return { start, end, level };
}
