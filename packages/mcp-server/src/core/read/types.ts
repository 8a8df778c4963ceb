/**
 * Core types for vault indexing and structural edits
 */

/** Decoded YAML front matter, keys in file order */
export type FrontMatter = Record<string, unknown>;

/** A parsed note from the vault */
export interface Note {
  name: string;                  // File stem, unique key in the index
  path: string;                  // Absolute path on disk
  relativePath: string;          // Relative to vault root, forward slashes
  frontMatter: FrontMatter;      // {} when absent, malformed or not a mapping
  rawFrontMatter: string | null; // YAML text between the --- lines, as on disk
  body: string;                  // Text after the front-matter block
  outgoingLinks: string[];       // [[wikilink]] targets in body order
  tags: string[];                // From frontMatter.tags
}

export type WarningRule = 'unclosed-code-block' | 'table-blank-line' | 'broken-link';

/** Non-blocking finding returned after a write */
export interface ValidationWarning {
  line: number;        // 1-indexed
  message: string;
  rule: WarningRule;
}

export interface Heading {
  level: number;
  text: string;
  line: number;        // 0-indexed
}

/**
 * A heading-delimited section. `start` is the first line after the heading,
 * `end` is exclusive; the heading itself sits at `start - 1`.
 */
export interface SectionBounds {
  start: number;
  end: number;
  level: number;
}

export type SearchMode = 'name' | 'name_partial' | 'content' | 'tag';

export type TagLogic = 'and' | 'or';

export type LinkDirection = 'out' | 'in' | 'both';
