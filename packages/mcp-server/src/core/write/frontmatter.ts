/**
 * Front-matter framing and YAML codec.
 *
 * Framing is matched with our own regex so the body comes back byte-for-byte;
 * gray-matter only handles the YAML in between.
 */

import matter from 'gray-matter';
import type { FrontMatter } from '../read/types.js';

const FRAME_REGEX = /^---\n([\s\S]*?)\n---\n?/;

export interface DecodedText {
  frontMatter: FrontMatter;
  rawFrontMatter: string | null;
  body: string;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Decode the YAML between the delimiters. Malformed YAML, or YAML that is
 * not a mapping, decodes to {}.
 */
export function parseFrontMatterYaml(raw: string): FrontMatter {
  try {
    // Passing options bypasses gray-matter's per-string cache, so callers
    // get a fresh object they are free to mutate.
    const parsed = matter(`---\n${raw}\n---\n`, {});
    const data: unknown = parsed.data;
    return isPlainObject(data) ? { ...data } : {};
  } catch {
    return {};
  }
}

/**
 * Split note text into front matter and body
 */
export function decodeFrontMatter(text: string): DecodedText {
  const match = FRAME_REGEX.exec(text);
  if (!match) {
    return { frontMatter: {}, rawFrontMatter: null, body: text };
  }

  return {
    frontMatter: parseFrontMatterYaml(match[1]),
    rawFrontMatter: match[1],
    body: text.slice(match[0].length),
  };
}

/**
 * Serialize front matter and body. An empty mapping yields the body alone.
 */
export function encodeFrontMatter(frontMatter: FrontMatter, body: string): string {
  if (Object.keys(frontMatter).length === 0) {
    return body;
  }

  // gray-matter always terminates the body with a newline; undo that so the
  // body is written exactly as given.
  const text = matter.stringify({ content: body }, frontMatter);
  return body.endsWith('\n') ? text : text.slice(0, -1);
}

/**
 * Interpret a value typed by a client. JSON lists, objects, booleans and
 * null are decoded; numbers and everything else stay the given string.
 */
export function parseFrontMatterValue(raw: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  if (Array.isArray(parsed) || isPlainObject(parsed) || typeof parsed === 'boolean' || parsed === null) {
    return parsed;
  }
  return raw;
}

/**
 * Rebuild note text around a new body, keeping the on-disk YAML untouched
 */
export function composeNote(rawFrontMatter: string | null, body: string): string {
  return rawFrontMatter === null ? body : `---\n${rawFrontMatter}\n---\n${body}`;
}
