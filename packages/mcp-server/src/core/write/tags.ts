/**
 * Tag matching, per-tag rules and the allowed-tag policy
 */

import { InvalidArgumentError, InvalidTagError } from '../shared/errors.js';
import type { FrontMatter, Note, TagLogic } from '../read/types.js';

/**
 * Hierarchical match: "vc" matches "vc" and "vc/project", never "vccorp"
 */
export function tagMatches(tags: string[], query: string): boolean {
  return tags.some(tag => tag === query || tag.startsWith(`${query}/`));
}

export function parseTagLogic(value: string): TagLogic {
  if (value === 'and' || value === 'or') return value;
  throw new InvalidArgumentError(`Invalid tag_logic: ${value}. Valid: and, or`);
}

/** Split "a, b,,c" into ["a", "b", "c"] */
export function parseTagQuery(query: string): string[] {
  return query.split(',').map(t => t.trim()).filter(t => t.length > 0);
}

export function matchesTagQuery(tags: string[], queries: string[], logic: TagLogic): boolean {
  return logic === 'or'
    ? queries.some(q => tagMatches(tags, q))
    : queries.every(q => tagMatches(tags, q));
}

/** Sorted, unique, non-blank tags used anywhere in the vault */
export function collectTags(notes: Note[]): string[] {
  const tags = new Set<string>();
  for (const note of notes) {
    for (const tag of note.tags) {
      if (tag.trim()) tags.add(tag);
    }
  }
  return [...tags].sort();
}

export interface TagRule {
  tag: string;
  check: (noteName: string, frontMatter: FrontMatter) => boolean;
  message: string;
}

export function defaultTagRules(contextTag: string): TagRule[] {
  return [
    {
      tag: 'Person',
      check: name => name.startsWith('@'),
      message: "Tag 'Person' is for people notes only. Note name must start with '@' (e.g. '@Jane Doe').",
    },
    {
      tag: contextTag,
      check: (_name, fm) => typeof fm.description === 'string' ? fm.description.trim() !== '' : Boolean(fm.description),
      message: `Tag '${contextTag}' marks notes with assistant instructions. Requires a 'description' field in frontmatter explaining when to read the note.`,
    },
  ];
}

export interface TagPolicyOptions {
  allowNewTags?: boolean;
  rules?: TagRule[];
}

export class TagPolicy {
  readonly allowNewTags: boolean;
  readonly rules: TagRule[];

  constructor(options: TagPolicyOptions = {}) {
    this.allowNewTags = options.allowNewTags ?? false;
    this.rules = options.rules ?? [];
  }

  /** Reject tags the vault has never used, unless new tags are allowed */
  checkAllowed(tags: string[], allowed: string[]): void {
    if (this.allowNewTags) return;

    const known = new Set(allowed);
    const invalid = tags.filter(t => !known.has(t));
    if (invalid.length > 0) {
      const allowedList = allowed.length > 0 ? allowed.join(', ') : '(none)';
      throw new InvalidTagError(
        `Tags not in allowed list: ${invalid.join(', ')}. Allowed: ${allowedList}. Ask the user before creating new tags.`
      );
    }
  }

  checkRules(tags: string[], noteName: string, frontMatter: FrontMatter): void {
    for (const tag of tags) {
      for (const rule of this.rules) {
        if (rule.tag === tag && !rule.check(noteName, frontMatter)) {
          throw new InvalidTagError(rule.message);
        }
      }
    }
  }
}
