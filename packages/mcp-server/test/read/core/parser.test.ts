/**
 * Tests for note parsing: wikilinks, tags, frontmatter edge cases
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { extractTags, extractWikilinks, parseNote, parseNoteText } from '../../../src/core/read/parser.js';
import type { VaultFile } from '../../../src/core/read/vault.js';
import { cleanupTempVault, createTempVault, createTestNote } from '../../helpers/testUtils.js';

const file: VaultFile = { name: 'Note', path: 'dir/Note.md', absolutePath: '/vault/dir/Note.md' };

describe('extractWikilinks', () => {
  it('should return trimmed targets in order with duplicates', () => {
    expect(extractWikilinks('See [[A]], [[B|alias]] and [[C#Sec]] and [[ A ]]')).toEqual(['A', 'B', 'C', 'A']);
  });

  it('should ignore links inside fenced code', () => {
    expect(extractWikilinks('[[A]]\n```\n[[B]]\n```\n[[C]]')).toEqual(['A', 'C']);
  });

  it('should return nothing for plain text', () => {
    expect(extractWikilinks('no links [here]')).toEqual([]);
  });
});

describe('extractTags', () => {
  it('should wrap a single string', () => {
    expect(extractTags({ tags: 'x' })).toEqual(['x']);
  });

  it('should stringify list elements', () => {
    expect(extractTags({ tags: ['a', 1] })).toEqual(['a', '1']);
  });

  it('should ignore other shapes', () => {
    expect(extractTags({ tags: 5 })).toEqual([]);
    expect(extractTags({})).toEqual([]);
  });
});

describe('parseNoteText', () => {
  it('should split frontmatter from body', () => {
    const note = parseNoteText(file, '---\ntags: [a]\n---\nBody [[X]]');
    expect(note).toEqual({
      name: 'Note',
      path: '/vault/dir/Note.md',
      relativePath: 'dir/Note.md',
      frontMatter: { tags: ['a'] },
      rawFrontMatter: 'tags: [a]',
      body: 'Body [[X]]',
      outgoingLinks: ['X'],
      tags: ['a'],
    });
  });

  it('should tolerate malformed YAML', () => {
    const note = parseNoteText(file, '---\nkey: [unclosed\n---\nbody');
    expect(note.frontMatter).toEqual({});
    expect(note.rawFrontMatter).toBe('key: [unclosed');
    expect(note.body).toBe('body');
  });

  it('should treat non-mapping YAML as empty', () => {
    expect(parseNoteText(file, '---\n- a\n- b\n---\nbody').frontMatter).toEqual({});
  });

  it('should keep the whole text as body without a frontmatter block', () => {
    const note = parseNoteText(file, '# Title\n---\nnot yaml');
    expect(note.rawFrontMatter).toBeNull();
    expect(note.body).toBe('# Title\n---\nnot yaml');
  });
});

describe('parseNote', () => {
  let tempVault: string;

  beforeEach(async () => {
    tempVault = await createTempVault();
  });

  afterEach(async () => {
    await cleanupTempVault(tempVault);
  });

  it('should strip a BOM and normalize CRLF', async () => {
    await createTestNote(tempVault, 'Win.md', '\uFEFF---\r\na: 1\r\n---\r\nline1\r\nline2');
    const note = await parseNote({ name: 'Win', path: 'Win.md', absolutePath: path.join(tempVault, 'Win.md') });

    expect(note.frontMatter).toEqual({ a: 1 });
    expect(note.body).toBe('line1\nline2');
  });
});
