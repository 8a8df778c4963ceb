/**
 * Tests for link scanning and cascading link rewrites
 */

import { describe, it, expect } from 'vitest';
import { rewriteWikilinks, scanSectionLinks } from '../../../src/core/write/wikilinks.js';

describe('rewriteWikilinks', () => {
  it('should rewrite plain, aliased and section links', () => {
    expect(rewriteWikilinks('See [[Old]], [[Old|alias]], [[Old#Sec]] and [[Older]]', 'Old', 'New')).toEqual({
      content: 'See [[New]], [[New|alias]], [[New#Sec]] and [[Older]]',
      count: 3,
    });
  });

  it('should rewrite links inside fenced code', () => {
    expect(rewriteWikilinks('[[Old]]\n```\n[[Old]]\n```', 'Old', 'New')).toEqual({
      content: '[[New]]\n```\n[[New]]\n```',
      count: 2,
    });
  });

  it('should rewrite links in frontmatter', () => {
    const text = '---\nup: "[[Old]]"\n---\nsee [[Old]]';
    expect(rewriteWikilinks(text, 'Old', 'New')).toEqual({
      content: '---\nup: "[[New]]"\n---\nsee [[New]]',
      count: 2,
    });
  });

  it('should report zero hits and return the text unchanged', () => {
    expect(rewriteWikilinks('[[Other]]', 'Old', 'New')).toEqual({ content: '[[Other]]', count: 0 });
  });

  it('should match the old name literally', () => {
    expect(rewriteWikilinks('[[a.b]] [[axb]]', 'a.b', 'c')).toEqual({ content: '[[c]] [[axb]]', count: 1 });
  });

  it('should insert the new name literally', () => {
    expect(rewriteWikilinks('[[A]]', 'A', 'Cost $1').content).toBe('[[Cost $1]]');
  });

  it('should support the deleted-note marker', () => {
    expect(rewriteWikilinks('[[B|Bee]]', 'B', 'B (deleted)').content).toBe('[[B (deleted)|Bee]]');
  });
});

describe('scanSectionLinks', () => {
  it('should report target, section and line outside fences', () => {
    const content = 'x [[A]]\n[[B#Intro]] [[C#Sec|alias]]\n```\n[[D]]\n```';
    expect(scanSectionLinks(content)).toEqual([
      { target: 'A', section: null, line: 1 },
      { target: 'B', section: 'Intro', line: 2 },
      { target: 'C', section: 'Sec', line: 2 },
    ]);
  });
});
