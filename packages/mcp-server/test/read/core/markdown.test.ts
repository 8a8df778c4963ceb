/**
 * Tests for fence scanning, heading extraction and section bounds
 */

import { describe, it, expect } from 'vitest';
import {
  extractHeadings,
  fencedLineMask,
  findSectionBounds,
  scanFences,
} from '../../../src/core/read/markdown.js';

describe('scanFences', () => {
  it('should treat a shorter run inside a longer fence as text', () => {
    const lines = ['````', '```', 'inner', '```', '````'];
    expect(scanFences(lines)).toEqual({ closed: [[1, 5]], unclosed: [] });
  });

  it('should close a fence with a longer run', () => {
    const lines = ['```', 'code', '`````'];
    expect(scanFences(lines)).toEqual({ closed: [[1, 3]], unclosed: [] });
  });

  it('should report an unclosed fence at its opening line', () => {
    expect(scanFences(['text', '```js', 'code'])).toEqual({ closed: [], unclosed: [2] });
  });

  it('should detect indented fences', () => {
    expect(scanFences(['  ```', 'x', '  ```'])).toEqual({ closed: [[1, 3]], unclosed: [] });
  });

  it('should ignore runs of fewer than three backticks', () => {
    expect(scanFences(['``', 'x', '``'])).toEqual({ closed: [], unclosed: [] });
  });
});

describe('fencedLineMask', () => {
  it('should flag delimiters and lines between them', () => {
    expect(fencedLineMask(['a', '```', 'b', '```', 'c'])).toEqual([false, true, true, true, false]);
  });

  it('should flag everything after an unclosed fence', () => {
    expect(fencedLineMask(['a', '```', 'b', 'c'])).toEqual([false, true, true, true]);
  });
});

describe('extractHeadings', () => {
  it('should skip headings inside fences and trim text', () => {
    const content = '# Title\n```\n# not a heading\n```\n## Sub  ';
    expect(extractHeadings(content)).toEqual([
      { level: 1, text: 'Title', line: 0 },
      { level: 2, text: 'Sub', line: 4 },
    ]);
  });

  it('should not treat #hashtags as headings', () => {
    expect(extractHeadings('#hashtag\n####### Deep')).toEqual([
      { level: 7, text: 'Deep', line: 1 },
    ]);
  });

  it('should honour backtick-count nesting', () => {
    const content = '````\n```\n# hidden\n```\n````\n# Shown';
    expect(extractHeadings(content)).toEqual([{ level: 1, text: 'Shown', line: 5 }]);
  });
});

describe('findSectionBounds', () => {
  const lines = ['# Title', 'intro', '## A', 'a1', '### A1', 'deep', '## B', 'b1'];

  it('should match an exact "##" selector and stop at the next same-level heading', () => {
    expect(findSectionBounds(lines, '## A')).toEqual({ start: 3, end: 6, level: 2 });
  });

  it('should match a bare selector at any level', () => {
    expect(findSectionBounds(lines, 'A1')).toEqual({ start: 5, end: 6, level: 3 });
  });

  it('should run to the end of the document for the last section', () => {
    expect(findSectionBounds(lines, 'B')).toEqual({ start: 7, end: 8, level: 2 });
  });

  it('should include deeper headings in a section', () => {
    expect(findSectionBounds(lines, '# Title')).toEqual({ start: 1, end: 8, level: 1 });
  });

  it('should return null for an unknown heading', () => {
    expect(findSectionBounds(lines, 'Z')).toBeNull();
  });

  it('should not match a "##" selector against a different level', () => {
    expect(findSectionBounds(lines, '### A')).toBeNull();
  });

  it('should skip headings inside fences', () => {
    const fenced = ['```', '## A', '```', '## A', 'x'];
    expect(findSectionBounds(fenced, 'A')).toEqual({ start: 4, end: 5, level: 2 });
  });

  it('should not end a section at a fenced heading', () => {
    const fenced = ['## A', '```', '# inside', '```', 'tail', '# Next'];
    expect(findSectionBounds(fenced, '## A')).toEqual({ start: 1, end: 5, level: 2 });
  });

  it('should treat regex characters in the selector literally', () => {
    const special = ['## Q&A (draft)', 'text', '## Q&A draft'];
    expect(findSectionBounds(special, 'Q&A (draft)')).toEqual({ start: 1, end: 2, level: 2 });
  });
});
