/**
 * Tests for name/heading checks and post-write formatting warnings
 */

import { describe, it, expect } from 'vitest';
import { Validator } from '../../../src/core/write/validator.js';
import { InvalidHeadingError, InvalidNameError } from '../../../src/core/shared/errors.js';

const validator = new Validator();

describe('validateName', () => {
  it('should accept letters, digits, space, _, -, @ and task emoji', () => {
    for (const name of ['Project Alpha', '@Jane Doe', 'my_note-2', 'Task ✅', 'Due 📅 soon']) {
      expect(() => validator.validateName(name)).not.toThrow();
    }
  });

  it('should reject Cyrillic first', () => {
    expect(() => validator.validateName('Заметка')).toThrow(new InvalidNameError('Note name contains Cyrillic: Заметка'));
  });

  it('should reject other characters', () => {
    expect(() => validator.validateName('a/b')).toThrow('Note name contains invalid characters: a/b');
    expect(() => validator.validateName('note.md')).toThrow(InvalidNameError);
    expect(() => validator.validateName('Party 🎉')).toThrow(InvalidNameError);
  });

  it('should reject an empty name', () => {
    expect(() => validator.validateName('')).toThrow('Note name is empty');
  });
});

describe('validateHeadings', () => {
  it('should reject a Cyrillic heading with its 1-indexed line', () => {
    expect(() => validator.validateHeadings('intro\n\n## Заголовок')).toThrow(
      new InvalidHeadingError('Heading contains Cyrillic at line 3: Заголовок')
    );
  });

  it('should ignore headings inside code fences', () => {
    expect(() => validator.validateHeadings('```\n# Привет\n```')).not.toThrow();
  });

  it('should allow Cyrillic outside headings', () => {
    expect(() => validator.validateHeadings('# Title\nПривет')).not.toThrow();
  });
});

describe('validate', () => {
  it('should warn about a table without a blank line before it', () => {
    expect(validator.validate('Intro\n| a | b |\n|---|---|\n| 1 | 2 |')).toEqual([
      { line: 2, message: 'Table should have blank line before it', rule: 'table-blank-line' },
    ]);
  });

  it('should accept a table at the start of the document', () => {
    expect(validator.validate('| a |\n|---|')).toEqual([]);
  });

  it('should accept a table after a blank line', () => {
    expect(validator.validate('Intro\n\n| a |\n|---|')).toEqual([]);
  });

  it('should warn about an unclosed fence at its opening line', () => {
    expect(validator.validate('text\n```\ncode')).toEqual([
      { line: 2, message: 'Unclosed fenced code block', rule: 'unclosed-code-block' },
    ]);
  });

  it('should skip tables inside closed fences', () => {
    expect(validator.validate('```\nx\n| a |\n|---|\n```')).toEqual([]);
  });

  it('should list unclosed fences before table warnings', () => {
    expect(validator.validate('Intro\n| a |\n|---|\n```\ncode')).toEqual([
      { line: 4, message: 'Unclosed fenced code block', rule: 'unclosed-code-block' },
      { line: 2, message: 'Table should have blank line before it', rule: 'table-blank-line' },
    ]);
  });
});
