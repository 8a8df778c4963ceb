/**
 * Input validation and output guardrails for vault mutations
 *
 * Two layers:
 * 1. Blocking checks - note names and heading text, thrown before any write
 * 2. Output guardrails - formatting problems in the written file, returned
 *    as warnings
 */

import { InvalidHeadingError, InvalidNameError } from '../shared/errors.js';
import { extractHeadings, scanFences } from '../read/markdown.js';
import type { ValidationWarning } from '../read/types.js';

const CYRILLIC_REGEX = /[\u0400-\u04FF]/;

/** Emoji used by task-tracking plugins inside note names */
export const TASK_EMOJI = ['➕', '⏳', '🛫', '📅', '✅', '❌', '⏬', '🔽', '🔼', '⏫', '🔺', '🔁', '🏁', '🆔', '⛔'];

const NAME_REGEX = new RegExp(`^(?:[a-zA-Z0-9 _@\\-]|${TASK_EMOJI.join('|')})+$`, 'u');

const TABLE_ROW_REGEX = /^\|.*\|$/;
const TABLE_SEPARATOR_REGEX = /^\|[-:| ]+\|$/;

export class Validator {
  /**
   * Reject names with Cyrillic or characters outside the allowed set
   */
  validateName(name: string): void {
    if (name.length === 0) {
      throw new InvalidNameError('Note name is empty');
    }
    if (CYRILLIC_REGEX.test(name)) {
      throw new InvalidNameError(`Note name contains Cyrillic: ${name}`);
    }
    if (!NAME_REGEX.test(name)) {
      throw new InvalidNameError(`Note name contains invalid characters: ${name}`);
    }
  }

  /**
   * Reject Cyrillic heading text; fenced lines are not headings
   */
  validateHeadings(content: string): void {
    for (const heading of extractHeadings(content)) {
      if (CYRILLIC_REGEX.test(heading.text)) {
        throw new InvalidHeadingError(`Heading contains Cyrillic at line ${heading.line + 1}: ${heading.text}`);
      }
    }
  }

  /**
   * Post-write formatting check. Unclosed fences first, then tables missing
   * a blank line above them.
   */
  validate(content: string): ValidationWarning[] {
    const lines = content.split('\n');
    const { closed, unclosed } = scanFences(lines);
    const warnings: ValidationWarning[] = [];

    for (const line of unclosed) {
      warnings.push({ line, message: 'Unclosed fenced code block', rule: 'unclosed-code-block' });
    }

    for (let i = 1; i < lines.length - 1; i++) {
      const lineNum = i + 1;
      if (closed.some(([start, end]) => start < lineNum && lineNum < end)) continue;

      if (
        TABLE_ROW_REGEX.test(lines[i]) &&
        TABLE_SEPARATOR_REGEX.test(lines[i + 1]) &&
        lines[i - 1].trim() !== ''
      ) {
        warnings.push({ line: lineNum, message: 'Table should have blank line before it', rule: 'table-blank-line' });
      }
    }

    return warnings;
  }
}
