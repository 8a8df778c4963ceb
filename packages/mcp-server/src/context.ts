/**
 * Session context block: notes tagged with the context tag plus the vault's
 * allowed tags. Appended once per server to the first successful tool result.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Operations } from './core/write/operations.js';

export const MISSING_DESCRIPTION =
  "No description. Please add a 'description' field to this note's frontmatter explaining when to read it.";

export async function buildContextBlock(ops: Operations, contextTag: string): Promise<string> {
  const notes = (await ops.index.listNotes()).filter(n => n.tags.includes(contextTag));
  const lines: string[] = [];

  if (notes.length === 0) {
    lines.push('Context notes:');
    lines.push(`No context notes found. Tag notes with '${contextTag}' to have them listed here.`);
  } else {
    lines.push('Context notes:');
    for (const note of notes) {
      const description = note.frontMatter.description;
      const text = typeof description === 'string' && description.trim() ? description : MISSING_DESCRIPTION;
      lines.push(`- "${note.name}": ${text}`);
    }
    lines.push('');
    lines.push('Use read_note to access full content when needed.');
  }

  const tags = await ops.collectTags();
  lines.push('');
  lines.push(tags.length > 0 ? `Allowed tags: ${tags.join(', ')}` : 'Allowed tags: No tags in vault yet.');

  return lines.join('\n');
}

/**
 * Build the result decorator for one server instance
 */
export function createContextInjector(
  ops: Operations,
  options: { enabled: boolean; contextTag: string }
): (result: CallToolResult) => Promise<CallToolResult> {
  let injected = !options.enabled;

  return async (result) => {
    if (injected || result.isError) return result;
    injected = true;

    const block = await buildContextBlock(ops, options.contextTag);
    return {
      ...result,
      content: [
        ...result.content,
        { type: 'text', text: `<!-- VAULT CONTEXT (do not copy to notes):\n${block}\n-->` },
      ],
    };
  };
}
