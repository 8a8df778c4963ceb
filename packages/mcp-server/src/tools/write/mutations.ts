/**
 * Text edit tools
 * Tools: replace_text, insert_text
 */

import { z } from 'zod';
import { jsonResult, runTool, type ToolContext } from '../helpers.js';

export function registerMutationTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  catalog.set('replace_text', server.registerTool(
    'replace_text',
    {
      title: 'Replace Text',
      description: 'Replace literal text in a note body (frontmatter untouched). First occurrence only unless replace_all.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        old_text: z.string().describe('Exact text to find'),
        new_text: z.string().describe('Replacement text'),
        replace_all: z.boolean().optional().describe('Replace every occurrence (default: false)'),
      },
    },
    async ({ name, old_text, new_text, replace_all }) => runTool(ctx, 'replace_text', async () => {
      const result = await ops.replace(name, old_text, new_text, replace_all ?? false);
      return jsonResult({ name: result.name, replaced: result.replacements });
    })
  ));

  catalog.set('insert_text', server.registerTool(
    'insert_text',
    {
      title: 'Insert Text',
      description: 'Insert a line before or after the first body line matching a pattern line (whitespace-trimmed). Give exactly one of before/after.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        text: z.string().describe('Line to insert'),
        before: z.string().optional().describe('Insert before this line'),
        after: z.string().optional().describe('Insert after this line'),
      },
    },
    async ({ name, text, before, after }) => runTool(ctx, 'insert_text', async () =>
      // Empty strings count as not given
      jsonResult(await ops.insert(name, text, { before: before || undefined, after: after || undefined }))
    )
  ));
}
