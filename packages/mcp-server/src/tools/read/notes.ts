/**
 * Note reading tools
 * Tools: read_note, list_notes, get_note_metadata
 */

import { z } from 'zod';
import { jsonResult, runTool, textResult, type ToolContext } from '../helpers.js';

export function registerNoteReadTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  catalog.set('read_note', server.registerTool(
    'read_note',
    {
      title: 'Read Note',
      description: 'Read the full text of a note (frontmatter + body). Names are given without the .md extension.',
      inputSchema: {
        name: z.string().describe('Note name without .md (e.g., "Project Alpha")'),
      },
    },
    async ({ name }) => runTool(ctx, 'read_note', async () => textResult(await ops.read(name)))
  ));

  catalog.set('list_notes', server.registerTool(
    'list_notes',
    {
      title: 'List Notes',
      description: 'List note names in the vault, sorted, without paths. Paginated with limit and offset.',
      inputSchema: {
        limit: z.number().int().min(1).optional().describe('Maximum names to return (default: 100)'),
        offset: z.number().int().min(0).optional().describe('Number of names to skip (default: 0)'),
      },
    },
    async ({ limit, offset }) => runTool(ctx, 'list_notes', async () =>
      jsonResult(await ops.listNoteNames({ limit, offset }))
    )
  ));

  catalog.set('get_note_metadata', server.registerTool(
    'get_note_metadata',
    {
      title: 'Get Note Metadata',
      description: 'Frontmatter plus outgoing and incoming links of a note, without the body.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
      },
    },
    async ({ name }) => runTool(ctx, 'get_note_metadata', async () => {
      const meta = await ops.metadata(name);
      return jsonResult({
        name: meta.name,
        frontmatter: meta.frontMatter,
        outgoing: meta.outgoing,
        incoming: meta.incoming,
      });
    })
  ));
}
