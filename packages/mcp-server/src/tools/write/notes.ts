/**
 * Note CRUD tools
 * Tools: create_note, append_note, update_note, delete_note, rename_note,
 *        batch_rename, batch_delete
 */

import { z } from 'zod';
import { jsonResult, runTool, type ToolContext } from '../helpers.js';

/**
 * Register note CRUD tools with the MCP server
 */
export function registerNoteTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  // ========================================
  // Tool: create_note
  // ========================================
  catalog.set('create_note', server.registerTool(
    'create_note',
    {
      title: 'Create Note',
      description:
        'Create a new note at the vault root. Frontmatter tags must already exist in the vault unless new tags are allowed.\n\nExample: create_note({ name: "Project Alpha", content: "# Goals\\n\\nShip it.", frontmatter: { tags: ["project"] } })',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        content: z.string().optional().describe('Initial body'),
        frontmatter: z.record(z.unknown()).optional().describe('Frontmatter fields (JSON object)'),
      },
    },
    async ({ name, content, frontmatter }) => runTool(ctx, 'create_note', async () => {
      const result = await ops.createWithPolicy(name, content ?? '', frontmatter);
      return jsonResult({ name, path: result.path, warnings: result.warnings });
    })
  ));

  // ========================================
  // Tool: append_note
  // ========================================
  catalog.set('append_note', server.registerTool(
    'append_note',
    {
      title: 'Append to Note',
      description: 'Append text to the end of a note, separated by a blank line.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        text: z.string().describe('Text to append'),
      },
    },
    async ({ name, text }) => runTool(ctx, 'append_note', async () => {
      const { warnings } = await ops.append(name, text);
      return jsonResult({ name, status: 'appended', warnings });
    })
  ));

  // ========================================
  // Tool: update_note
  // ========================================
  catalog.set('update_note', server.registerTool(
    'update_note',
    {
      title: 'Update Note',
      description: 'Replace the body of a note. Frontmatter is kept exactly as it is. Read the note first.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        content: z.string().describe('New body'),
      },
    },
    async ({ name, content }) => runTool(ctx, 'update_note', async () => {
      const { warnings } = await ops.update(name, content);
      return jsonResult({ name, status: 'updated', warnings });
    })
  ));

  // ========================================
  // Tool: delete_note
  // ========================================
  catalog.set('delete_note', server.registerTool(
    'delete_note',
    {
      title: 'Delete Note',
      description: 'Move a note to .trash/ and rewrite [[links]] to it as [[name (deleted)]]. Use dry_run to preview.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        dry_run: z.boolean().optional().describe('Preview only, no changes (default: false)'),
      },
    },
    async ({ name, dry_run }) => runTool(ctx, 'delete_note', async () =>
      jsonResult(await ops.delete(name, dry_run ?? false))
    )
  ));

  // ========================================
  // Tool: rename_note
  // ========================================
  catalog.set('rename_note', server.registerTool(
    'rename_note',
    {
      title: 'Rename Note',
      description: 'Rename a note and rewrite every [[wikilink]] to it, keeping aliases and section anchors. Use dry_run to preview.',
      inputSchema: {
        old_name: z.string().describe('Current note name'),
        new_name: z.string().describe('New note name'),
        dry_run: z.boolean().optional().describe('Preview only, no changes (default: false)'),
      },
    },
    async ({ old_name, new_name, dry_run }) => runTool(ctx, 'rename_note', async () =>
      jsonResult(await ops.rename(old_name, new_name, dry_run ?? false))
    )
  ));

  catalog.set('batch_rename', server.registerTool(
    'batch_rename',
    {
      title: 'Batch Rename',
      description: 'Rename several notes in order. Stops at the first failure; earlier renames stay applied.',
      inputSchema: {
        renames: z.record(z.string()).describe('Map of old name to new name'),
        dry_run: z.boolean().optional().describe('Preview only, no changes (default: false)'),
      },
    },
    async ({ renames, dry_run }) => runTool(ctx, 'batch_rename', async () =>
      jsonResult(await ops.batchRename(renames, dry_run ?? false))
    )
  ));

  catalog.set('batch_delete', server.registerTool(
    'batch_delete',
    {
      title: 'Batch Delete',
      description: 'Delete several notes in order. Stops at the first failure; earlier deletes stay applied.',
      inputSchema: {
        names: z.array(z.string()).describe('Note names without .md'),
        dry_run: z.boolean().optional().describe('Preview only, no changes (default: false)'),
      },
    },
    async ({ names, dry_run }) => runTool(ctx, 'batch_delete', async () =>
      jsonResult(await ops.batchDelete(names, dry_run ?? false))
    )
  ));
}
