/**
 * Tag management tools
 * Tools: add_tag, remove_tag
 */

import { z } from 'zod';
import { jsonResult, runTool, type ToolContext } from '../helpers.js';

/**
 * Register tag management tools
 */
export function registerTagTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  catalog.set('add_tag', server.registerTool(
    'add_tag',
    {
      title: 'Add Tag',
      description: 'Add a tag to a note\'s frontmatter. The tag must already exist in the vault and pass its tag rule (e.g. "Person" needs a name starting with "@").',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        tag: z.string().min(1).describe('Tag without # (e.g., "project")'),
      },
    },
    async ({ name, tag }) => runTool(ctx, 'add_tag', async () => jsonResult(await ops.addTag(name, tag)))
  ));

  catalog.set('remove_tag', server.registerTool(
    'remove_tag',
    {
      title: 'Remove Tag',
      description: 'Remove a tag from a note\'s frontmatter. Removing an absent tag changes nothing.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        tag: z.string().min(1).describe('Tag without #'),
      },
    },
    async ({ name, tag }) => runTool(ctx, 'remove_tag', async () => jsonResult(await ops.removeTag(name, tag)))
  ));
}
