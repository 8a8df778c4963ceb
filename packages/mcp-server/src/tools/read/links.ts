/**
 * Link graph tools
 * Tools: get_links, find_broken_links
 */

import { z } from 'zod';
import { jsonResult, runTool, type ToolContext } from '../helpers.js';

export function registerLinkTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  catalog.set('get_links', server.registerTool(
    'get_links',
    {
      title: 'Get Links',
      description: 'Notes linked from (out), linking to (in), or both directions of a note.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        direction: z.enum(['in', 'out', 'both']).optional().describe('Link direction (default: both)'),
      },
    },
    async ({ name, direction }) => runTool(ctx, 'get_links', async () =>
      jsonResult(await ops.links(name, direction ?? 'both'))
    )
  ));

  catalog.set('find_broken_links', server.registerTool(
    'find_broken_links',
    {
      title: 'Find Broken Links',
      description: 'Every wikilink whose target note does not exist, as {source, target} pairs.',
      inputSchema: {},
    },
    async () => runTool(ctx, 'find_broken_links', async () => jsonResult(await ops.findBrokenLinks()))
  ));
}
