/**
 * Frontmatter tools
 * Tools: set_frontmatter
 */

import { z } from 'zod';
import { parseFrontMatterValue } from '../../core/write/frontmatter.js';
import { jsonResult, runTool, type ToolContext } from '../helpers.js';

export function registerFrontmatterTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  catalog.set('set_frontmatter', server.registerTool(
    'set_frontmatter',
    {
      title: 'Set Frontmatter',
      description:
        'Set a top-level frontmatter key. The value is decoded as JSON when it is a list, object, boolean or null; anything else is stored as a string. "tags" must be a JSON list of tags already used in the vault.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        key: z.string().min(1).describe('Frontmatter key'),
        value: z.string().describe('Value, e.g. "draft", "true", \'["a", "b"]\''),
      },
    },
    async ({ name, key, value }) => runTool(ctx, 'set_frontmatter', async () => {
      const parsed = parseFrontMatterValue(value);
      await ops.frontmatterSetWithPolicy(name, key, parsed);
      return jsonResult({ name, key, value: parsed });
    })
  ));
}
