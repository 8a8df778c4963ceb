/**
 * Search tools
 * Tools: search_notes
 */

import { z } from 'zod';
import { jsonResult, runTool, type ToolContext } from '../helpers.js';

export function registerSearchTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  catalog.set('search_notes', server.registerTool(
    'search_notes',
    {
      title: 'Search Notes',
      description:
        'Search notes. mode: name (exact), name_partial (case-insensitive substring, default), content (body text, case-insensitive), tag (hierarchical: "vc" matches "vc/project"). With mode=tag the query may list several comma-separated tags combined by tag_logic.',
      inputSchema: {
        query: z.string().describe('Search text, or comma-separated tags when mode is tag'),
        mode: z.enum(['name', 'name_partial', 'content', 'tag']).optional().describe('Search mode (default: name_partial)'),
        tag_logic: z.string().optional().describe('How tag queries combine: "or" (default) or "and"'),
      },
    },
    async ({ query, mode, tag_logic }) => runTool(ctx, 'search_notes', async () => {
      const searchMode = mode ?? 'name_partial';
      const results = searchMode === 'tag'
        ? await ops.searchByTags(query, tag_logic ?? 'or')
        : await ops.search(query, searchMode);
      return jsonResult(results);
    })
  ));
}
