/**
 * System and utility tools
 * Tools: refresh_index, server_log, get_help
 */

import { z } from 'zod';
import { getServerLog, LOG_COMPONENTS } from '../../core/shared/serverLog.js';
import { jsonResult, runTool, type ToolContext } from '../helpers.js';

export function registerSystemTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  // refresh_index - rescan the vault after edits made outside the server
  catalog.set('refresh_index', server.registerTool(
    'refresh_index',
    {
      title: 'Refresh Index',
      description: 'Rescan the vault and rebuild the note index. Use after notes were changed outside this server.',
      inputSchema: {},
    },
    async () => runTool(ctx, 'refresh_index', async () => {
      const startTime = Date.now();
      await ops.index.refresh();
      const notes = await ops.index.listNotes();
      return jsonResult({
        success: true,
        notes_count: notes.length,
        duration_ms: Date.now() - startTime,
      });
    })
  ));

  catalog.set('server_log', server.registerTool(
    'server_log',
    {
      title: 'Server Log',
      description: 'Recent server activity: index rebuilds, mutations, failures. Newest entries last.',
      inputSchema: {
        since: z.number().optional().describe('Only entries after this epoch-ms timestamp'),
        component: z.enum(['server', 'index', 'ops', 'config']).optional().describe(`Filter by component: ${LOG_COMPONENTS.join(', ')}`),
        min_level: z.enum(['info', 'warn', 'error']).optional().describe('Lowest level to include (default: info)'),
        limit: z.number().int().min(1).max(200).optional().describe('Maximum entries (default: 100)'),
      },
    },
    async ({ since, component, min_level, limit }) => runTool(ctx, 'server_log', async () =>
      jsonResult(getServerLog({ since, component, minLevel: min_level, limit }))
    )
  ));

  catalog.set('get_help', server.registerTool(
    'get_help',
    {
      title: 'Get Help',
      description: 'List every available tool with its description.',
      inputSchema: {},
    },
    async () => runTool(ctx, 'get_help', async () =>
      jsonResult([...catalog.entries()].map(([name, tool]) => ({
        name,
        title: tool.title ?? name,
        description: tool.description ?? '',
      })))
    )
  ));
}
