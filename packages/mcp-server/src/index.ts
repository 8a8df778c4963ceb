#!/usr/bin/env node
/**
 * mdvault - markdown vault index and structural editing over MCP stdio
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { VaultIndex } from './core/read/graph.js';
import { isVaultError } from './core/shared/errors.js';
import { serverLog } from './core/shared/serverLog.js';
import { createServer, SERVER_VERSION } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  serverLog('config', `Vault: ${config.vaultPath}`);
  serverLog('config', `Context tag: ${config.contextTag}, inject context: ${config.injectContext}, allow new tags: ${config.allowNewTags}`);

  const index = await VaultIndex.open(config.vaultPath);
  const { server, catalog } = createServer(index, config);
  serverLog('server', `Registered ${catalog.size} tools`);

  // Build the index before the first request arrives
  const notes = await index.listNotes();
  serverLog('index', `Ready with ${notes.length} notes`);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLog('server', `mdvault ${SERVER_VERSION} connected on stdio`);
}

main().catch((err: unknown) => {
  if (isVaultError(err)) {
    serverLog('server', err.message, 'error');
  } else {
    serverLog('server', `Fatal error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`, 'error');
  }
  process.exit(1);
});
