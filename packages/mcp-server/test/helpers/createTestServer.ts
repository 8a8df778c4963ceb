/**
 * Test helper to create a configured MCP server plus a connected client
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { ServerConfig } from '../../src/config.js';
import { VaultIndex } from '../../src/core/read/graph.js';
import { createServer, type VaultServer } from '../../src/server.js';

export interface TestServerContext extends VaultServer {
  client: Client;
  close: () => Promise<void>;
}

export type ToolText = Array<{ type: string; text: string }>;

export async function createTestServer(
  vaultPath: string,
  overrides: Partial<Omit<ServerConfig, 'vaultPath'>> = {}
): Promise<TestServerContext> {
  const index = await VaultIndex.open(vaultPath);
  const vault = createServer(index, {
    allowNewTags: false,
    contextTag: 'assistant',
    injectContext: false,
    ...overrides,
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await vault.server.connect(serverTransport);

  const client = new Client({ name: 'test-client', version: '1.0.0' }, { capabilities: {} });
  await client.connect(clientTransport);

  return {
    ...vault,
    client,
    close: async () => {
      await client.close();
      await vault.server.close();
    },
  };
}
