/**
 * MCP server factory - wires Operations into tools
 */

import { McpServer, type RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerConfig } from './config.js';
import { createContextInjector } from './context.js';
import { VaultIndex } from './core/read/graph.js';
import { Operations } from './core/write/operations.js';
import { defaultTagRules, TagPolicy } from './core/write/tags.js';
import type { ToolContext } from './tools/helpers.js';
import { registerLinkTools } from './tools/read/links.js';
import { registerNoteReadTools } from './tools/read/notes.js';
import { registerSearchTools } from './tools/read/search.js';
import { registerSystemTools } from './tools/read/system.js';
import { registerFrontmatterTools } from './tools/write/frontmatter.js';
import { registerMutationTools } from './tools/write/mutations.js';
import { registerNoteTools } from './tools/write/notes.js';
import { registerSectionTools } from './tools/write/sections.js';
import { registerTagTools } from './tools/write/tags.js';

export const SERVER_NAME = 'mdvault';
export const SERVER_VERSION = '1.0.0';

export const INSTRUCTIONS = `You have access to a markdown vault through MCP tools. \
The vault is a collection of markdown notes with YAML frontmatter and [[wikilinks]].

## Key rules

- Note names are WITHOUT .md extension: read_note("My Note"), not read_note("My Note.md").
- Always read_note before update_note or append_note.
- update_note replaces the body (frontmatter preserved). append_note adds text to the end.
- Use dry_run=true before delete_note or rename_note to preview changes.
- Wikilinks: [[Note Name]]. They are rewritten automatically on rename and delete.
- Frontmatter: top-level keys only. Tags are a list of strings: ["vc", "vc/project"].
- search_notes modes: name (exact), name_partial (default, case-insensitive), content (body text), tag (hierarchical: "vc" matches "vc/project").
- get_links directions: out, in, both (default).
- Sections are addressed as "## Heading" or plain "Heading".
- Start with list_notes to see what's in the vault.`;

export interface VaultServer {
  server: McpServer;
  ops: Operations;
  catalog: Map<string, RegisteredTool>;
}

export function createOperations(index: VaultIndex, config: Pick<ServerConfig, 'allowNewTags' | 'contextTag'>): Operations {
  return new Operations(index, {
    tagPolicy: new TagPolicy({
      allowNewTags: config.allowNewTags,
      rules: defaultTagRules(config.contextTag),
    }),
  });
}

/**
 * Build a server over an opened index. Each server instance injects the
 * context block at most once.
 */
export function createServer(index: VaultIndex, config: Omit<ServerConfig, 'vaultPath'>): VaultServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: INSTRUCTIONS }
  );
  const ops = createOperations(index, config);

  const ctx: ToolContext = {
    server,
    ops,
    catalog: new Map(),
    decorate: createContextInjector(ops, { enabled: config.injectContext, contextTag: config.contextTag }),
  };

  // Read tools
  registerNoteReadTools(ctx);
  registerSearchTools(ctx);
  registerLinkTools(ctx);
  registerSectionTools(ctx);

  // Write tools
  registerNoteTools(ctx);
  registerFrontmatterTools(ctx);
  registerTagTools(ctx);
  registerMutationTools(ctx);

  registerSystemTools(ctx);

  return { server, ops, catalog: ctx.catalog };
}
