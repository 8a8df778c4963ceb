/**
 * Section tools - a section is a heading plus everything up to the next
 * heading of the same or higher level. Selectors are either "## Heading"
 * (exact line) or plain "Heading" (any level).
 * Tools: get_headings, read_section, append_section, update_section, delete_section
 */

import { z } from 'zod';
import { jsonResult, runTool, textResult, type ToolContext } from '../helpers.js';

const SECTION_DESCRIPTION = 'Section heading, either "## Heading" or plain "Heading"';

export function registerSectionTools(ctx: ToolContext): void {
  const { server, ops, catalog } = ctx;

  catalog.set('get_headings', server.registerTool(
    'get_headings',
    {
      title: 'Get Headings',
      description: 'All headings of a note as [{level, text}], ignoring # lines inside code blocks.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
      },
    },
    async ({ name }) => runTool(ctx, 'get_headings', async () => {
      const headings = await ops.getHeadings(name);
      return jsonResult(headings.map(h => ({ level: h.level, text: h.text })));
    })
  ));

  catalog.set('read_section', server.registerTool(
    'read_section',
    {
      title: 'Read Section',
      description: 'Text of a section without its heading line.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        section: z.string().describe(SECTION_DESCRIPTION),
      },
    },
    async ({ name, section }) => runTool(ctx, 'read_section', async () =>
      textResult(await ops.readSection(name, section))
    )
  ));

  catalog.set('append_section', server.registerTool(
    'append_section',
    {
      title: 'Append to Section',
      description: 'Add text at the end of a section, before the next heading of the same or higher level.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        section: z.string().describe(SECTION_DESCRIPTION),
        text: z.string().describe('Text to add'),
      },
    },
    async ({ name, section, text }) => runTool(ctx, 'append_section', async () => {
      const { warnings } = await ops.appendSection(name, section, text);
      return jsonResult({ name, section, status: 'appended', warnings });
    })
  ));

  catalog.set('update_section', server.registerTool(
    'update_section',
    {
      title: 'Update Section',
      description: 'Replace the content of a section. The heading line is kept.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        section: z.string().describe(SECTION_DESCRIPTION),
        content: z.string().describe('New section content'),
      },
    },
    async ({ name, section, content }) => runTool(ctx, 'update_section', async () => {
      const { warnings } = await ops.updateSection(name, section, content);
      return jsonResult({ name, section, status: 'updated', warnings });
    })
  ));

  catalog.set('delete_section', server.registerTool(
    'delete_section',
    {
      title: 'Delete Section',
      description: 'Remove a section together with its heading.',
      inputSchema: {
        name: z.string().describe('Note name without .md'),
        section: z.string().describe(SECTION_DESCRIPTION),
      },
    },
    async ({ name, section }) => runTool(ctx, 'delete_section', async () => {
      await ops.deleteSection(name, section);
      return jsonResult({ name, section, status: 'deleted' });
    })
  ));
}
