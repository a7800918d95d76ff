/**
 * Tool handlers exercised through the MCP protocol layer, with the client and
 * server linked in process.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { createServer } from '../server.js';
import { sampleSource } from './fakes.js';
import { createTestProject } from './helpers.js';
import type { TestProject } from './helpers.js';

const FOO_URL = 'https://git.example.test/foo.git';

const ToolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
});

let t: TestProject;
let server: McpServer;
let client: Client;

async function call(name: string, args: Record<string, unknown> = {}) {
  const result = ToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  return { text: result.content[0].text, isError: result.isError ?? false };
}

beforeEach(async () => {
  t = createTestProject();
  t.source.remotes.set(FOO_URL, sampleSource());
  await t.engine.init();

  server = createServer(t.engine, '0.0.0-test');
  client = new Client({ name: 'fit-test', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
});

afterEach(async () => {
  await client.close();
  await server.close();
  t.cleanup();
});

describe('tool registration', () => {
  it('should expose the sync tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual(['list_subtrees', 'reset_marks', 'sync_subtree']);
  });
});

describe('list_subtrees', () => {
  it('should say when nothing is imported', async () => {
    expect(await call('list_subtrees')).toEqual({ text: 'No repositories have been imported.', isError: false });
  });

  it('should list subtrees with their prefix and last sync', async () => {
    await t.engine.importSource(FOO_URL, 'libs/foo');

    const { text } = await call('list_subtrees', { verbose: true });
    const parsed = JSON.parse(text);

    expect(parsed.total).toBe(1);
    expect(parsed.subtrees[0]).toMatchObject({
      path: 'libs/foo',
      prefix: 'libs__foo',
      source: FOO_URL,
      last_sync: { direction: 'source-to-aggregate', status: 'succeeded', phase: 'done', error: null },
      workspace: `${t.root}/libs/foo`,
    });
  });
});

describe('sync_subtree', () => {
  beforeEach(async () => {
    await t.engine.importSource(FOO_URL, 'libs/foo');
  });

  it('should update by default', async () => {
    const { text, isError } = await call('sync_subtree', { path: 'libs/foo' });

    expect(isError).toBe(false);
    expect(JSON.parse(text)).toEqual({
      path: 'libs/foo',
      direction: 'update',
      marks_added: { source: 0, aggregate: 0 },
      branches: [
        { branch: 'dev', target: 'libs__foo/dev', action: 'renamed' },
        { branch: 'main', target: 'libs__foo/main', action: 'renamed' },
      ],
      workspace_repaired: false,
    });
  });

  it('should push the checked-out branch', async () => {
    const { text } = await call('sync_subtree', { path: 'libs/foo', direction: 'push' });

    expect(JSON.parse(text)).toMatchObject({
      direction: 'push',
      aggregate_branch: 'libs__foo/main',
      published: ['dev', 'main'],
    });
  });

  it('should report errors with their kind and code', async () => {
    expect(await call('sync_subtree', { path: 'apps/none' })).toEqual({
      text: "Error syncing apps/none [InvalidConfiguration/NOT_REGISTERED]: Subdirectory 'apps/none' is not registered",
      isError: true,
    });
  });
});

describe('reset_marks', () => {
  it('should remove both marks files', async () => {
    await t.engine.importSource(FOO_URL, 'libs/foo');
    const reg = t.registry.get('libs/foo');

    const { text } = await call('reset_marks', { path: 'libs/foo', confirm: true });

    expect(JSON.parse(text)).toEqual({
      path: 'libs/foo',
      removed: [reg?.sourceMarksPath, reg?.aggregateMarksPath],
    });
  });
});
