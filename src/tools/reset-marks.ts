import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SyncEngine } from '../sync/engine.js';

export function registerResetMarksTool(server: McpServer, engine: SyncEngine): void {
  server.registerTool(
    'reset_marks',
    {
      description:
        'Delete the marks files of a subtree. The next sync in either direction re-transfers the full history, ' +
        'which can rewrite history on the other side. Requires confirm=true.',
      inputSchema: {
        path: z.string().min(1).describe('Subtree path as registered, e.g. "libs/foo"'),
        confirm: z.literal(true).describe('Must be true'),
      },
    },
    async ({ path }) => {
      try {
        const removed = engine.resetMarks(path);
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({ path, removed }),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error resetting marks: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
