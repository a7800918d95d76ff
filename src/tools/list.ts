import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SyncEngine } from '../sync/engine.js';
import { branchPrefix } from '../sync/namespace.js';

export function registerListTool(server: McpServer, engine: SyncEngine): void {
  server.registerTool(
    'list_subtrees',
    {
      description:
        'List the git repositories merged into the aggregate, one per subtree. ' +
        'Each result has the subtree path, the branch prefix its branches carry in the aggregate, ' +
        'the source locator, and the outcome of the last sync. ' +
        'Set verbose=true to include clone, marks and workspace locations.',
      inputSchema: {
        verbose: z.boolean().optional().describe('Include local file locations (default: false)'),
      },
    },
    async ({ verbose }) => {
      try {
        const subtrees = engine.list();

        if (subtrees.length === 0) {
          return {
            content: [
              {
                type: 'text' as const,
                text: 'No repositories have been imported.',
              },
            ],
          };
        }

        const results = subtrees.map(({ registration, lastRun }) => ({
          path: registration.path,
          prefix: branchPrefix(registration.path),
          source: registration.sourceLocator,
          last_sync: lastRun
            ? {
                direction: lastRun.direction,
                status: lastRun.status,
                phase: lastRun.phase,
                finished_at: lastRun.finishedAt,
                error: lastRun.error,
              }
            : null,
          ...(verbose
            ? {
                clone_path: registration.clonePath,
                source_marks: registration.sourceMarksPath,
                aggregate_marks: registration.aggregateMarksPath,
                workspace: registration.workspacePath,
              }
            : {}),
        }));

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({ total: results.length, subtrees: results }),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error listing subtrees: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
