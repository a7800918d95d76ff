import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { FitError } from '../errors.js';
import type { SyncEngine } from '../sync/engine.js';

export function registerSyncTool(server: McpServer, engine: SyncEngine): void {
  server.registerTool(
    'sync_subtree',
    {
      description:
        'Synchronize one subtree with its git source. ' +
        '"update" re-fetches the source and imports its new commits into the aggregate. ' +
        '"push" exports the aggregate commits of the subtree back into the source and pushes them. ' +
        'Both directions are incremental: commits transferred before are never sent again. ' +
        'A push takes the branch from the subtree\'s prefix namespace; pass `branch` when there are several.',
      inputSchema: {
        path: z.string().min(1).describe('Subtree path as registered, e.g. "libs/foo"'),
        direction: z
          .enum(['update', 'push'])
          .optional()
          .describe('update (git → aggregate, default) or push (aggregate → git)'),
        branch: z.string().optional().describe('Aggregate branch to push, e.g. "libs__foo/main" (push only)'),
        force: z.boolean().optional().describe('Force-push to the source (push only, default: false)'),
      },
    },
    async ({ path, direction, branch, force }) => {
      try {
        const dir = direction ?? 'update';
        const result: Record<string, unknown> = { path, direction: dir };

        if (dir === 'update') {
          const updated = await engine.update(path);
          result.marks_added = updated.marksAdded;
          result.branches = updated.branches.map((b) => ({ branch: b.branch, target: b.target, action: b.action }));
          result.workspace_repaired = updated.repaired;
        } else {
          const pushed = await engine.push(path, { branch, force });
          result.aggregate_branch = pushed.aggregateBranch;
          result.published = pushed.published;
          result.marks_added = pushed.marksAdded;
        }

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(result),
            },
          ],
        };
      } catch (error) {
        const detail = error instanceof FitError ? ` [${error.kind}/${error.code}]` : '';
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error syncing ${path}${detail}: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
