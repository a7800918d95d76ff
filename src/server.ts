import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { INSTRUCTIONS } from './instructions.js';
import { getLog, logError } from './logger.js';
import type { Project } from './project.js';
import type { SyncEngine } from './sync/engine.js';
import { registerListTool } from './tools/list.js';
import { registerResetMarksTool } from './tools/reset-marks.js';
import { registerSyncTool } from './tools/sync.js';

const log = getLog('server');

/** Build the MCP server with every tool registered. */
export function createServer(engine: SyncEngine, version: string): McpServer {
  const server = new McpServer({ name: 'fitrepo', version }, { instructions: INSTRUCTIONS });

  registerListTool(server, engine);
  registerSyncTool(server, engine);
  registerResetMarksTool(server, engine);

  return server;
}

/** Serve the project's tools on stdio until the process is signalled. */
export async function serve(project: Project, version: string): Promise<void> {
  const server = createServer(project.engine, version);

  const shutdown = () => {
    server
      .close()
      .then(() => {
        project.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logError(log, error, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info(`fitrepo server running on stdio (${project.config.root})`);
}
