#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { buildProgram, defaultCliDeps } from './cli.js';
import { getLog, logError } from './logger.js';

const log = getLog('fit');

function readVersion(): string {
  // src/index.ts and dist/index.js both sit one level below package.json
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return z.object({ version: z.string() }).parse(raw).version;
}

async function main(): Promise<void> {
  const program = buildProgram(defaultCliDeps(readVersion()));
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  logError(log, error, 'Fatal error');
  process.exit(1);
});
