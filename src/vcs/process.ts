/**
 * Subprocess helpers for the external tools.
 *
 * SECURITY: everything runs through execFile/spawn with an argument vector,
 * never through a shell, so paths, URLs and branch names are passed verbatim.
 * Every call gets an explicit cwd.
 */

import { execFile, spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { promisify } from 'node:util';
import { ExternalToolFailureError } from '../errors.js';
import type { ErrorContext } from '../errors.js';
import { getLog } from '../logger.js';
import type { StreamingProcess } from '../sync/stores.js';

const execFileAsync = promisify(execFile);
const log = getLog('process');

const STDERR_TAIL_LINES = 20;

export interface ToolOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  context?: ErrorContext;
}

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

function exitCodeOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

function isSpawnError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim();
  }
  return '';
}

/** Run a tool to completion and capture its output. Non-zero exit throws. */
export async function runTool(command: string, args: string[], options: ToolOptions): Promise<ToolOutput> {
  const label = `${command} ${args[0] ?? ''}`.trim();
  log.debug({ cwd: options.cwd, argv: [command, ...args] }, `run ${label}`);

  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      encoding: 'utf-8',
      maxBuffer: 64 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (error) {
    const context = { ...options.context, tool: label, cwd: options.cwd };
    if (isSpawnError(error)) {
      throw new ExternalToolFailureError(`${command} is not installed or not on PATH`, 'SPAWN_FAILED', {
        cause: error,
        context,
      });
    }
    const stderr = stderrOf(error);
    const exitCode = exitCodeOf(error);
    throw new ExternalToolFailureError(
      `${label} failed${exitCode !== null ? ` (exit ${exitCode})` : ''}${stderr ? `: ${stderr}` : ''}`,
      'NON_ZERO_EXIT',
      { exitCode, cause: error, context: { ...context, stderr } },
    );
  }
}

/** Run a tool and report only whether it exited with status 0. */
export async function probeTool(command: string, args: string[], options: ToolOptions): Promise<boolean> {
  try {
    await runTool(command, args, options);
    return true;
  } catch (error) {
    if (error instanceof ExternalToolFailureError) return false;
    throw error;
  }
}

function collectStderr(child: ChildProcess): () => string {
  const lines: string[] = [];
  let partial = '';
  child.stderr?.setEncoding('utf8');
  child.stderr?.on('data', (chunk: string) => {
    const parts = (partial + chunk).split(/\r?\n|\r/);
    partial = parts.pop() ?? '';
    lines.push(...parts.filter((l) => l.trim()));
    if (lines.length > STDERR_TAIL_LINES) lines.splice(0, lines.length - STDERR_TAIL_LINES);
  });
  return () => [...lines, partial].filter((l) => l.trim()).slice(-STDERR_TAIL_LINES).join('\n');
}

/**
 * Start one side of a streaming transfer.
 * A producer exposes stdout; a consumer exposes stdin and has its stdout
 * drained into the debug log.
 */
export function spawnStream(
  command: string,
  args: string[],
  options: ToolOptions & { role: 'producer' | 'consumer'; label?: string },
): StreamingProcess {
  const label = options.label ?? `${command} ${args[0] ?? ''}`.trim();
  log.debug({ cwd: options.cwd, argv: [command, ...args] }, `spawn ${label}`);

  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    stdio: options.role === 'producer' ? ['ignore', 'pipe', 'pipe'] : ['pipe', 'pipe', 'pipe'],
  });
  const stderrTail = collectStderr(child);

  if (options.role === 'consumer') {
    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      log.debug({ tool: label }, chunk.trim());
    });
  }

  const exited = new Promise<number | null>((resolve, reject) => {
    child.once('error', (error) => {
      reject(
        new ExternalToolFailureError(`${label} could not be started: ${error.message}`, 'SPAWN_FAILED', {
          cause: error,
          context: { ...options.context, tool: label },
        }),
      );
    });
    child.once('close', (code) => resolve(code));
  });

  return {
    label,
    stdout: options.role === 'producer' ? child.stdout : null,
    stdin: options.role === 'consumer' ? child.stdin : null,
    exited,
    stderrTail,
    kill: () => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill();
      }
    },
  };
}
