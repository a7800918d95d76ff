import pino from 'pino';
import type { LogLevel } from './config.js';

export type Logger = pino.Logger;

// Everything goes to stderr: stdout carries command output and the MCP stdio transport.

const LEVEL_COLORS: Record<number, string> = {
  10: '\x1b[90m', // trace - gray
  20: '\x1b[36m', // debug - cyan
  30: '\x1b[32m', // info - green
  40: '\x1b[33m', // warn - yellow
  50: '\x1b[31m', // error - red
  60: '\x1b[35m', // fatal - magenta
};

const LEVEL_NAMES: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL',
};

const RESET = '\x1b[0m';

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

interface LogRecord {
  time?: number;
  level?: number;
  module?: string;
  msg?: string;
  err?: { message?: string };
}

/** Format one pino JSON record as a single human-readable line. */
export function formatRecord(chunk: string, color: boolean): string {
  const obj: LogRecord = JSON.parse(chunk);
  const level = obj.level ?? 30;
  const levelName = LEVEL_NAMES[level] ?? 'LOG';
  const time = formatTime(obj.time ?? Date.now());
  const moduleName = obj.module ?? 'fit';
  const detail = obj.err?.message ? `: ${obj.err.message}` : '';
  const head = color ? `${LEVEL_COLORS[level] ?? ''}[${time}] ${levelName}${RESET}` : `[${time}] ${levelName}`;
  return `${head} ${moduleName} - ${obj.msg ?? ''}${detail}\n`;
}

let rootLevel: LogLevel = 'info';
let rootFormat: 'pretty' | 'json' = 'pretty';

function stderrDestination(): pino.DestinationStream {
  const color = Boolean(process.stderr.isTTY);
  return {
    write(chunk: string): void {
      if (rootFormat === 'json') {
        process.stderr.write(chunk);
        return;
      }
      try {
        process.stderr.write(formatRecord(chunk, color));
      } catch {
        process.stderr.write(chunk);
      }
    },
  };
}

let rootLogger: pino.Logger | undefined;
const children = new Map<string, pino.Logger>();

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: rootLevel }, stderrDestination());
  }
  return rootLogger;
}

/**
 * Apply the resolved log settings. Module loggers created earlier follow the
 * new level.
 */
export function configureLogging(options: { level: LogLevel; format: 'pretty' | 'json' }): void {
  rootLevel = options.level;
  rootFormat = options.format;
  getRootLogger().level = options.level;
  for (const child of children.values()) {
    child.level = options.level;
  }
}

/** Get the logger for a module. */
export function getLog(module: string): Logger {
  let child = children.get(module);
  if (!child) {
    child = getRootLogger().child({ module });
    children.set(module, child);
  }
  return child;
}

/** Log an error together with its message. */
export function logError(logger: Logger, err: unknown, message: string): void {
  if (err instanceof Error) {
    logger.error({ err }, message);
  } else {
    logger.error({ err: { message: String(err) } }, message);
  }
}
