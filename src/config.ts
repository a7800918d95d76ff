/**
 * Configuration: defaults, environment overrides and option validation.
 *
 * Every location is resolved against the aggregate root (`--cwd`, default the
 * process cwd). No operation depends on the process working directory after
 * the config has been resolved.
 */

import { z } from 'zod';
import { isAbsolute, resolve } from 'node:path';
import { InvalidConfigurationError } from './errors.js';

export const DEFAULT_FOSSIL_REPO = 'fitrepo.fossil';
export const DEFAULT_STATE_DB = '.fitrepo/fitrepo.db';
export const DEFAULT_CLONES_DIR = '.fitrepo/git_clones';
export const DEFAULT_MARKS_DIR = '.fitrepo/marks';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Environment variables read by the tool. */
const EnvSchema = z.object({
  FIT_FOSSIL_REPO: z.string().min(1).optional(),
  FIT_STATE_DB: z.string().min(1).optional(),
  FIT_CLONES_DIR: z.string().min(1).optional(),
  FIT_MARKS_DIR: z.string().min(1).optional(),
  FIT_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  FIT_LOG_FORMAT: z.enum(['pretty', 'json']).optional(),
});

export type FitEnv = z.infer<typeof EnvSchema>;

/** Raw global options as they come from the command line. */
const OptionsSchema = z.object({
  cwd: z.string().min(1).optional(),
  fossilRepo: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  gitClonesDir: z.string().min(1).optional(),
  marksDir: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
  fwdFossilOpen: z.string().optional(),
  fwdFossilInit: z.string().optional(),
  fwdfossil: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof OptionsSchema>;

/** Fully resolved configuration. All paths are absolute. */
export interface FitConfig {
  root: string;
  fossilRepo: string;
  stateDb: string;
  clonesDir: string;
  marksDir: string;
  logLevel: LogLevel;
  logFormat: 'pretty' | 'json';
  /** Extra arguments for `fossil open`. */
  fossilOpenArgs: string[];
  /** Extra arguments for `fossil init`. */
  fossilInitArgs: string[];
}

/** Read the FIT_* variables, rejecting malformed values. */
export function readEnv(env: NodeJS.ProcessEnv = process.env): FitEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidConfigurationError(
      `Invalid environment variable ${issue.path.join('.')}: ${issue.message}`,
      'INVALID_OPTION',
    );
  }
  return parsed.data;
}

/**
 * Split a forwarded argument string the way a POSIX shell would
 * (whitespace separation, single and double quotes, backslash escapes).
 */
export function splitArgs(value: string | undefined): string[] {
  if (!value) return [];

  const args: string[] = [];
  let current = '';
  let inArg = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];

    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && i + 1 < value.length) {
        current += value[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inArg = true;
    } else if (ch === '\\' && i + 1 < value.length) {
      current += value[++i];
      inArg = true;
    } else if (/\s/.test(ch)) {
      if (inArg) {
        args.push(current);
        current = '';
        inArg = false;
      }
    } else {
      current += ch;
      inArg = true;
    }
  }

  if (quote) {
    throw new InvalidConfigurationError(`Unterminated quote in forwarded arguments: ${value}`, 'INVALID_OPTION');
  }
  if (inArg) args.push(current);
  return args;
}

function under(root: string, p: string): string {
  return isAbsolute(p) ? p : resolve(root, p);
}

/**
 * Resolve command-line options and environment into a FitConfig.
 * Command-line options win over environment variables, which win over defaults.
 */
export function resolveConfig(options: unknown = {}, env: NodeJS.ProcessEnv = process.env): FitConfig {
  const parsed = OptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidConfigurationError(`Invalid option --${issue.path.join('.')}: ${issue.message}`, 'INVALID_OPTION');
  }
  const opts = parsed.data;
  const fitEnv = readEnv(env);

  const root = resolve(opts.cwd ?? process.cwd());

  // --fwdfossil is the deprecated catch-all; the specific flags take precedence.
  const legacyArgs = splitArgs(opts.fwdfossil);

  return {
    root,
    fossilRepo: under(root, opts.fossilRepo ?? fitEnv.FIT_FOSSIL_REPO ?? DEFAULT_FOSSIL_REPO),
    stateDb: under(root, opts.state ?? fitEnv.FIT_STATE_DB ?? DEFAULT_STATE_DB),
    clonesDir: under(root, opts.gitClonesDir ?? fitEnv.FIT_CLONES_DIR ?? DEFAULT_CLONES_DIR),
    marksDir: under(root, opts.marksDir ?? fitEnv.FIT_MARKS_DIR ?? DEFAULT_MARKS_DIR),
    logLevel: opts.verbose ? 'debug' : (fitEnv.FIT_LOG_LEVEL ?? 'info'),
    logFormat: fitEnv.FIT_LOG_FORMAT ?? 'pretty',
    fossilOpenArgs: opts.fwdFossilOpen !== undefined ? splitArgs(opts.fwdFossilOpen) : legacyArgs,
    fossilInitArgs: splitArgs(opts.fwdFossilInit),
  };
}
