/**
 * Command-line interface.
 *
 * Every command resolves the configuration from the global options, checks
 * that the external tools are installed, opens the project and runs one
 * engine operation. Results go to stdout, logs to stderr.
 */

import { Command, Option } from 'commander';
import { resolveConfig } from './config.js';
import type { FitConfig } from './config.js';
import { configureLogging, getLog, logError } from './logger.js';
import { openProject } from './project.js';
import type { Project } from './project.js';
import { serve } from './server.js';
import type { ListedSubtree } from './sync/engine.js';
import { checkDependencies } from './vcs/deps.js';
import type { MissingDependency } from './vcs/deps.js';

const log = getLog('cli');

export interface CliDeps {
  version: string;
  openProject: (config: FitConfig) => Project;
  checkDependencies: (cwd: string) => Promise<MissingDependency[]>;
  serve: (project: Project, version: string) => Promise<void>;
  /** Writes one line of command output. */
  print: (line: string) => void;
  setExitCode: (code: number) => void;
}

export function defaultCliDeps(version: string): CliDeps {
  return {
    version,
    openProject: (config) => openProject(config),
    checkDependencies,
    serve,
    print: (line) => process.stdout.write(`${line}\n`),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

interface PushCommandOptions {
  branch?: string;
  force?: boolean;
}

/** Render `list` output, one subtree per entry. */
export function formatList(subtrees: ListedSubtree[], verbose: boolean): string[] {
  if (subtrees.length === 0) {
    return ['No repositories have been imported.'];
  }

  const lines = ['Imported repositories:'];
  for (const { registration, lastRun } of subtrees) {
    lines.push(`- ${registration.path}: ${registration.sourceLocator}`);
    if (!verbose) continue;

    lines.push(`  Clone path: ${registration.clonePath}`);
    lines.push(`  Git marks: ${registration.sourceMarksPath}`);
    lines.push(`  Fossil marks: ${registration.aggregateMarksPath}`);
    lines.push(`  Workspace: ${registration.workspacePath ?? '(not created)'}`);
    if (lastRun) {
      const when = lastRun.finishedAt ?? lastRun.startedAt;
      const error = lastRun.error ? ` (${lastRun.error})` : '';
      lines.push(`  Last sync: ${lastRun.direction} ${lastRun.status} at ${when}${error}`);
    } else {
      lines.push('  Last sync: never');
    }
  }
  return lines;
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('fit')
    .description('Merge git repositories into a Fossil repository under namespaced subdirectories')
    .version(deps.version)
    .option('-v, --verbose', 'Enable verbose output')
    .option('-f, --fossil-repo <file>', 'Fossil repository file (default: fitrepo.fossil)')
    .option('-s, --state <file>', 'State database (default: .fitrepo/fitrepo.db)')
    .option('-g, --git-clones-dir <dir>', 'Git clones directory (default: .fitrepo/git_clones)')
    .option('-M, --marks-dir <dir>', 'Marks directory (default: .fitrepo/marks)')
    .option('-C, --cwd <dir>', 'Project root (default: current directory)')
    .option('--fwd-fossil-open <args>', 'Arguments forwarded to fossil open')
    .option('--fwd-fossil-init <args>', 'Arguments forwarded to fossil init')
    .addOption(new Option('--fwdfossil <args>', 'Deprecated: use --fwd-fossil-open').hideHelp());

  /**
   * Run one command with an open project. Errors are logged and turn into
   * exit status 1; the project is closed afterwards unless `keepOpen`.
   */
  const run = async (
    command: Command,
    options: { requireTools: boolean; keepOpen?: boolean },
    task: (project: Project) => Promise<void>,
  ): Promise<void> => {
    try {
      const raw: unknown = command.optsWithGlobals();
      const config = resolveConfig(raw);
      configureLogging({ level: config.logLevel, format: config.logFormat });

      if (command.optsWithGlobals().fwdfossil !== undefined) {
        log.warn('--fwdfossil is deprecated; use --fwd-fossil-open or --fwd-fossil-init');
      }

      if (options.requireTools) {
        const missing = await deps.checkDependencies(config.root);
        if (missing.length > 0) {
          for (const dep of missing) {
            log.error(`${dep.name} is not installed or not working properly. ${dep.hint}`);
          }
          deps.setExitCode(1);
          return;
        }
      }

      const project = deps.openProject(config);
      try {
        await task(project);
      } finally {
        if (!options.keepOpen) project.close();
      }
    } catch (error) {
      logError(log, error, `${command.name()} failed`);
      deps.setExitCode(1);
    }
  };

  program
    .command('init')
    .description('Initialize a new fitrepo project')
    .action(async (_options: object, command: Command) => {
      await run(command, { requireTools: true }, async (project) => {
        const result = await project.engine.init();
        deps.print(
          `Initialized project ${result.projectName}${result.created ? ' (new repository)' : ''}${result.opened ? ', checkout opened' : ''}`,
        );
      });
    });

  program
    .command('import <source> <path>')
    .description('Import a git repository into a subdirectory of the aggregate')
    .action(async (source: string, path: string, _options: object, command: Command) => {
      await run(command, { requireTools: true }, async (project) => {
        const result = await project.engine.importSource(source, path);
        const renamed = result.branches.filter((b) => b.action === 'renamed').map((b) => b.target);
        deps.print(`Imported ${result.registration.sourceLocator} into ${result.registration.path}/`);
        if (renamed.length > 0) deps.print(`Branches: ${renamed.join(', ')}`);
      });
    });

  program
    .command('update <path>')
    .description('Import new commits from the git source of a subdirectory')
    .action(async (path: string, _options: object, command: Command) => {
      await run(command, { requireTools: true }, async (project) => {
        const result = await project.engine.update(path);
        deps.print(
          `Updated ${result.registration.path}: ${result.marksAdded.aggregate} new mark(s) in the aggregate`,
        );
      });
    });

  program
    .command('push <path>')
    .alias('push-git')
    .description('Push aggregate commits of a subdirectory back to its git source')
    .option('-b, --branch <name>', 'Aggregate branch to push (must start with the subtree prefix)')
    .option('--force', 'Force-push to the git source', false)
    .action(async (path: string, options: PushCommandOptions, command: Command) => {
      await run(command, { requireTools: true }, async (project) => {
        const result = await project.engine.push(path, { branch: options.branch, force: options.force });
        deps.print(
          `Pushed ${result.aggregateBranch} to ${result.registration.sourceLocator} (${result.published.join(', ') || 'no branches'})`,
        );
      });
    });

  program
    .command('reset-marks <path>')
    .description('Delete the marks files of a subdirectory (next sync is a full transfer)')
    .action(async (path: string, _options: object, command: Command) => {
      await run(command, { requireTools: true }, async (project) => {
        const removed = project.engine.resetMarks(path);
        deps.print(removed.length > 0 ? `Removed ${removed.join(', ')}` : 'No marks files to remove');
      });
    });

  program
    .command('list')
    .description('List imported repositories')
    .action(async (_options: object, command: Command) => {
      await run(command, { requireTools: false }, async (project) => {
        const verbose = project.config.logLevel === 'debug' || project.config.logLevel === 'trace';
        for (const line of formatList(project.engine.list(), verbose)) {
          deps.print(line);
        }
      });
    });

  program
    .command('fix-index <path>')
    .description('Rebuild the git index of a subdirectory workspace')
    .action(async (path: string, _options: object, command: Command) => {
      await run(command, { requireTools: true }, async (project) => {
        await project.engine.fixIndex(path);
        deps.print(`Workspace index of ${path} rebuilt`);
      });
    });

  program
    .command('serve')
    .description('Serve the sync operations as MCP tools on stdio')
    .action(async (_options: object, command: Command) => {
      await run(command, { requireTools: false, keepOpen: true }, async (project) => {
        await deps.serve(project, deps.version);
      });
    });

  return program;
}
