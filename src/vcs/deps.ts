import { ExternalToolFailureError } from '../errors.js';
import { runTool } from './process.js';

export interface Dependency {
  name: string;
  command: string;
  args: string[];
  hint: string;
}

export const DEPENDENCIES: Dependency[] = [
  { name: 'Git', command: 'git', args: ['--version'], hint: 'Install git from your package manager' },
  { name: 'Fossil', command: 'fossil', args: ['version'], hint: 'Install fossil from https://fossil-scm.org' },
  {
    name: 'git-filter-repo',
    command: 'git-filter-repo',
    args: ['--version'],
    hint: 'Install it with: pip install git-filter-repo',
  },
];

export interface MissingDependency {
  name: string;
  hint: string;
  reason: string;
}

/** Run each tool's version command; returns the ones that are missing or broken. */
export async function checkDependencies(
  cwd: string,
  dependencies: Dependency[] = DEPENDENCIES,
): Promise<MissingDependency[]> {
  const missing: MissingDependency[] = [];
  for (const dep of dependencies) {
    try {
      await runTool(dep.command, dep.args, { cwd });
    } catch (error) {
      if (!(error instanceof ExternalToolFailureError)) throw error;
      missing.push({ name: dep.name, hint: dep.hint, reason: error.message });
    }
  }
  return missing;
}
