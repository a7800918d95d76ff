import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { readEnv, resolveConfig, splitArgs } from '../config.js';
import { formatRecord } from '../logger.js';

describe('splitArgs', () => {
  it('splits on whitespace', () => {
    expect(splitArgs('--force  --empty')).toEqual(['--force', '--empty']);
  });

  it('keeps quoted arguments together', () => {
    expect(splitArgs(`--user "Jane Doe" --name 'my repo'`)).toEqual(['--user', 'Jane Doe', '--name', 'my repo']);
    expect(splitArgs('a\\ b "c\\"d"')).toEqual(['a b', 'c"d']);
    expect(splitArgs('""')).toEqual(['']);
  });

  it('returns nothing for an empty value', () => {
    expect(splitArgs(undefined)).toEqual([]);
    expect(splitArgs('   ')).toEqual([]);
  });

  it('rejects an unterminated quote', () => {
    expect(() => splitArgs('--user "Jane')).toThrow('Unterminated quote in forwarded arguments: --user "Jane');
  });
});

describe('resolveConfig', () => {
  const root = '/work/mono';

  it('resolves the default layout under the root', () => {
    expect(resolveConfig({ cwd: root }, {})).toEqual({
      root,
      fossilRepo: join(root, 'fitrepo.fossil'),
      stateDb: join(root, '.fitrepo/fitrepo.db'),
      clonesDir: join(root, '.fitrepo/git_clones'),
      marksDir: join(root, '.fitrepo/marks'),
      logLevel: 'info',
      logFormat: 'pretty',
      fossilOpenArgs: [],
      fossilInitArgs: [],
    });
  });

  it('lets options win over the environment', () => {
    const config = resolveConfig(
      { cwd: root, fossilRepo: 'repo.fossil', marksDir: '/var/marks' },
      { FIT_FOSSIL_REPO: 'env.fossil', FIT_CLONES_DIR: 'clones', FIT_LOG_LEVEL: 'warn', FIT_LOG_FORMAT: 'json' },
    );
    expect(config.fossilRepo).toBe(join(root, 'repo.fossil'));
    expect(config.clonesDir).toBe(join(root, 'clones'));
    expect(config.marksDir).toBe('/var/marks');
    expect(config.logLevel).toBe('warn');
    expect(config.logFormat).toBe('json');
  });

  it('turns --verbose into debug logging', () => {
    expect(resolveConfig({ cwd: root, verbose: true }, { FIT_LOG_LEVEL: 'error' }).logLevel).toBe('debug');
  });

  it('splits forwarded fossil arguments', () => {
    const config = resolveConfig({ cwd: root, fwdFossilOpen: '--force', fwdFossilInit: '--template "t.fossil"' }, {});
    expect(config.fossilOpenArgs).toEqual(['--force']);
    expect(config.fossilInitArgs).toEqual(['--template', 't.fossil']);
  });

  it('uses the deprecated catch-all only for fossil open', () => {
    expect(resolveConfig({ cwd: root, fwdfossil: '--force' }, {}).fossilOpenArgs).toEqual(['--force']);
    expect(resolveConfig({ cwd: root, fwdfossil: '--force', fwdFossilOpen: '--keep' }, {}).fossilOpenArgs).toEqual([
      '--keep',
    ]);
  });

  it('ignores options it does not know', () => {
    expect(resolveConfig({ cwd: root, branch: 'libs__foo/main' }, {}).root).toBe(root);
  });

  it('rejects malformed options and environment', () => {
    expect(() => resolveConfig({ cwd: '' }, {})).toThrow(/^Invalid option --cwd/);
    expect(() => readEnv({ FIT_LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment variable FIT_LOG_LEVEL/);
  });
});

describe('formatRecord', () => {
  const time = new Date(2024, 0, 2, 3, 4, 5).getTime();

  it('renders one plain line', () => {
    const record = JSON.stringify({ level: 30, time, module: 'engine', msg: 'Imported libs/foo' });
    expect(formatRecord(record, false)).toBe('[03:04:05] INFO engine - Imported libs/foo\n');
  });

  it('appends the error message', () => {
    const record = JSON.stringify({ level: 50, time, module: 'cli', msg: 'update failed', err: { message: 'boom' } });
    expect(formatRecord(record, false)).toBe('[03:04:05] ERROR cli - update failed: boom\n');
  });

  it('colors the level', () => {
    const record = JSON.stringify({ level: 40, time, msg: 'careful' });
    expect(formatRecord(record, true)).toBe('\x1b[33m[03:04:05] WARN\x1b[0m fit - careful\n');
  });
});
