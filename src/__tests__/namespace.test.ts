import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidConfigurationError } from '../errors.js';
import {
  branchPrefix,
  isNamespaced,
  isUrlLocator,
  normalize,
  prefixToPath,
  sanitize,
  validateSourceLocator,
} from '../sync/namespace.js';

describe('normalize', () => {
  it('accepts canonical paths', () => {
    expect(normalize('libs/foo')).toBe('libs/foo');
    expect(normalize('tools')).toBe('tools');
    expect(normalize('a-b/c.d/e_f')).toBe('a-b/c.d/e_f');
  });

  it('turns backslashes into slashes', () => {
    expect(normalize('libs\\foo')).toBe('libs/foo');
  });

  it.each([
    ['', 'path cannot be empty'],
    ['/libs/foo', "must not start or end with '/'"],
    ['libs/foo/', "must not start or end with '/'"],
    ['libs//foo', 'contains an empty path component'],
    ['libs/../etc', "must not contain '..' or '@{'"],
    ['libs/@{u}', "must not contain '..' or '@{'"],
    ['libs/.hidden', "path components must not start with '.'"],
    ['libs/foo.lock', "path components must not end with '.' or '.lock'"],
    ['libs/foo.', "path components must not end with '.' or '.lock'"],
    ['libs/my foo', 'contains characters that are illegal in file or branch names'],
    ['libs/a:b', 'contains characters that are illegal in file or branch names'],
    ['libs/a__b', "path components must not contain '__' or start/end with '_'"],
    ['libs/_a', "path components must not contain '__' or start/end with '_'"],
  ])('rejects %j', (path, reason) => {
    expect(() => normalize(path)).toThrow(`Invalid subdirectory path '${path}': ${reason}`);
  });

  it('throws InvalidConfigurationError with INVALID_PATH', () => {
    try {
      normalize('../x');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      expect(error).toMatchObject({ code: 'INVALID_PATH', context: { path: '../x' } });
    }
  });
});

describe('branch prefix', () => {
  it('joins components with the delimiter', () => {
    expect(branchPrefix('libs/foo')).toBe('libs__foo');
    expect(branchPrefix('a/b/c')).toBe('a__b__c');
    expect(sanitize('libs/foo')).toBe('libs__foo');
  });

  it('is inverted by prefixToPath', () => {
    for (const path of ['libs/foo', 'a/b/c', 'single', 'x_y/z-w']) {
      expect(prefixToPath(branchPrefix(path))).toBe(path);
    }
  });

  it('keeps distinct paths apart', () => {
    expect(branchPrefix('a/b_c')).not.toBe(branchPrefix('a_b/c'));
  });

  it('tells namespaced branches by their full prefix', () => {
    expect(isNamespaced('libs__foo/main', 'libs__foo')).toBe(true);
    expect(isNamespaced('libs__foobar/main', 'libs__foo')).toBe(false);
    expect(isNamespaced('libs__foo', 'libs__foo')).toBe(false);
  });
});

describe('source locators', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fit-locator-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('recognizes remote locators', () => {
    expect(isUrlLocator('https://git.example.test/foo.git')).toBe(true);
    expect(isUrlLocator('ssh://git.example.test/foo.git')).toBe(true);
    expect(isUrlLocator('git@git.example.test:team/foo.git')).toBe(true);
    expect(isUrlLocator('../foo')).toBe(false);
    expect(isUrlLocator('/srv/git/foo')).toBe(false);
  });

  it('accepts URLs without touching the filesystem', () => {
    expect(validateSourceLocator('https://git.example.test/foo.git')).toEqual({ kind: 'url' });
  });

  it('checks local paths', () => {
    expect(validateSourceLocator(dir)).toEqual({ kind: 'path', isRepository: false });
    mkdirSync(join(dir, '.git'));
    expect(validateSourceLocator(dir)).toEqual({ kind: 'path', isRepository: true });
  });

  it('rejects empty and missing locators', () => {
    expect(() => validateSourceLocator(' ')).toThrow('Git URL or path cannot be empty');
    expect(() => validateSourceLocator(join(dir, 'missing'))).toThrow(`Path does not exist: ${join(dir, 'missing')}`);
  });
});
