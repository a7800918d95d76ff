/**
 * Namespace mapping for subtree paths.
 *
 * A subtree path `libs/foo` lives in the aggregate under the directory
 * `libs/foo/`, its branches carry the prefix `libs__foo/`, and its clone and
 * marks files are named `libs__foo`. The mapping to the prefix must stay
 * injective: components may not contain `__` or start/end with `_`, so every
 * `__` in a prefix is a separator and `prefixToPath` recovers the path.
 *
 * Pure functions, except `validateSourceLocator`, which checks local paths on disk.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { InvalidConfigurationError } from '../errors.js';
import type { BranchPrefix, NormalizedPath, SafeIdentifier } from '../types.js';

export const PREFIX_DELIMITER = '__';

// Illegal in Windows file names and/or git ref names, plus whitespace and control chars.
const ILLEGAL_CHARS_RE = /[<>:"|?*~^[\\\s\x00-\x1F\x7F]/;

function invalid(path: string, reason: string): InvalidConfigurationError {
  return new InvalidConfigurationError(`Invalid subdirectory path '${path}': ${reason}`, 'INVALID_PATH', { path });
}

/**
 * Normalize and validate a logical subtree path.
 * Backslashes become `/`; everything else must already be in canonical form.
 */
export function normalize(path: string): NormalizedPath {
  if (!path) {
    throw invalid(path, 'path cannot be empty');
  }

  const p = path.replace(/\\/g, '/');

  if (p.startsWith('/') || p.endsWith('/')) {
    throw invalid(path, "must not start or end with '/'");
  }
  if (ILLEGAL_CHARS_RE.test(p)) {
    throw invalid(path, 'contains characters that are illegal in file or branch names');
  }
  if (p.includes('..') || p.includes('@{')) {
    throw invalid(path, "must not contain '..' or '@{'");
  }

  for (const component of p.split('/')) {
    if (component.length === 0) {
      throw invalid(path, 'contains an empty path component');
    }
    if (component.startsWith('.')) {
      throw invalid(path, "path components must not start with '.'");
    }
    if (component.endsWith('.') || component.endsWith('.lock')) {
      throw invalid(path, "path components must not end with '.' or '.lock'");
    }
    if (component.includes(PREFIX_DELIMITER) || component.startsWith('_') || component.endsWith('_')) {
      throw invalid(path, `path components must not contain '${PREFIX_DELIMITER}' or start/end with '_'`);
    }
  }

  return p;
}

/** Branch-name prefix for a normalized path: `a/b/c` → `a__b__c`. */
export function branchPrefix(path: NormalizedPath): BranchPrefix {
  return path.split('/').join(PREFIX_DELIMITER);
}

/** Inverse of branchPrefix. */
export function prefixToPath(prefix: BranchPrefix): NormalizedPath {
  return prefix.split(PREFIX_DELIMITER).join('/');
}

/** Filesystem-safe identifier for clone directories and marks files. */
export function sanitize(path: NormalizedPath): SafeIdentifier {
  return branchPrefix(path);
}

/** True when `branch` already lives in the namespace of `prefix`. */
export function isNamespaced(branch: string, prefix: BranchPrefix): boolean {
  return branch.startsWith(`${prefix}/`);
}

export type LocatorCheck = { kind: 'url' } | { kind: 'path'; isRepository: boolean };

const URL_LOCATOR_RE = /^(https?|git|ssh|file):\/\/|^[\w.-]+@[\w.-]+:/;

/** True for remote locators (`https://…`, `git@host:repo`); false for local paths. */
export function isUrlLocator(locator: string): boolean {
  return URL_LOCATOR_RE.test(locator);
}

/**
 * Validate a source locator (URL or local path).
 * Local paths must exist; a path without `.git` is accepted (bare repositories).
 */
export function validateSourceLocator(locator: string): LocatorCheck {
  if (!locator || !locator.trim()) {
    throw new InvalidConfigurationError('Git URL or path cannot be empty', 'EMPTY_LOCATOR');
  }

  if (isUrlLocator(locator)) {
    return { kind: 'url' };
  }

  if (!existsSync(locator)) {
    throw new InvalidConfigurationError(`Path does not exist: ${locator}`, 'LOCATOR_NOT_FOUND', { locator });
  }

  return { kind: 'path', isRepository: existsSync(join(locator, '.git')) };
}
