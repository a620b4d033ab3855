import path from 'node:path';
import { SiteBackupError } from '../types/errors.js';

/** Strips surrounding slashes; an empty prefix maps keys to the bucket root. */
export function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

export function listPrefixFor(prefix: string): string {
  const normalized = normalizePrefix(prefix);
  return normalized === '' ? '' : `${normalized}/`;
}

export function objectKeyFor(prefix: string, relativePath: string): string {
  return `${listPrefixFor(prefix)}${relativePath}`;
}

/** Keys ending in `/` are folder placeholders some consoles create; they carry no file. */
export function isFolderMarker(key: string): boolean {
  return key.endsWith('/');
}

/**
 * Why a forward-slash relative path cannot be stored as a key and mapped back
 * on restore, or `null` when it can.
 */
export function relativePathProblem(relative: string): string | null {
  if (relative === '') return 'empty path';
  if (relative.includes('\0')) return 'contains a NUL byte';
  if (relative.includes('\\')) return 'contains a backslash';
  if (relative.startsWith('/') || /^[A-Za-z]:/.test(relative)) return 'absolute path';
  if (relative.split('/').some((segment) => segment === '' || segment === '.' || segment === '..')) {
    return 'contains an empty, "." or ".." segment';
  }
  return null;
}

/**
 * Maps a listed key back to a path relative to the restore target.
 *
 * Rejects with `traversal_rejected` any key that is outside the prefix, fails
 * {@link relativePathProblem}, or would resolve outside `targetDir`.
 */
export function relativePathForKey(prefix: string, key: string, targetDir: string): string {
  const listPrefix = listPrefixFor(prefix);
  const reject = (reason: string): never => {
    throw new SiteBackupError('traversal_rejected', `Refusing object key ${JSON.stringify(key)}: ${reason}.`, key);
  };

  if (!key.startsWith(listPrefix)) {
    reject('outside the snapshot prefix');
  }

  const relative = key.slice(listPrefix.length);
  const problem = relativePathProblem(relative);
  if (problem) reject(problem);

  const segments = relative.split('/');
  const root = path.resolve(targetDir);
  const destination = path.resolve(root, ...segments);
  const fromRoot = path.relative(root, destination);
  if (fromRoot === '' || fromRoot === '..' || fromRoot.startsWith(`..${path.sep}`) || path.isAbsolute(fromRoot)) {
    reject('resolves outside the target directory');
  }

  return segments.join('/');
}
