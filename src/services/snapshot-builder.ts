import { createHash } from 'node:crypto';
import type { Stats } from 'node:fs';
import { lstat, readdir, readFile, realpath, stat } from 'node:fs/promises';
import path from 'node:path';
import type { ManifestEntry, Snapshot } from '../types/backup.js';
import { SiteBackupError, errorMessage } from '../types/errors.js';
import { relativePathProblem } from '../utils/object-keys.js';

export function hashContent(value: Buffer): string {
  return createHash('sha256').update(value).digest('hex');
}

/** Plain code-unit order, independent of locale. */
export function compareRelativePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function toPosixRelative(rootDir: string, absolutePath: string): string {
  return path.relative(rootDir, absolutePath).split(path.sep).join('/');
}

export function isWithinRoot(rootDir: string, candidate: string): boolean {
  const relative = path.relative(rootDir, candidate);
  if (relative === '') return true;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

async function readFileOrFail(absolutePath: string, relativePath: string): Promise<Buffer> {
  try {
    return await readFile(absolutePath);
  } catch (error) {
    throw new SiteBackupError(
      'unreadable_file',
      `Cannot read ${relativePath}: ${errorMessage(error)}`,
      relativePath,
    );
  }
}

async function resolveRoot(rootDir: string): Promise<string> {
  try {
    const info = await stat(rootDir);
    if (!info.isDirectory()) {
      throw new SiteBackupError('source_missing', `Snapshot source ${rootDir} is not a directory.`, rootDir);
    }
    return await realpath(rootDir);
  } catch (error) {
    if (error instanceof SiteBackupError) throw error;
    throw new SiteBackupError('source_missing', `Snapshot source ${rootDir} does not exist.`, rootDir);
  }
}

/**
 * Walks `rootDir` and returns a deterministic manifest of every regular file.
 *
 * Symbolic links are followed only when they stay inside the root: a link to
 * a file is captured under the link's own path, a link to a directory is
 * skipped (its files are captured at their real location). A link escaping
 * the root fails the walk with `traversal_rejected`, as does a file whose
 * path restore would refuse (a backslash or a drive-letter first segment).
 */
export async function buildSnapshot(rootDir: string): Promise<Snapshot> {
  const absoluteRoot = path.resolve(rootDir);
  const realRoot = await resolveRoot(absoluteRoot);
  const entries: ManifestEntry[] = [];

  const addFile = async (contentPath: string, relativePath: string): Promise<void> => {
    const problem = relativePathProblem(relativePath);
    if (problem) {
      throw new SiteBackupError(
        'traversal_rejected',
        `Cannot back up ${relativePath}: ${problem}, so it could not be restored.`,
        relativePath,
      );
    }
    const bytes = await readFileOrFail(contentPath, relativePath);
    entries.push({ relativePath, size: bytes.length, contentHash: hashContent(bytes) });
  };

  const walk = async (dir: string): Promise<void> => {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      const relativeDir = toPosixRelative(realRoot, dir) || '.';
      throw new SiteBackupError(
        'unreadable_file',
        `Cannot list ${relativeDir}: ${errorMessage(error)}`,
        relativeDir,
      );
    }

    for (const name of names) {
      const absolutePath = path.join(dir, name);
      const relativePath = toPosixRelative(realRoot, absolutePath);

      let info: Stats;
      try {
        info = await lstat(absolutePath);
      } catch (error) {
        throw new SiteBackupError(
          'unreadable_file',
          `Cannot stat ${relativePath}: ${errorMessage(error)}`,
          relativePath,
        );
      }

      if (info.isDirectory()) {
        await walk(absolutePath);
      } else if (info.isFile()) {
        await addFile(absolutePath, relativePath);
      } else if (info.isSymbolicLink()) {
        await visitLink(absolutePath, relativePath);
      }
    }
  };

  const visitLink = async (linkPath: string, relativePath: string): Promise<void> => {
    let target: string;
    try {
      target = await realpath(linkPath);
    } catch (error) {
      throw new SiteBackupError(
        'unreadable_file',
        `Symbolic link ${relativePath} cannot be resolved: ${errorMessage(error)}`,
        relativePath,
      );
    }

    if (!isWithinRoot(realRoot, target)) {
      throw new SiteBackupError(
        'traversal_rejected',
        `Symbolic link ${relativePath} points outside the snapshot root.`,
        relativePath,
      );
    }

    let targetInfo: Stats;
    try {
      targetInfo = await stat(target);
    } catch (error) {
      throw new SiteBackupError(
        'unreadable_file',
        `Cannot stat the target of ${relativePath}: ${errorMessage(error)}`,
        relativePath,
      );
    }
    if (targetInfo.isFile()) {
      await addFile(target, relativePath);
    }
  };

  await walk(realRoot);

  entries.sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath));
  return {
    rootDir: realRoot,
    entries,
    fileCount: entries.length,
    totalBytes: entries.reduce((sum, entry) => sum + entry.size, 0),
  };
}

/**
 * Re-reads an entry's bytes, failing with `unreadable_file` when the file
 * disappeared or no longer matches the manifest.
 */
export async function readSnapshotEntry(snapshot: Snapshot, entry: ManifestEntry): Promise<Buffer> {
  const absolutePath = path.join(snapshot.rootDir, ...entry.relativePath.split('/'));
  const bytes = await readFileOrFail(absolutePath, entry.relativePath);

  if (bytes.length !== entry.size || hashContent(bytes) !== entry.contentHash) {
    throw new SiteBackupError(
      'unreadable_file',
      `${entry.relativePath} changed after the snapshot was taken.`,
      entry.relativePath,
    );
  }
  return bytes;
}
