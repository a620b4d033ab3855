import type { Stats } from 'node:fs';
import { lstat, readdir, realpath, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { OperationContext, OperationOutcome } from '../types/backup.js';
import { SiteBackupError, isSiteBackupErrorCode } from '../types/errors.js';
import type { BackupOrchestrator } from './backup-orchestrator.js';
import { logInfo, logWarn } from '../utils/logger.js';

/** Directories that are never cleared, whatever the configuration says. */
const POSIX_SYSTEM_DIRECTORIES = [
  '/bin',
  '/boot',
  '/dev',
  '/etc',
  '/home',
  '/lib',
  '/lib64',
  '/media',
  '/mnt',
  '/opt',
  '/proc',
  '/root',
  '/run',
  '/sbin',
  '/srv',
  '/sys',
  '/tmp',
  '/usr',
  '/var',
  '/Applications',
  '/Library',
  '/System',
  '/Users',
  '/Volumes',
  '/private',
  '/private/tmp',
  '/private/var',
];

const WINDOWS_SYSTEM_DIRECTORIES = [
  'C:\\Windows',
  'C:\\Program Files',
  'C:\\Program Files (x86)',
  'C:\\ProgramData',
  'C:\\Users',
];

export function systemDirectories(platform: NodeJS.Platform = process.platform): readonly string[] {
  return platform === 'win32' ? WINDOWS_SYSTEM_DIRECTORIES : POSIX_SYSTEM_DIRECTORIES;
}

export interface DisasterGuardOptions {
  cwd?: string;
  homeDir?: string;
}

export interface DisasterSimulatorOptions extends DisasterGuardOptions {
  backup: BackupOrchestrator;
}

export interface DisasterRunOptions {
  /** Upload a safety backup before deleting anything. */
  backupFirst: boolean;
  remotePrefix: string;
}

function isSameOrAncestor(candidate: string, of: string): boolean {
  const relative = path.relative(candidate, of);
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

function samePath(a: string, b: string): boolean {
  return process.platform === 'win32' ? a.toLowerCase() === b.toLowerCase() : a === b;
}

/**
 * Refuses (`unsafe_target`) to clear a filesystem root, the home directory or
 * its ancestors, a system directory, a path with fewer than two segments, the
 * working directory or its ancestors, or a symbolic link. Returns the
 * resolved directory that is safe to clear.
 */
export async function assertSafeDisasterTarget(
  targetDir: string,
  options: DisasterGuardOptions = {},
): Promise<string> {
  const absolute = path.resolve(targetDir);
  const unsafe = (reason: string): SiteBackupError =>
    new SiteBackupError('unsafe_target', `Refusing to clear ${absolute}: ${reason}.`, absolute);

  let info: Stats;
  try {
    info = await lstat(absolute);
  } catch {
    throw new SiteBackupError('target_missing', `Disaster target ${absolute} does not exist.`, absolute);
  }
  if (info.isSymbolicLink()) throw unsafe('it is a symbolic link');
  if (!info.isDirectory()) {
    throw new SiteBackupError('target_missing', `Disaster target ${absolute} is not a directory.`, absolute);
  }

  const resolved = await realpath(absolute);
  const { root } = path.parse(resolved);
  if (samePath(resolved, root)) throw unsafe('it is a filesystem root');

  const segments = resolved.slice(root.length).split(path.sep).filter(Boolean);
  if (segments.length < 2) throw unsafe('it has fewer than two path segments');

  if (systemDirectories().some((dir) => samePath(resolved, dir))) {
    throw unsafe('it is a system directory');
  }

  const homeDir = path.resolve(options.homeDir ?? os.homedir());
  if (isSameOrAncestor(resolved, homeDir)) throw unsafe('it is the home directory or contains it');

  const cwd = path.resolve(options.cwd ?? process.cwd());
  if (isSameOrAncestor(resolved, cwd)) throw unsafe('it is the working directory or contains it');

  return resolved;
}

async function countFiles(dir: string): Promise<number> {
  let count = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    count += entry.isDirectory() ? await countFiles(path.join(dir, entry.name)) : 1;
  }
  return count;
}

/**
 * Deletes every child of the target directory, keeping the directory itself,
 * to rehearse recovery. Optionally uploads a safety backup first.
 */
export class DisasterSimulator {
  readonly #backup: BackupOrchestrator;
  readonly #guard: DisasterGuardOptions;

  constructor(options: DisasterSimulatorOptions) {
    this.#backup = options.backup;
    this.#guard = { cwd: options.cwd, homeDir: options.homeDir };
  }

  async run(targetDir: string, options: DisasterRunOptions, context: OperationContext): Promise<OperationOutcome> {
    const resolved = await assertSafeDisasterTarget(targetDir, this.#guard);

    let backupBytes = 0;
    let backupFiles = 0;
    if (options.backupFirst) {
      void logInfo(`[Disaster] ${context.operationId}: uploading a safety backup of ${resolved} first.`);
      const backupRecord = await context.runNested('backup', options.remotePrefix, (nested) =>
        this.#backup.run(resolved, options.remotePrefix, nested),
      );
      if (backupRecord.status !== 'succeeded') {
        const code = isSiteBackupErrorCode(backupRecord.errorCode) ? backupRecord.errorCode : 'upload_failed';
        throw new SiteBackupError(
          code,
          `Safety backup ${backupRecord.id} failed (${backupRecord.errorMessage ?? 'unknown error'}); nothing was deleted.`,
          resolved,
        );
      }
      backupBytes = backupRecord.bytesTransferred ?? 0;
      backupFiles = backupRecord.fileCount ?? 0;
    } else {
      void logWarn(`[Disaster] ${context.operationId}: clearing ${resolved} without a safety backup.`);
    }

    if (context.signal.aborted) {
      throw new SiteBackupError('timeout', 'Disaster deadline passed before deletion; nothing was deleted.', resolved);
    }

    const children = await readdir(resolved);
    const removedFiles = await countFiles(resolved);
    let removedEntries = 0;
    for (const child of children) {
      if (context.signal.aborted) {
        throw new SiteBackupError(
          'timeout',
          `Disaster deadline passed after removing ${removedEntries} of ${children.length} entries.`,
          resolved,
        );
      }
      await rm(path.join(resolved, child), { recursive: true, force: true });
      removedEntries += 1;
    }
    void logWarn(
      `[Disaster] ${context.operationId}: removed ${children.length} entries (${removedFiles} files) from ${resolved}.`,
    );

    const details = [`Removed ${children.length} entries (${removedFiles} files) from ${resolved}.`];
    if (options.backupFirst) {
      details.unshift(`Safety backup uploaded ${backupFiles} files.`);
    }

    return {
      bytesTransferred: backupBytes,
      fileCount: removedFiles,
      detail: details.join(' '),
    };
  }
}
