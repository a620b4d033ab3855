import { randomBytes } from 'node:crypto';
import type { Stats } from 'node:fs';
import { lstat, mkdir, readdir, rename, rm, rmdir, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type {
  OperationContext,
  OperationOutcome,
  PublishHook,
  PublishStatus,
  TransferSettings,
} from '../types/backup.js';
import type { ObjectStoreClient } from '../types/object-store.js';
import { ObjectStoreError, isRetryableStoreError } from '../types/object-store.js';
import { SiteBackupError, errorMessage } from '../types/errors.js';
import { compareRelativePaths, toPosixRelative } from './snapshot-builder.js';
import { runBounded } from '../utils/bounded-pool.js';
import { withRetry } from '../utils/retry.js';
import { isFolderMarker, listPrefixFor, normalizePrefix, relativePathForKey } from '../utils/object-keys.js';
import { logError, logInfo, logWarn } from '../utils/logger.js';

export interface RestoreOrchestratorOptions {
  store: ObjectStoreClient;
  transfer: TransferSettings;
  /** Run once after files are restored; absent means publishing is not configured. */
  publishHook?: PublishHook | null;
}

export interface RestoreRunOptions {
  /** Remove local files the snapshot does not contain. */
  clean?: boolean;
}

interface PlannedFile {
  key: string;
  relativePath: string;
}

function abortedError(phase: string): SiteBackupError {
  return new SiteBackupError('timeout', `Restore deadline passed during ${phase}.`);
}

async function assertTargetDirectory(targetDir: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(targetDir);
  } catch {
    throw new SiteBackupError('target_missing', `Restore target ${targetDir} does not exist.`, targetDir);
  }
  if (!info.isDirectory()) {
    throw new SiteBackupError('target_missing', `Restore target ${targetDir} is not a directory.`, targetDir);
  }
}

/**
 * First directory between `root` and `relativePath`'s file that is a symbolic
 * link, as a forward-slash path, or `null`. Missing directories end the walk;
 * restore creates them as real directories.
 */
async function findLinkedParent(root: string, relativePath: string): Promise<string | null> {
  const segments = relativePath.split('/').slice(0, -1);
  for (let depth = 1; depth <= segments.length; depth++) {
    let info: Stats;
    try {
      info = await lstat(path.join(root, ...segments.slice(0, depth)));
    } catch {
      return null;
    }
    if (info.isSymbolicLink()) return segments.slice(0, depth).join('/');
  }
  return null;
}

async function assertNoLinkedParent(root: string, file: PlannedFile): Promise<void> {
  const linked = await findLinkedParent(root, file.relativePath);
  if (linked !== null) {
    throw new SiteBackupError(
      'traversal_rejected',
      `Refusing to restore ${file.relativePath}: ${linked} is a symbolic link in the target.`,
      file.key,
    );
  }
}

/** Writes beside the destination then renames, so readers never see a half-written file. */
async function writeFileAtomic(destination: string, body: Buffer): Promise<void> {
  await mkdir(path.dirname(destination), { recursive: true });
  const tempPath = path.join(
    path.dirname(destination),
    `.${path.basename(destination)}.${randomBytes(6).toString('hex')}.tmp`,
  );
  try {
    await writeFile(tempPath, body);
    await rename(tempPath, destination);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/** Every non-directory entry under `root`, as forward-slash relative paths. Links are not followed. */
async function listLocalFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const absolutePath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(absolutePath);
      } else {
        files.push(toPosixRelative(root, absolutePath));
      }
    }
  };
  await walk(root);
  return files;
}

/** Removes directories under `root` left empty, deepest first; `root` itself stays. */
async function pruneEmptyDirectories(root: string, signal: AbortSignal, dir: string = root): Promise<number> {
  let removed = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (signal.aborted) throw abortedError('the cleanup');
    if (entry.isDirectory()) {
      removed += await pruneEmptyDirectories(root, signal, path.join(dir, entry.name));
    }
  }
  if (dir !== root && (await readdir(dir)).length === 0) {
    await rmdir(dir);
    removed += 1;
  }
  return removed;
}

/**
 * Rebuilds a target directory from the newest remote snapshot.
 *
 * Additive by default: local files missing from the snapshot are left alone
 * unless `clean` is set. A download failure leaves already written files in
 * place; there is no rollback.
 */
export class RestoreOrchestrator {
  readonly #store: ObjectStoreClient;
  readonly #transfer: TransferSettings;
  readonly #publishHook: PublishHook | null;

  constructor(options: RestoreOrchestratorOptions) {
    this.#store = options.store;
    this.#transfer = options.transfer;
    this.#publishHook = options.publishHook ?? null;
  }

  async run(
    targetDir: string,
    remotePrefix: string,
    options: RestoreRunOptions,
    context: OperationContext,
  ): Promise<OperationOutcome> {
    const root = path.resolve(targetDir);
    const prefix = normalizePrefix(remotePrefix);
    const { signal } = context;

    await assertTargetDirectory(root);

    const keys = await this.#listKeys(prefix, signal);
    const fileKeys = keys.filter((key) => !isFolderMarker(key));
    if (fileKeys.length === 0) {
      throw new SiteBackupError(
        'no_snapshot_found',
        `No snapshot found under ${listPrefixFor(prefix) || 'the bucket root'}; ${root} was left untouched.`,
      );
    }

    // Every key is validated before the first write.
    const plan: PlannedFile[] = fileKeys
      .map((key) => ({ key, relativePath: relativePathForKey(prefix, key, root) }))
      .sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath));

    const checkedDirs = new Set<string>();
    for (const file of plan) {
      const parent = path.posix.dirname(file.relativePath);
      if (checkedDirs.has(parent)) continue;
      checkedDirs.add(parent);
      await assertNoLinkedParent(root, file);
    }

    void logInfo(`[Restore] ${context.operationId}: restoring ${plan.length} files into ${root}.`);

    let restored = 0;
    let bytesTransferred = 0;
    const writtenSizes = new Map<string, number>();

    await runBounded(
      plan,
      async (file) => {
        const result = await withRetry(() => this.#store.get(file.key, { signal }), {
          maxAttempts: this.#transfer.maxAttempts,
          baseDelayMs: this.#transfer.baseDelayMs,
          maxDelayMs: this.#transfer.maxDelayMs,
          label: `download:${file.key}`,
          isRetryable: isRetryableStoreError,
          signal,
        });

        if (!result.ok || result.value === undefined) {
          if (signal.aborted) throw abortedError(`the download of ${file.key}`);
          throw new SiteBackupError(
            'partial_download',
            `Download of ${file.key} failed after ${result.attempts} attempts: ${result.error}. ${restored} files were already restored.`,
            file.key,
          );
        }

        const body = result.value;
        if (signal.aborted) throw abortedError(`the download of ${file.key}`);
        // The tree may have changed since planning.
        await assertNoLinkedParent(root, file);
        try {
          await writeFileAtomic(path.join(root, ...file.relativePath.split('/')), body);
        } catch (error) {
          throw new SiteBackupError(
            'partial_download',
            `Writing ${file.relativePath} failed: ${errorMessage(error)}. ${restored} files were already restored.`,
            file.key,
          );
        }

        restored += 1;
        bytesTransferred += body.length;
        writtenSizes.set(file.relativePath, body.length);
        void logInfo(`[Restore] Restored ${file.key} -> ${file.relativePath} (${restored}/${plan.length}).`);
      },
      { concurrency: this.#transfer.concurrency, signal },
    );

    if (signal.aborted) throw abortedError('the download phase');

    await this.#verify(root, writtenSizes, context.operationId);

    let removed = 0;
    if (options.clean) {
      removed = await this.#removeExtraneous(root, new Set(plan.map((file) => file.relativePath)), signal);
    }

    const publishStatus = await this.#publish(context.operationId);

    const details = [
      `Restored ${restored} files from ${listPrefixFor(prefix) || 'the bucket root'}.`,
      `Verified ${writtenSizes.size} files on disk.`,
    ];
    if (options.clean) {
      details.push(`Removed ${removed} local paths absent from the snapshot.`);
    }
    if (publishStatus === 'failed') {
      details.push('Publishing failed; see the log.');
    }

    return { bytesTransferred, fileCount: restored, publishStatus, detail: details.join(' ') };
  }

  async #listKeys(prefix: string, signal: AbortSignal): Promise<string[]> {
    const listPrefix = listPrefixFor(prefix);
    const result = await withRetry(() => this.#store.list(listPrefix, { signal }), {
      maxAttempts: this.#transfer.maxAttempts,
      baseDelayMs: this.#transfer.baseDelayMs,
      maxDelayMs: this.#transfer.maxDelayMs,
      label: `list:${listPrefix}`,
      isRetryable: isRetryableStoreError,
      signal,
    });

    if (result.ok && result.value) {
      return result.value;
    }
    if (signal.aborted) throw abortedError('the listing');
    if (result.cause instanceof ObjectStoreError && result.cause.kind === 'auth') {
      throw new SiteBackupError('configuration', `Object store rejected the credentials: ${result.error}`);
    }
    throw new SiteBackupError(
      'transient_transfer',
      `Listing ${listPrefix || 'the bucket root'} failed after ${result.attempts} attempts: ${result.error}`,
    );
  }

  /** Every restored file must exist on disk with the size that was downloaded. */
  async #verify(root: string, expected: Map<string, number>, operationId: string): Promise<void> {
    const mismatches: string[] = [];
    for (const [relativePath, size] of expected) {
      try {
        const info = await lstat(path.join(root, ...relativePath.split('/')));
        if (!info.isFile() || info.size !== size) {
          mismatches.push(`${relativePath} (expected ${size} bytes, found ${info.isFile() ? `${info.size} bytes` : 'no regular file'})`);
        }
      } catch {
        mismatches.push(`${relativePath} (missing)`);
      }
    }

    if (mismatches.length > 0) {
      throw new SiteBackupError(
        'partial_download',
        `Verification failed for ${mismatches.length} of ${expected.size} files: ${mismatches.slice(0, 5).join(', ')}.`,
      );
    }
    void logInfo(`[Restore] ${operationId}: verified ${expected.size} files on disk.`);
  }

  async #removeExtraneous(root: string, keep: Set<string>, signal: AbortSignal): Promise<number> {
    let removed = 0;
    for (const relativePath of await listLocalFiles(root)) {
      if (signal.aborted) throw abortedError('the cleanup');
      if (keep.has(relativePath)) continue;
      const absolutePath = path.join(root, ...relativePath.split('/'));
      const info = await lstat(absolutePath);
      if (!info.isDirectory()) {
        await unlink(absolutePath);
        removed += 1;
        void logInfo(`[Restore] Removed ${relativePath} (not in snapshot).`);
      }
    }
    const prunedDirs = await pruneEmptyDirectories(root, signal);
    if (prunedDirs > 0) {
      void logInfo(`[Restore] Removed ${prunedDirs} empty directories.`);
    }
    return removed + prunedDirs;
  }

  async #publish(operationId: string): Promise<PublishStatus> {
    if (!this.#publishHook) {
      return 'not_configured';
    }
    try {
      await this.#publishHook.publish();
      void logInfo(`[Restore] ${operationId}: publish hook completed.`);
      return 'published';
    } catch (error) {
      void logError(`[Restore] ${operationId}: publish hook failed: ${errorMessage(error)}`);
      void logWarn(`[Restore] ${operationId}: files are restored but not redeployed.`);
      return 'failed';
    }
  }
}
