import type { OperationContext, OperationOutcome, TransferSettings } from '../types/backup.js';
import type { ObjectStoreClient } from '../types/object-store.js';
import { ObjectStoreError, isRetryableStoreError } from '../types/object-store.js';
import { SiteBackupError, errorMessage } from '../types/errors.js';
import { buildSnapshot, readSnapshotEntry } from './snapshot-builder.js';
import { runBounded } from '../utils/bounded-pool.js';
import { withRetry } from '../utils/retry.js';
import { normalizePrefix, objectKeyFor } from '../utils/object-keys.js';
import { logInfo, logWarn } from '../utils/logger.js';

export interface BackupOrchestratorOptions {
  store: ObjectStoreClient;
  transfer: TransferSettings;
}

function abortedError(phase: string): SiteBackupError {
  return new SiteBackupError('timeout', `Backup deadline passed during ${phase}.`);
}

/**
 * Snapshot + upload. Every run re-walks the directory and uploads every
 * file; there is no resume and no content-based skipping.
 */
export class BackupOrchestrator {
  readonly #store: ObjectStoreClient;
  readonly #transfer: TransferSettings;

  constructor(options: BackupOrchestratorOptions) {
    this.#store = options.store;
    this.#transfer = options.transfer;
  }

  async run(targetDir: string, remotePrefix: string, context: OperationContext): Promise<OperationOutcome> {
    const prefix = normalizePrefix(remotePrefix);
    const { signal } = context;

    await this.#assertBucket(signal);

    const snapshot = await buildSnapshot(targetDir);
    void logInfo(
      `[Backup] ${context.operationId}: snapshot of ${snapshot.rootDir} has ${snapshot.fileCount} files (${snapshot.totalBytes} bytes).`,
    );
    if (signal.aborted) throw abortedError('the snapshot walk');

    let uploaded = 0;
    let bytesTransferred = 0;

    await runBounded(
      snapshot.entries,
      async (entry) => {
        const body = await readSnapshotEntry(snapshot, entry);
        const key = objectKeyFor(prefix, entry.relativePath);

        const result = await withRetry(() => this.#store.put(key, body, { signal }), {
          maxAttempts: this.#transfer.maxAttempts,
          baseDelayMs: this.#transfer.baseDelayMs,
          maxDelayMs: this.#transfer.maxDelayMs,
          label: `upload:${key}`,
          isRetryable: isRetryableStoreError,
          signal,
        });

        if (!result.ok) {
          if (signal.aborted) throw abortedError(`the upload of ${entry.relativePath}`);
          if (result.permanent) {
            throw new SiteBackupError(
              'upload_failed',
              `Upload of ${entry.relativePath} failed: ${result.error}`,
              entry.relativePath,
            );
          }
          throw new SiteBackupError(
            'transient_transfer',
            `Upload of ${entry.relativePath} failed after ${result.attempts} attempts: ${result.error}`,
            entry.relativePath,
          );
        }

        uploaded += 1;
        bytesTransferred += body.length;
        void logInfo(
          `[Backup] Uploaded ${entry.relativePath} -> ${key} (${uploaded}/${snapshot.fileCount}, sha256 ${entry.contentHash.slice(0, 12)}).`,
        );
      },
      { concurrency: this.#transfer.concurrency, signal },
    );

    if (signal.aborted) throw abortedError('the upload phase');

    return {
      bytesTransferred,
      fileCount: uploaded,
      detail: `Uploaded ${uploaded} files to ${prefix === '' ? 'the bucket root' : `${prefix}/`}.`,
    };
  }

  async #assertBucket(signal: AbortSignal): Promise<void> {
    const result = await withRetry(() => this.#store.bucketExists({ signal }), {
      maxAttempts: this.#transfer.maxAttempts,
      baseDelayMs: this.#transfer.baseDelayMs,
      maxDelayMs: this.#transfer.maxDelayMs,
      label: 'bucket-check',
      isRetryable: isRetryableStoreError,
      signal,
    });

    if (result.ok) {
      if (result.value === false) {
        throw new SiteBackupError('configuration', 'The configured bucket does not exist or is not accessible.');
      }
      return;
    }

    if (signal.aborted) throw abortedError('the bucket check');
    if (result.cause instanceof ObjectStoreError && result.cause.kind === 'auth') {
      throw new SiteBackupError('configuration', `Object store rejected the credentials: ${result.error}`);
    }
    void logWarn(`[Backup] Bucket check failed: ${errorMessage(result.cause ?? result.error)}`);
    throw new SiteBackupError(
      result.permanent ? 'upload_failed' : 'transient_transfer',
      `Bucket check failed after ${result.attempts} attempts: ${result.error}`,
    );
  }
}
