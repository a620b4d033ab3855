export type OperationKind = 'backup' | 'restore' | 'disaster';

export type OperationStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export type PublishStatus = 'not_configured' | 'published' | 'failed';

/** One file of a snapshot manifest. */
export interface ManifestEntry {
  /** Forward-slash path relative to the snapshot root, without `.` or `..` segments. */
  relativePath: string;
  size: number;
  /** SHA-256 hex digest; used for logging and verification, never for deduplication. */
  contentHash: string;
}

export interface Snapshot {
  rootDir: string;
  /** Sorted by `relativePath` (code-unit order). */
  entries: ManifestEntry[];
  fileCount: number;
  totalBytes: number;
}

export interface OperationRecord {
  id: string;
  kind: OperationKind;
  status: OperationStatus;
  targetDir: string;
  remotePrefix: string | null;
  startedAt: string;
  endedAt: string | null;
  durationMs: number | null;
  errorCode: string | null;
  errorMessage: string | null;
  bytesTransferred: number | null;
  fileCount: number | null;
  publishStatus: PublishStatus | null;
  detail: string | null;
}

/** Values an orchestrator reports back when it finishes without throwing. */
export interface OperationOutcome {
  bytesTransferred: number;
  fileCount: number;
  publishStatus?: PublishStatus;
  detail?: string;
}

export type LockState =
  | { state: 'idle' }
  | { state: 'running'; kind: OperationKind; operationId: string; since: string };

export interface BackupStatusReport {
  targetDir: string;
  lockState: LockState;
  lastBackup: OperationRecord | null;
  lastRestore: OperationRecord | null;
  lastDisaster: OperationRecord | null;
}

export interface CurrentMetrics {
  lastBackup: OperationRecord | null;
  lastSuccessfulBackup: OperationRecord | null;
  lastRestore: OperationRecord | null;
  lastDisaster: OperationRecord | null;
}

/** External step run once after a successful restore (e.g. a push that triggers redeployment). */
export interface PublishHook {
  publish(): Promise<void>;
}

/** Per-operation context handed to orchestrators by the coordinator. */
export interface OperationContext {
  operationId: string;
  /** Aborted when the operation deadline passes. */
  signal: AbortSignal;
  /**
   * Runs a sub-operation under the lock already held, with its own record.
   * Resolves with the finalized record; never throws for a failed body.
   */
  runNested(
    kind: OperationKind,
    remotePrefix: string | null,
    body: (context: OperationContext) => Promise<OperationOutcome>,
  ): Promise<OperationRecord>;
}

export interface TransferSettings {
  /** Maximum transfers in flight. */
  concurrency: number;
  /** Attempts per object, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

export interface TriggerOptions {
  /** Deadline for the whole operation; 0 or undefined disables it. */
  timeoutMs?: number;
}

export interface RestoreTriggerOptions extends TriggerOptions {
  /** Delete local files absent from the snapshot after all downloads succeed. */
  clean?: boolean;
}

export interface DisasterTriggerOptions extends TriggerOptions {
  /** Upload a fresh backup inside the same lock before clearing the target. */
  backupFirst?: boolean;
}
