import { randomUUID } from 'node:crypto';
import type {
  CurrentMetrics,
  OperationKind,
  OperationRecord,
  OperationStatus,
  PublishStatus,
} from '../types/backup.js';
import {
  finalizeOperationRecord,
  getLatestOperationRecordRow,
  getOperationRecordRow,
  insertOperationRecord,
  listOperationRecordRows,
  listUnfinishedOperationRecordRows,
  markOperationRunning,
  openDatabase,
  type OperationRecordRow,
  type SqliteDatabase,
} from './db.js';
import { logWarn } from '../utils/logger.js';

export interface BeginOperationInput {
  /** Defaults to a fresh UUID. */
  id?: string;
  kind: OperationKind;
  targetDir: string;
  remotePrefix: string | null;
}

export interface FinalizeOperationInput {
  status: 'succeeded' | 'failed';
  errorCode?: string | null;
  errorMessage?: string | null;
  bytesTransferred?: number | null;
  fileCount?: number | null;
  publishStatus?: PublishStatus | null;
  detail?: string | null;
}

export interface MetricsStoreOptions {
  /** Path of the SQLite file, or `:memory:`. Ignored when `database` is given. */
  dbPath?: string;
  database?: SqliteDatabase;
  now?: () => Date;
}

function toRecord(row: OperationRecordRow): OperationRecord {
  return {
    id: row.id,
    kind: row.kind,
    status: row.status,
    targetDir: row.target_dir,
    remotePrefix: row.remote_prefix,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    durationMs: row.duration_ms,
    errorCode: row.error_code,
    errorMessage: row.error_message,
    bytesTransferred: row.bytes_transferred,
    fileCount: row.file_count,
    publishStatus: row.publish_status,
    detail: row.detail,
  };
}

/**
 * Durable, append-only history of operations. A record is appended when an
 * operation starts and finalized exactly once; finalized rows never change.
 */
export class MetricsStore {
  readonly #db: SqliteDatabase;
  readonly #now: () => Date;

  constructor(options: MetricsStoreOptions = {}) {
    this.#db = options.database ?? openDatabase(options.dbPath ?? ':memory:');
    this.#now = options.now ?? (() => new Date());
  }

  /** Appends a `pending` record. */
  begin(input: BeginOperationInput): OperationRecord {
    const id = input.id ?? randomUUID();
    insertOperationRecord(this.#db, {
      id,
      kind: input.kind,
      status: 'pending',
      targetDir: input.targetDir,
      remotePrefix: input.remotePrefix,
      startedAt: this.#now().toISOString(),
    });
    return this.#require(id);
  }

  markRunning(id: string): OperationRecord {
    markOperationRunning(this.#db, id);
    return this.#require(id);
  }

  /**
   * Moves a pending/running record to its terminal state. Returns null when
   * the record is unknown or already final; the stored row is left untouched.
   */
  finalize(id: string, input: FinalizeOperationInput): OperationRecord | null {
    const existing = getOperationRecordRow(this.#db, id);
    if (!existing) {
      return null;
    }

    const endedAt = this.#now();
    const durationMs = Math.max(0, endedAt.getTime() - Date.parse(existing.started_at));
    const applied = finalizeOperationRecord(this.#db, id, {
      ...input,
      endedAt: endedAt.toISOString(),
      durationMs,
    });

    if (!applied) {
      void logWarn(`[Metrics] Ignored second finalize for operation ${id} (status ${existing.status}).`);
      return null;
    }
    return this.#require(id);
  }

  /** Stores an already-complete record verbatim, e.g. when importing history. */
  record(record: OperationRecord): void {
    insertOperationRecord(this.#db, {
      id: record.id,
      kind: record.kind,
      status: record.status,
      targetDir: record.targetDir,
      remotePrefix: record.remotePrefix,
      startedAt: record.startedAt,
    });
    if (record.status === 'succeeded' || record.status === 'failed') {
      finalizeOperationRecord(this.#db, record.id, {
        status: record.status,
        endedAt: record.endedAt ?? record.startedAt,
        durationMs: record.durationMs ?? 0,
        errorCode: record.errorCode,
        errorMessage: record.errorMessage,
        bytesTransferred: record.bytesTransferred,
        fileCount: record.fileCount,
        publishStatus: record.publishStatus,
        detail: record.detail,
      });
    }
  }

  get(id: string): OperationRecord | null {
    const row = getOperationRecordRow(this.#db, id);
    return row ? toRecord(row) : null;
  }

  lastRecord(kind: OperationKind, status?: OperationStatus): OperationRecord | null {
    const row = getLatestOperationRecordRow(this.#db, kind, status);
    return row ? toRecord(row) : null;
  }

  /** Newest first. */
  list(limit = 50): OperationRecord[] {
    return listOperationRecordRows(this.#db, limit).map(toRecord);
  }

  /**
   * Fails every pending/running record older than `staleAfterMs` with
   * `interrupted`. Run once at startup, before any operation is accepted.
   */
  reconcileInterrupted(staleAfterMs: number): OperationRecord[] {
    const cutoff = new Date(this.#now().getTime() - staleAfterMs).toISOString();
    const reconciled: OperationRecord[] = [];

    for (const row of listUnfinishedOperationRecordRows(this.#db, cutoff)) {
      const record = this.finalize(row.id, {
        status: 'failed',
        errorCode: 'interrupted',
        errorMessage: `Operation was still ${row.status} when the process restarted.`,
      });
      if (record) {
        reconciled.push(record);
      }
    }
    return reconciled;
  }

  currentMetrics(): CurrentMetrics {
    return {
      lastBackup: this.lastRecord('backup'),
      lastSuccessfulBackup: this.lastRecord('backup', 'succeeded'),
      lastRestore: this.lastRecord('restore'),
      lastDisaster: this.lastRecord('disaster'),
    };
  }

  close(): void {
    this.#db.close();
  }

  #require(id: string): OperationRecord {
    const row = getOperationRecordRow(this.#db, id);
    if (!row) {
      throw new Error(`Operation record ${id} disappeared from the metrics store.`);
    }
    return toRecord(row);
  }
}
