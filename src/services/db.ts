import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type {
  OperationKind,
  OperationStatus,
  PublishStatus,
} from '../types/backup.js';

export type SqliteDatabase = Database.Database;

/**
 * Opens (creating when needed) the operation-record database and applies the
 * schema. `:memory:` gives an isolated database, as used by tests.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  migrate(db);
  return db;
}

function migrate(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS operation_records (
      id TEXT PRIMARY KEY,
      kind TEXT NOT NULL,
      status TEXT NOT NULL,
      target_dir TEXT NOT NULL,
      remote_prefix TEXT,
      started_at TEXT NOT NULL,
      ended_at TEXT,
      duration_ms INTEGER,
      error_code TEXT,
      error_message TEXT,
      bytes_transferred INTEGER,
      file_count INTEGER,
      publish_status TEXT,
      detail TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_operation_records_started_at
      ON operation_records(started_at DESC);

    CREATE INDEX IF NOT EXISTS idx_operation_records_kind_started_at
      ON operation_records(kind, started_at DESC);
  `);
}

// ── Operation Records ────────────────────────────────────────────────────────

export interface OperationRecordRow {
  id: string;
  kind: OperationKind;
  status: OperationStatus;
  target_dir: string;
  remote_prefix: string | null;
  started_at: string;
  ended_at: string | null;
  duration_ms: number | null;
  error_code: string | null;
  error_message: string | null;
  bytes_transferred: number | null;
  file_count: number | null;
  publish_status: PublishStatus | null;
  detail: string | null;
}

export interface OperationRecordInput {
  id: string;
  kind: OperationKind;
  status: OperationStatus;
  targetDir: string;
  remotePrefix: string | null;
  startedAt: string;
}

export interface OperationFinalizeInput {
  status: 'succeeded' | 'failed';
  endedAt: string;
  durationMs: number;
  errorCode?: string | null;
  errorMessage?: string | null;
  bytesTransferred?: number | null;
  fileCount?: number | null;
  publishStatus?: PublishStatus | null;
  detail?: string | null;
}

const RECORD_COLUMNS = `
  id,
  kind,
  status,
  target_dir,
  remote_prefix,
  started_at,
  ended_at,
  duration_ms,
  error_code,
  error_message,
  bytes_transferred,
  file_count,
  publish_status,
  detail
`;

export function insertOperationRecord(db: SqliteDatabase, input: OperationRecordInput): void {
  db.prepare(`
    INSERT INTO operation_records (
      id,
      kind,
      status,
      target_dir,
      remote_prefix,
      started_at
    ) VALUES (?, ?, ?, ?, ?, ?)
  `).run(
    input.id,
    input.kind,
    input.status,
    input.targetDir,
    input.remotePrefix,
    input.startedAt,
  );
}

export function markOperationRunning(db: SqliteDatabase, id: string): boolean {
  const result = db.prepare(`
    UPDATE operation_records
    SET status = 'running'
    WHERE id = ? AND status = 'pending'
  `).run(id);
  return result.changes > 0;
}

/** Applies the terminal state once; returns false when the record was already final. */
export function finalizeOperationRecord(
  db: SqliteDatabase,
  id: string,
  input: OperationFinalizeInput,
): boolean {
  const result = db.prepare(`
    UPDATE operation_records
    SET
      status = ?,
      ended_at = ?,
      duration_ms = ?,
      error_code = ?,
      error_message = ?,
      bytes_transferred = ?,
      file_count = ?,
      publish_status = ?,
      detail = ?
    WHERE id = ? AND status IN ('pending', 'running')
  `).run(
    input.status,
    input.endedAt,
    input.durationMs,
    input.errorCode ?? null,
    input.errorMessage ?? null,
    input.bytesTransferred ?? null,
    input.fileCount ?? null,
    input.publishStatus ?? null,
    input.detail ?? null,
    id,
  );
  return result.changes > 0;
}

export function getOperationRecordRow(db: SqliteDatabase, id: string): OperationRecordRow | undefined {
  return db.prepare(`
    SELECT ${RECORD_COLUMNS}
    FROM operation_records
    WHERE id = ?
  `).get(id) as OperationRecordRow | undefined;
}

export function getLatestOperationRecordRow(
  db: SqliteDatabase,
  kind: OperationKind,
  status?: OperationStatus,
): OperationRecordRow | undefined {
  if (status) {
    return db.prepare(`
      SELECT ${RECORD_COLUMNS}
      FROM operation_records
      WHERE kind = ? AND status = ?
      ORDER BY started_at DESC, rowid DESC
      LIMIT 1
    `).get(kind, status) as OperationRecordRow | undefined;
  }
  return db.prepare(`
    SELECT ${RECORD_COLUMNS}
    FROM operation_records
    WHERE kind = ?
    ORDER BY started_at DESC, rowid DESC
    LIMIT 1
  `).get(kind) as OperationRecordRow | undefined;
}

export function listOperationRecordRows(db: SqliteDatabase, limit = 50): OperationRecordRow[] {
  const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit)));
  return db.prepare(`
    SELECT ${RECORD_COLUMNS}
    FROM operation_records
    ORDER BY started_at DESC, rowid DESC
    LIMIT ?
  `).all(boundedLimit) as OperationRecordRow[];
}

/** Unfinished records started before `startedBefore`. */
export function listUnfinishedOperationRecordRows(
  db: SqliteDatabase,
  startedBefore: string,
): OperationRecordRow[] {
  return db.prepare(`
    SELECT ${RECORD_COLUMNS}
    FROM operation_records
    WHERE status IN ('pending', 'running') AND started_at < ?
    ORDER BY started_at ASC
  `).all(startedBefore) as OperationRecordRow[];
}
