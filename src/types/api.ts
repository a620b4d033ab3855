import type { BackupStatusReport, OperationRecord } from './backup.js';
import type { BackupHealthReport } from '../services/backup-health.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    /** Machine-readable failure code, when the failure has one. */
    code?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    backup: BackupHealthReport;
}

// ── Operations ──────────────────────────────────────────────────────────────

export interface OperationData {
    record: OperationRecord;
}

export interface OperationListData {
    operations: OperationRecord[];
}

export type StatusData = BackupStatusReport;

export interface RestoreRequest {
    clean?: boolean;
}

export interface DisasterRequest {
    confirm: true;
    backupFirst?: boolean;
}

// ── Logs ────────────────────────────────────────────────────────────────────

export interface LogEntry {
    timestamp: string;
    level: string;
    message: string;
}
