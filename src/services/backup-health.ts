import type { CurrentMetrics, OperationRecord } from '../types/backup.js';

export interface BackupHealthReport {
  healthy: boolean;
  issues: string[];
  checkedAt: string;
  lastBackupAt: string | null;
  lastBackupStatus: OperationRecord['status'] | null;
  lastSuccessfulBackupAt: string | null;
  hoursSinceSuccessfulBackup: number | null;
  totalFiles: number | null;
}

export interface BackupHealthOptions {
  maxAgeHours: number;
  now?: () => Date;
}

/**
 * Judges whether backups are current. Unhealthy when no backup ever
 * succeeded, the last success is older than `maxAgeHours`, the most recent
 * backup failed, or the last success uploaded zero files.
 */
export function evaluateBackupHealth(metrics: CurrentMetrics, options: BackupHealthOptions): BackupHealthReport {
  const now = (options.now ?? (() => new Date()))();
  const issues: string[] = [];
  const { lastBackup, lastSuccessfulBackup } = metrics;

  let hoursSince: number | null = null;
  if (!lastSuccessfulBackup) {
    issues.push('No successful backup found');
  } else {
    const finishedAt = lastSuccessfulBackup.endedAt ?? lastSuccessfulBackup.startedAt;
    hoursSince = Math.round(((now.getTime() - Date.parse(finishedAt)) / 3_600_000) * 10) / 10;
    if (hoursSince > options.maxAgeHours) {
      issues.push(`No backup in ${hoursSince.toFixed(1)} hours (limit ${options.maxAgeHours})`);
    }
    if ((lastSuccessfulBackup.fileCount ?? 0) === 0) {
      issues.push('No files in backup');
    }
  }

  if (lastBackup?.status === 'failed') {
    issues.push(`Last backup failed: ${lastBackup.errorMessage ?? lastBackup.errorCode ?? 'unknown error'}`);
  }

  return {
    healthy: issues.length === 0,
    issues,
    checkedAt: now.toISOString(),
    lastBackupAt: lastBackup?.startedAt ?? null,
    lastBackupStatus: lastBackup?.status ?? null,
    lastSuccessfulBackupAt: lastSuccessfulBackup?.endedAt ?? null,
    hoursSinceSuccessfulBackup: hoursSince,
    totalFiles: lastSuccessfulBackup?.fileCount ?? null,
  };
}
