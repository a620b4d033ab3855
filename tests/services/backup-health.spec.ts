import { describe, expect, it } from 'vitest';
import { evaluateBackupHealth } from '../../src/services/backup-health.js';
import type { OperationRecord } from '../../src/types/backup.js';

function backupRecord(overrides: Partial<OperationRecord>): OperationRecord {
  return {
    id: 'b1',
    kind: 'backup',
    status: 'succeeded',
    targetDir: '/srv/docs',
    remotePrefix: 'site',
    startedAt: '2026-03-01T08:00:00.000Z',
    endedAt: '2026-03-01T09:00:00.000Z',
    durationMs: 3_600_000,
    errorCode: null,
    errorMessage: null,
    bytesTransferred: 100,
    fileCount: 4,
    publishStatus: null,
    detail: null,
    ...overrides,
  };
}

const now = () => new Date('2026-03-02T12:00:00.000Z');
const empty = { lastBackup: null, lastSuccessfulBackup: null, lastRestore: null, lastDisaster: null };

describe('evaluateBackupHealth', () => {
  it('is healthy when the last success is recent and has files', () => {
    const record = backupRecord({});

    const report = evaluateBackupHealth({ ...empty, lastBackup: record, lastSuccessfulBackup: record }, {
      maxAgeHours: 48,
      now,
    });

    expect(report).toEqual({
      healthy: true,
      issues: [],
      checkedAt: '2026-03-02T12:00:00.000Z',
      lastBackupAt: '2026-03-01T08:00:00.000Z',
      lastBackupStatus: 'succeeded',
      lastSuccessfulBackupAt: '2026-03-01T09:00:00.000Z',
      hoursSinceSuccessfulBackup: 27,
      totalFiles: 4,
    });
  });

  it('reports a missing backup', () => {
    const report = evaluateBackupHealth(empty, { maxAgeHours: 48, now });

    expect(report.healthy).toBe(false);
    expect(report.issues).toEqual(['No successful backup found']);
  });

  it('reports a stale, empty backup followed by a failure', () => {
    const success = backupRecord({ fileCount: 0 });
    const failure = backupRecord({
      id: 'b2',
      status: 'failed',
      startedAt: '2026-03-02T11:00:00.000Z',
      endedAt: '2026-03-02T11:00:05.000Z',
      errorCode: 'transient_transfer',
      errorMessage: 'Upload of index.html failed after 3 attempts: reset',
    });

    const report = evaluateBackupHealth({ ...empty, lastBackup: failure, lastSuccessfulBackup: success }, {
      maxAgeHours: 24,
      now,
    });

    expect(report.issues).toEqual([
      'No backup in 27.0 hours (limit 24)',
      'No files in backup',
      'Last backup failed: Upload of index.html failed after 3 attempts: reset',
    ]);
    expect(report.lastBackupStatus).toBe('failed');
  });
});
