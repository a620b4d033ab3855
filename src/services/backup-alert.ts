import type { BackupHealthReport } from './backup-health.js';
import { errorMessage } from '../types/errors.js';
import { logError, logInfo, logWarn } from '../utils/logger.js';

const WEBHOOK_TIMEOUT_MS = 5_000;

export interface BackupAlert {
  subject: string;
  body: string;
  issues: string[];
  checkedAt: string;
}

/** Where an unhealthy health check is reported. */
export interface AlertSink {
  readonly name: string;
  send(alert: BackupAlert): Promise<void>;
}

export type AlertStatus = 'not_needed' | 'sent' | 'failed';

export function formatHealthAlert(report: BackupHealthReport): BackupAlert {
  const lines = [
    `Backup health check failed at ${report.checkedAt}`,
    '',
    'Issues detected:',
    ...report.issues.map((issue) => `- ${issue}`),
    '',
    `Last backup: ${report.lastBackupAt ?? 'never'}`,
    `Total files: ${report.totalFiles ?? 0}`,
    `Backup status: ${report.lastBackupStatus ?? 'unknown'}`,
  ];
  return {
    subject: `Backup system alert: ${report.issues.length} issue${report.issues.length === 1 ? '' : 's'}`,
    body: lines.join('\n'),
    issues: report.issues,
    checkedAt: report.checkedAt,
  };
}

export interface WebhookAlertSinkOptions {
  url: string;
  fetchImpl?: typeof fetch;
}

/** POSTs the alert as JSON; any non-2xx answer is a failure. */
export class WebhookAlertSink implements AlertSink {
  readonly name = 'webhook';
  readonly #url: string;
  readonly #fetch: typeof fetch;

  constructor(options: WebhookAlertSinkOptions) {
    this.#url = options.url;
    this.#fetch = options.fetchImpl ?? fetch;
  }

  async send(alert: BackupAlert): Promise<void> {
    const response = await this.#fetch(this.#url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: 'application/json',
      },
      body: JSON.stringify(alert),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`Alert webhook returned HTTP ${response.status}.`);
    }
  }
}

/** Fallback when no endpoint is configured: the alert only reaches the log. */
export class LogAlertSink implements AlertSink {
  readonly name = 'log';

  async send(alert: BackupAlert): Promise<void> {
    await logWarn(`[Alert] ${alert.subject}\n${alert.body}`);
  }
}

/**
 * Sends an alert for an unhealthy report. A failed delivery is logged and
 * reported as `failed`; it never changes the health verdict.
 */
export async function alertIfUnhealthy(report: BackupHealthReport, sink: AlertSink): Promise<AlertStatus> {
  if (report.healthy) {
    return 'not_needed';
  }
  try {
    await sink.send(formatHealthAlert(report));
    void logInfo(`[Alert] Sent health alert through ${sink.name} (${report.issues.length} issues).`);
    return 'sent';
  } catch (error) {
    void logError(`[Alert] Could not send health alert through ${sink.name}: ${errorMessage(error)}`);
    return 'failed';
  }
}
