import path from 'node:path';
import type {
  BackupStatusReport,
  DisasterTriggerOptions,
  OperationRecord,
  PublishHook,
  RestoreTriggerOptions,
  TransferSettings,
  TriggerOptions,
} from '../types/backup.js';
import type { ObjectStoreClient } from '../types/object-store.js';
import { BackupOrchestrator } from './backup-orchestrator.js';
import { RestoreOrchestrator } from './restore-orchestrator.js';
import { DisasterSimulator, type DisasterGuardOptions } from './disaster-simulator.js';
import { OperationCoordinator } from './operation-coordinator.js';
import { OperationLock } from './operation-lock.js';
import { MetricsStore } from './metrics-store.js';
import { S3ObjectStore } from './s3-object-store.js';
import { GitPublishHook } from './git-publish-hook.js';
import { evaluateBackupHealth, type BackupHealthReport } from './backup-health.js';
import { LogAlertSink, WebhookAlertSink, alertIfUnhealthy, type AlertSink, type AlertStatus } from './backup-alert.js';
import {
  getBooleanConfig,
  getConfigValue,
  getNumberConfig,
} from '../config/json-config.js';
import { assertRuntimeConfig } from '../config/env-validator.js';
import type { ConfigCondition } from '../config/env-schema.js';
import { logInfo, logWarn } from '../utils/logger.js';

const DEFAULT_STALE_OPERATION_MS = 15 * 60 * 1000;
const DEFAULT_BACKUP_MAX_AGE_HOURS = 48;

export interface SiteBackupServiceOptions {
  siteDir: string;
  remotePrefix: string;
  store: ObjectStoreClient;
  metrics: MetricsStore;
  transfer: TransferSettings;
  lock?: OperationLock;
  publishHook?: PublishHook | null;
  /** Deadline applied when a trigger passes none; 0 disables it. */
  defaultTimeoutMs?: number;
  disasterBackupFirst?: boolean;
  staleOperationMs?: number;
  backupMaxAgeHours?: number;
  disasterGuard?: DisasterGuardOptions;
  /** Receives an alert when a health check with alerting finds a problem; defaults to the log. */
  alertSink?: AlertSink;
  now?: () => Date;
}

export interface HealthCheckResult {
  report: BackupHealthReport;
  alert: AlertStatus;
}

/**
 * Entry point for callers (HTTP control plane, CLI, schedulers): trigger
 * operations on the protected site directory and read their status.
 */
export class SiteBackupService {
  readonly #siteDir: string;
  readonly #remotePrefix: string;
  readonly #metrics: MetricsStore;
  readonly #lock: OperationLock;
  readonly #coordinator: OperationCoordinator;
  readonly #backup: BackupOrchestrator;
  readonly #restore: RestoreOrchestrator;
  readonly #disaster: DisasterSimulator;
  readonly #defaultTimeoutMs: number;
  readonly #disasterBackupFirst: boolean;
  readonly #staleOperationMs: number;
  readonly #backupMaxAgeHours: number;
  readonly #alertSink: AlertSink;
  readonly #now: () => Date;

  constructor(options: SiteBackupServiceOptions) {
    this.#siteDir = path.resolve(options.siteDir);
    this.#remotePrefix = options.remotePrefix;
    this.#metrics = options.metrics;
    this.#lock = options.lock ?? new OperationLock({ now: options.now });
    this.#coordinator = new OperationCoordinator({ lock: this.#lock, metrics: this.#metrics });
    this.#backup = new BackupOrchestrator({ store: options.store, transfer: options.transfer });
    this.#restore = new RestoreOrchestrator({
      store: options.store,
      transfer: options.transfer,
      publishHook: options.publishHook ?? null,
    });
    this.#disaster = new DisasterSimulator({ backup: this.#backup, ...options.disasterGuard });
    this.#defaultTimeoutMs = options.defaultTimeoutMs ?? 0;
    this.#disasterBackupFirst = options.disasterBackupFirst ?? true;
    this.#staleOperationMs = options.staleOperationMs ?? DEFAULT_STALE_OPERATION_MS;
    this.#backupMaxAgeHours = options.backupMaxAgeHours ?? DEFAULT_BACKUP_MAX_AGE_HOURS;
    this.#alertSink = options.alertSink ?? new LogAlertSink();
    this.#now = options.now ?? (() => new Date());
  }

  get siteDir(): string {
    return this.#siteDir;
  }

  /** Marks records left unfinished by a previous process as interrupted. */
  start(): OperationRecord[] {
    const reconciled = this.#metrics.reconcileInterrupted(this.#staleOperationMs);
    if (reconciled.length > 0) {
      void logWarn(
        `[SiteBackup] Marked ${reconciled.length} unfinished operations as interrupted: ${reconciled.map((r) => r.id).join(', ')}.`,
      );
    }
    return reconciled;
  }

  triggerBackup(options: TriggerOptions = {}): Promise<OperationRecord> {
    return this.#coordinator.run(
      {
        kind: 'backup',
        targetDir: this.#siteDir,
        remotePrefix: this.#remotePrefix,
        timeoutMs: options.timeoutMs ?? this.#defaultTimeoutMs,
      },
      (context) => this.#backup.run(this.#siteDir, this.#remotePrefix, context),
    );
  }

  triggerRestore(options: RestoreTriggerOptions = {}): Promise<OperationRecord> {
    return this.#coordinator.run(
      {
        kind: 'restore',
        targetDir: this.#siteDir,
        remotePrefix: this.#remotePrefix,
        timeoutMs: options.timeoutMs ?? this.#defaultTimeoutMs,
      },
      (context) => this.#restore.run(this.#siteDir, this.#remotePrefix, { clean: options.clean ?? false }, context),
    );
  }

  triggerDisaster(options: DisasterTriggerOptions = {}): Promise<OperationRecord> {
    const backupFirst = options.backupFirst ?? this.#disasterBackupFirst;
    return this.#coordinator.run(
      {
        kind: 'disaster',
        targetDir: this.#siteDir,
        remotePrefix: backupFirst ? this.#remotePrefix : null,
        timeoutMs: options.timeoutMs ?? this.#defaultTimeoutMs,
      },
      (context) => this.#disaster.run(this.#siteDir, { backupFirst, remotePrefix: this.#remotePrefix }, context),
    );
  }

  getStatus(): BackupStatusReport {
    const metrics = this.#metrics.currentMetrics();
    return {
      targetDir: this.#siteDir,
      lockState: this.#lock.getState(this.#siteDir),
      lastBackup: metrics.lastBackup,
      lastRestore: metrics.lastRestore,
      lastDisaster: metrics.lastDisaster,
    };
  }

  listOperations(limit = 50): OperationRecord[] {
    return this.#metrics.list(limit);
  }

  checkHealth(): BackupHealthReport {
    return evaluateBackupHealth(this.#metrics.currentMetrics(), {
      maxAgeHours: this.#backupMaxAgeHours,
      now: this.#now,
    });
  }

  /** {@link checkHealth}, then an alert through the configured sink when unhealthy. */
  async checkHealthAndAlert(): Promise<HealthCheckResult> {
    const report = this.checkHealth();
    const alert = await alertIfUnhealthy(report, this.#alertSink);
    return { report, alert };
  }
}

export interface ServiceFromConfigOptions {
  /** Extra features whose configuration must be present, e.g. the control plane. */
  features?: ConfigCondition[];
  store?: ObjectStoreClient;
  metrics?: MetricsStore;
}

/**
 * Builds the service from `site-sentinel.json` and env. Throws a
 * `configuration` error when required settings are missing or malformed.
 */
export function createSiteBackupServiceFromConfig(options: ServiceFromConfigOptions = {}): SiteBackupService {
  if (!options.store) {
    assertRuntimeConfig({ features: options.features });
  }

  const siteDir = getConfigValue('SITE_DIR') ?? 'docs';
  const remotePrefix = getConfigValue('REMOTE_PREFIX') ?? '';

  const store =
    options.store ??
    new S3ObjectStore({
      bucket: getConfigValue('S3_BUCKET') ?? '',
      region: getConfigValue('S3_REGION') ?? 'us-east-1',
      endpoint: getConfigValue('S3_ENDPOINT'),
      accessKeyId: getConfigValue('S3_ACCESS_KEY_ID') ?? '',
      secretAccessKey: getConfigValue('S3_SECRET_ACCESS_KEY') ?? '',
    });

  const metrics = options.metrics ?? new MetricsStore({ dbPath: getConfigValue('DB_PATH') ?? 'data/site-sentinel.db' });

  const publishHook = getBooleanConfig('PUBLISH_ENABLED', false)
    ? new GitPublishHook({
        siteDir,
        remote: getConfigValue('GIT_REMOTE') ?? 'origin',
        branch: getConfigValue('GIT_BRANCH') ?? 'main',
      })
    : null;

  const alertWebhookUrl = getConfigValue('ALERT_WEBHOOK_URL');
  const alertSink = alertWebhookUrl ? new WebhookAlertSink({ url: alertWebhookUrl }) : new LogAlertSink();

  void logInfo(
    `[SiteBackup] Protecting ${path.resolve(siteDir)} under prefix "${remotePrefix}" (publish ${publishHook ? 'enabled' : 'disabled'}).`,
  );

  return new SiteBackupService({
    siteDir,
    remotePrefix,
    store,
    metrics,
    publishHook,
    alertSink,
    transfer: {
      concurrency: getNumberConfig('TRANSFER_CONCURRENCY', 4),
      maxAttempts: getNumberConfig('TRANSFER_MAX_ATTEMPTS', 3),
      baseDelayMs: getNumberConfig('TRANSFER_BASE_DELAY_MS', 1000),
    },
    defaultTimeoutMs: getNumberConfig('OPERATION_TIMEOUT_MS', 0),
    disasterBackupFirst: getBooleanConfig('DISASTER_BACKUP_FIRST', true),
    staleOperationMs: getNumberConfig('STALE_OPERATION_MS', DEFAULT_STALE_OPERATION_MS),
    backupMaxAgeHours: getNumberConfig('BACKUP_MAX_AGE_HOURS', DEFAULT_BACKUP_MAX_AGE_HOURS),
  });
}
