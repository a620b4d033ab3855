import type { OperationRecord } from '../types/backup.js';
import { isSiteBackupErrorCode, type SiteBackupErrorCode } from '../types/errors.js';
import type { HealthCheckResult, SiteBackupService } from '../services/site-backup.js';
import { validateRuntimeConfig, type ConfigValidationResult } from '../config/env-validator.js';
import { mapError } from '../api/shared.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: site-sentinel [command] [options]

Commands:
  backup              Snapshot the site directory and upload it
  restore             Rebuild the site directory from the remote snapshot
  disaster            Delete the contents of the site directory (requires --yes)
  status              Show the lock state and the last operation of each kind
  health              Check that a recent, non-empty backup exists
  doctor              Validate configuration
  logs                Print today's log (--follow to tail it)
  serve               Start the HTTP control plane

Options:
  --help, -h          Show this help message
  --json              Output in machine-readable JSON format
  --clean             restore: remove local files that are not in the snapshot
  --yes               disaster: confirm the deletion
  --no-backup-first   disaster: skip the safety backup

Exit codes:
  0 success, 1 operation failed, 2 configuration or precondition error,
  3 another operation is in progress

Examples:
  site-sentinel backup
  site-sentinel restore --clean
  site-sentinel disaster --yes
  site-sentinel status --json
`.trim();

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_PRECONDITION = 2;
export const EXIT_IN_PROGRESS = 3;

const PRECONDITION_CODES: ReadonlySet<SiteBackupErrorCode> = new Set([
  'configuration',
  'source_missing',
  'target_missing',
  'no_snapshot_found',
  'unsafe_target',
]);

export function exitCodeFor(code: SiteBackupErrorCode): number {
  if (code === 'operation_in_progress') return EXIT_IN_PROGRESS;
  if (PRECONDITION_CODES.has(code)) return EXIT_PRECONDITION;
  return EXIT_FAILED;
}

export interface CliDeps {
  /** Builds the service on first use; may throw a `configuration` error. */
  createService: () => SiteBackupService;
}

// ── Formatting ───────────────────────────────────────────────────────────────

export function formatRecord(record: OperationRecord): string {
  const lines = [`${record.kind} ${record.id}: ${record.status}`];
  if (record.durationMs !== null) lines.push(`  duration: ${record.durationMs}ms`);
  if (record.fileCount !== null) lines.push(`  files: ${record.fileCount}`);
  if (record.bytesTransferred !== null) lines.push(`  bytes: ${record.bytesTransferred}`);
  if (record.publishStatus) lines.push(`  publish: ${record.publishStatus}`);
  if (record.detail) lines.push(`  ${record.detail}`);
  if (record.errorCode) lines.push(`  error (${record.errorCode}): ${record.errorMessage ?? ''}`.trimEnd());
  return lines.join('\n');
}

function formatHealth({ report, alert }: HealthCheckResult): string {
  const lines = [report.healthy ? 'Backups are healthy.' : 'Backup health check failed:'];
  for (const issue of report.issues) {
    lines.push(`  - ${issue}`);
  }
  lines.push(`  last backup: ${report.lastBackupAt ?? 'never'} (${report.lastBackupStatus ?? 'n/a'})`);
  lines.push(`  total files: ${report.totalFiles ?? 0}`);
  if (alert !== 'not_needed') lines.push(`  alert: ${alert}`);
  return lines.join('\n');
}

function formatDoctor(result: ConfigValidationResult): string {
  const lines = [result.ok ? 'Configuration OK.' : 'Configuration has issues:'];
  for (const issue of result.issues) {
    lines.push(`  [${issue.class}] ${issue.message}`);
    lines.push(`    fix: ${issue.remediation}`);
  }
  lines.push(`  present keys: ${result.presentKeys.join(', ') || 'none'}`);
  return lines.join('\n');
}

function reportFailure(error: unknown): void {
  const mapped = mapError(error);
  console.error(`[SiteSentinel] ${mapped.code}: ${mapped.message}`);
  process.exitCode = exitCodeFor(mapped.code);
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `backup`, `restore` and `disaster`. Resolves `true` when the command
 * was recognized; the exit code reflects the finalized record.
 */
export async function handleOperationCli(argv: string[], deps: CliDeps): Promise<boolean> {
  const command = argv[0];
  if (command !== 'backup' && command !== 'restore' && command !== 'disaster') return false;

  const asJson = argv.includes('--json');

  if (command === 'disaster' && !argv.includes('--yes')) {
    console.error('[SiteSentinel] Refusing to delete the site directory without --yes.');
    process.exitCode = EXIT_PRECONDITION;
    return true;
  }

  try {
    const service = deps.createService();
    service.start();

    let record: OperationRecord;
    if (command === 'backup') {
      record = await service.triggerBackup();
    } else if (command === 'restore') {
      record = await service.triggerRestore({ clean: argv.includes('--clean') });
    } else {
      record = await service.triggerDisaster(
        argv.includes('--no-backup-first') ? { backupFirst: false } : {},
      );
    }

    console.log(asJson ? JSON.stringify(record, null, 2) : formatRecord(record));
    if (record.status === 'succeeded') {
      process.exitCode = EXIT_OK;
    } else {
      process.exitCode = isSiteBackupErrorCode(record.errorCode) ? exitCodeFor(record.errorCode) : EXIT_FAILED;
    }
  } catch (error) {
    reportFailure(error);
  }

  return true;
}

/** Handle `status` and `health`; an unhealthy `health` also sends an alert. */
export async function handleStatusCli(argv: string[], deps: CliDeps): Promise<boolean> {
  const command = argv[0];
  if (command !== 'status' && command !== 'health') return false;

  const asJson = argv.includes('--json');

  try {
    const service = deps.createService();
    if (command === 'status') {
      const status = service.getStatus();
      if (asJson) {
        console.log(JSON.stringify(status, null, 2));
      } else {
        const lock = status.lockState.state === 'idle'
          ? 'idle'
          : `running ${status.lockState.kind} ${status.lockState.operationId} since ${status.lockState.since}`;
        console.log(`Site directory: ${status.targetDir}`);
        console.log(`Lock: ${lock}`);
        for (const record of [status.lastBackup, status.lastRestore, status.lastDisaster]) {
          if (record) console.log(formatRecord(record));
        }
      }
      process.exitCode = EXIT_OK;
    } else {
      const result = await service.checkHealthAndAlert();
      console.log(asJson ? JSON.stringify({ ...result.report, alert: result.alert }, null, 2) : formatHealth(result));
      process.exitCode = result.report.healthy ? EXIT_OK : EXIT_FAILED;
    }
  } catch (error) {
    reportFailure(error);
  }

  return true;
}

/**
 * Handle the `doctor` command: validate configuration without touching the
 * bucket. Exit code 2 when anything would block startup.
 */
export function handleDoctorCli(argv: string[]): boolean {
  if (argv[0] !== 'doctor') return false;

  const asJson = argv.includes('--json');
  const result = validateRuntimeConfig({ features: ['api:control-plane'] });
  console.log(asJson ? JSON.stringify(result, null, 2) : formatDoctor(result));
  process.exitCode = result.ok ? EXIT_OK : EXIT_PRECONDITION;
  return true;
}

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = EXIT_OK;
  return true;
}

const KNOWN_COMMANDS = new Set([
  'backup',
  'restore',
  'disaster',
  'status',
  'health',
  'doctor',
  'logs',
  'serve',
]);

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command) || command.startsWith('--')) {
    return false;
  }

  console.error(`[SiteSentinel] Unknown command: '${command}'`);
  console.error(`Run 'site-sentinel --help' to see available commands.`);
  process.exitCode = EXIT_FAILED;
  return true;
}
