import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { realpath, rm } from 'node:fs/promises';
import {
  exitCodeFor,
  handleDoctorCli,
  handleHelpCli,
  handleOperationCli,
  handleStatusCli,
  handleUnknownCommand,
  type CliDeps,
} from '../../src/core/cli.js';
import { SiteBackupService } from '../../src/services/site-backup.js';
import type { AlertSink, BackupAlert } from '../../src/services/backup-alert.js';
import { MetricsStore } from '../../src/services/metrics-store.js';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import { clearConfigCacheForTests } from '../../src/config/json-config.js';
import { SiteBackupError } from '../../src/types/errors.js';
import { InMemoryObjectStore } from '../harness/in-memory-object-store.js';
import { makeTempDir, readTree, writeTree } from '../harness/site-fixtures.js';

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];

beforeEach(() => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  // Reset exitCode before each test
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ── handleHelpCli ────────────────────────────────────────────────────────────

describe('handleHelpCli', () => {
  it('returns false when --help is not present', () => {
    expect(handleHelpCli([])).toBe(false);
    expect(handleHelpCli(['backup'])).toBe(false);
  });

  it('prints usage with every command when --help or -h is present', () => {
    expect(handleHelpCli(['-h'])).toBe(true);
    const output = consoleOutput.join('\n');
    expect(output).toMatch(/usage/i);
    for (const command of ['backup', 'restore', 'disaster', 'status', 'health', 'doctor', 'logs', 'serve']) {
      expect(output).toContain(command);
    }
    expect(process.exitCode).toBe(0);
  });
});

// ── handleUnknownCommand ─────────────────────────────────────────────────────

describe('handleUnknownCommand', () => {
  it('ignores known commands, flags and an empty argv', () => {
    expect(handleUnknownCommand([])).toBe(false);
    expect(handleUnknownCommand(['restore', '--clean'])).toBe(false);
    expect(handleUnknownCommand(['--json'])).toBe(false);
  });

  it('rejects a mistyped command with exit code 1', () => {
    expect(handleUnknownCommand(['bakup'])).toBe(true);
    expect(consoleErrors[0]).toBe("[SiteSentinel] Unknown command: 'bakup'");
    expect(process.exitCode).toBe(1);
  });
});

// ── exitCodeFor ──────────────────────────────────────────────────────────────

describe('exitCodeFor', () => {
  it('separates preconditions, contention and failures', () => {
    expect(exitCodeFor('operation_in_progress')).toBe(3);
    expect(exitCodeFor('configuration')).toBe(2);
    expect(exitCodeFor('no_snapshot_found')).toBe(2);
    expect(exitCodeFor('unsafe_target')).toBe(2);
    expect(exitCodeFor('partial_download')).toBe(1);
    expect(exitCodeFor('internal')).toBe(1);
  });
});

// ── Operation commands ───────────────────────────────────────────────────────

describe('operation commands', () => {
  let base: string;
  let siteDir: string;
  let store: InMemoryObjectStore;
  let metrics: MetricsStore;
  let deps: CliDeps;
  let alerts: BackupAlert[];

  beforeEach(async () => {
    base = await realpath(await makeTempDir('cli'));
    siteDir = path.join(base, 'docs');
    await writeTree(siteDir, { 'index.html': 'hello' });
    store = new InMemoryObjectStore();
    metrics = new MetricsStore();
    alerts = [];
    const alertSink: AlertSink = {
      name: 'recording',
      send: async (alert) => {
        alerts.push(alert);
      },
    };
    const service = new SiteBackupService({
      siteDir,
      remotePrefix: 'site',
      store,
      metrics,
      transfer: { concurrency: 1, maxAttempts: 1, baseDelayMs: 0 },
      disasterGuard: { cwd: '/nonexistent/work', homeDir: '/nonexistent/home' },
      alertSink,
    });
    deps = { createService: () => service };
  });

  afterEach(async () => {
    metrics.close();
    await rm(base, { recursive: true, force: true });
  });

  it('ignores other commands', async () => {
    expect(await handleOperationCli(['status'], deps)).toBe(false);
  });

  it('runs a backup and exits 0', async () => {
    expect(await handleOperationCli(['backup'], deps)).toBe(true);

    expect(process.exitCode).toBe(0);
    expect(consoleOutput[0]).toMatch(/^backup [0-9a-f-]+: succeeded\n/);
    expect(consoleOutput[0]).toContain('  files: 1');
    expect(store.objects.has('site/index.html')).toBe(true);
  });

  it('prints the record as JSON with --json', async () => {
    await handleOperationCli(['backup', '--json'], deps);

    const record: unknown = JSON.parse(consoleOutput[0]);
    expect(record).toMatchObject({ kind: 'backup', status: 'succeeded', fileCount: 1 });
  });

  it('exits 2 when there is no snapshot to restore', async () => {
    await handleOperationCli(['restore'], deps);

    expect(process.exitCode).toBe(2);
    expect(consoleOutput[0]).toContain('error (no_snapshot_found)');
  });

  it('exits 1 when the transfer fails', async () => {
    store.failNext('put', { kind: 'transient' });

    await handleOperationCli(['backup'], deps);

    expect(process.exitCode).toBe(1);
  });

  it('requires --yes before simulating a disaster', async () => {
    await handleOperationCli(['disaster'], deps);

    expect(process.exitCode).toBe(2);
    expect(consoleErrors[0]).toBe('[SiteSentinel] Refusing to delete the site directory without --yes.');
    expect(await readTree(siteDir)).toEqual({ 'index.html': 'hello' });
  });

  it('clears and restores the site through the CLI', async () => {
    await handleOperationCli(['disaster', '--yes'], deps);
    expect(process.exitCode).toBe(0);
    expect(await readTree(siteDir)).toEqual({});

    await handleOperationCli(['restore', '--clean'], deps);
    expect(process.exitCode).toBe(0);
    expect(await readTree(siteDir)).toEqual({ 'index.html': 'hello' });
  });

  it('exits 2 when the service cannot be configured', async () => {
    const broken: CliDeps = {
      createService: () => {
        throw new SiteBackupError('configuration', 'Runtime config validation failed: S3_BUCKET missing');
      },
    };

    await handleOperationCli(['backup'], broken);

    expect(process.exitCode).toBe(2);
    expect(consoleErrors[0]).toBe(
      '[SiteSentinel] configuration: Runtime config validation failed: S3_BUCKET missing',
    );
  });

  it('prints status and health and alerts only when unhealthy', async () => {
    expect(await handleStatusCli(['health'], deps)).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(consoleOutput[0]).toContain('  - No successful backup found');
    expect(consoleOutput[0]).toContain('  alert: sent');
    expect(alerts).toHaveLength(1);
    expect(alerts[0].issues).toEqual(['No successful backup found']);

    await handleOperationCli(['backup'], deps);
    consoleOutput = [];

    await handleStatusCli(['status'], deps);
    expect(process.exitCode).toBe(0);
    expect(consoleOutput[0]).toBe(`Site directory: ${siteDir}`);
    expect(consoleOutput[1]).toBe('Lock: idle');

    await handleStatusCli(['health', '--json'], deps);
    expect(process.exitCode).toBe(0);
    expect(JSON.parse(consoleOutput[consoleOutput.length - 1])).toMatchObject({
      healthy: true,
      totalFiles: 1,
      alert: 'not_needed',
    });
    expect(alerts).toHaveLength(1);
  });
});

// ── handleDoctorCli ──────────────────────────────────────────────────────────

describe('handleDoctorCli', () => {
  beforeEach(() => {
    vi.stubEnv('SITE_SENTINEL_CONFIG_PATH', path.join(os.tmpdir(), 'site-sentinel-absent', 'none.json'));
    for (const spec of CONFIG_SCHEMA) {
      vi.stubEnv(spec.key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
  });

  it('returns false for other commands', () => {
    expect(handleDoctorCli(['status'])).toBe(false);
  });

  it('exits 2 and lists missing keys', () => {
    expect(handleDoctorCli(['doctor'])).toBe(true);

    expect(process.exitCode).toBe(2);
    const output = consoleOutput.join('\n');
    expect(output).toContain('Configuration has issues:');
    expect(output).toContain("Required config key 'S3_BUCKET' is missing.");
    expect(output).toContain("'ADMIN_TOKEN' is required by api:control-plane but is missing.");
  });

  it('exits 0 when everything is configured', () => {
    vi.stubEnv('S3_BUCKET', 'site-mirror');
    vi.stubEnv('S3_ACCESS_KEY_ID', 'test-key-id');
    vi.stubEnv('S3_SECRET_ACCESS_KEY', 'test-secret');
    vi.stubEnv('ADMIN_TOKEN', 'test-admin-token');

    handleDoctorCli(['doctor', '--json']);

    expect(process.exitCode).toBe(0);
    expect(JSON.parse(consoleOutput[0])).toMatchObject({ ok: true, issues: [] });
  });
});
