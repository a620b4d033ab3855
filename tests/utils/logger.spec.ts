import { readFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  configureLogger,
  dailyLogPath,
  getLogDir,
  logInfo,
  logWarn,
  parseLogEntries,
  scrubSensitiveText,
} from '../../src/utils/logger.js';
import { makeTempDir } from '../harness/site-fixtures.js';

describe('scrubSensitiveText', () => {
  const envName = 'S3_SECRET_ACCESS_KEY';
  let previousEnvValue: string | undefined;

  beforeEach(() => {
    previousEnvValue = process.env[envName];
    process.env[envName] = 'env-secret-leak-value-123456789';
  });

  afterEach(() => {
    if (previousEnvValue === undefined) {
      delete process.env[envName];
    } else {
      process.env[envName] = previousEnvValue;
    }
  });

  it('redacts raw sensitive values even when they appear outside key=value patterns', () => {
    const scrubbed = scrubSensitiveText('diagnostic trace => env-secret-leak-value-123456789 <= should be hidden');

    expect(scrubbed).toBe('diagnostic trace => [REDACTED] <= should be hidden');
  });

  it('redacts secret-looking key=value pairs and bearer tokens', () => {
    expect(scrubSensitiveText('retrying with admin_token=test-secret now')).toBe(
      'retrying with admin_token=[REDACTED] now',
    );
    expect(scrubSensitiveText('Authorization: Bearer test-secret')).toBe('Authorization: Bearer [REDACTED]');
  });

  it('leaves ordinary text untouched', () => {
    expect(scrubSensitiveText('Uploaded 2 files to site/.')).toBe('Uploaded 2 files to site/.');
  });
});

describe('daily log file', () => {
  let previousDir: string;

  beforeEach(() => {
    previousDir = getLogDir();
  });

  afterEach(() => {
    configureLogger({ logDir: previousDir });
  });

  it('appends entries that parseLogEntries reads back in order', async () => {
    const dir = await makeTempDir('logger');
    configureLogger({ logDir: dir });

    await logInfo('[Backup] started');
    await logWarn('[Retry] upload:site/index.html attempt 1/3 failed');

    const entries = parseLogEntries(await readFile(dailyLogPath(), 'utf8'));
    expect(entries.map(({ level, message }) => ({ level, message }))).toEqual([
      { level: 'INFO', message: '[Backup] started' },
      { level: 'WARN', message: '[Retry] upload:site/index.html attempt 1/3 failed' },
    ]);
    expect(entries[0].timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('parses multi-line messages', () => {
    const entries = parseLogEntries('## error @ 2026-03-01T10:00:00.000Z\nline one\nline two\n\n');

    expect(entries).toEqual([{ timestamp: '2026-03-01T10:00:00.000Z', level: 'ERROR', message: 'line one\nline two' }]);
  });
});
