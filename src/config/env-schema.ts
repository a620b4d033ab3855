/**
 * Registry of every configuration key site-sentinel reads.
 *
 * Each entry declares:
 *   - `key`         The env variable name (also the flat config key).
 *   - `type`        'secret' values are never echoed by diagnostics.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `format`      Shape the resolved value must have.
 *   - `condition`   Feature gate that makes a conditional key applicable.
 */

import type { ConfigKey } from './json-config.js';

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'site' | 'storage' | 'transfer' | 'publish' | 'runtime' | 'monitor';

export type ConfigKeyFormat = 'string' | 'port' | 'positive_integer' | 'non_negative_integer' | 'boolean' | 'url';

/** Format: `<subsystem>:<feature>`. */
export type ConfigCondition = 'api:control-plane';

export interface ConfigKeySpec {
  key: ConfigKey;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  format: ConfigKeyFormat;
  /** Applies only when class === 'conditional'. */
  condition?: ConfigCondition;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Site ────────────────────────────────────────────────────────────────────
  {
    key: 'SITE_DIR',
    type: 'env',
    class: 'optional',
    scope: 'site',
    format: 'string',
    description: 'Directory holding the static site to protect (default: docs).',
    remediation: 'Set SITE_DIR to the published site directory, e.g. SITE_DIR=docs.',
  },
  {
    key: 'REMOTE_PREFIX',
    type: 'env',
    class: 'optional',
    scope: 'site',
    format: 'string',
    description: 'Key prefix under which the site is mirrored in the bucket (default: docs).',
    remediation: 'Set REMOTE_PREFIX to the folder name used inside the bucket.',
  },

  // ── Object storage ──────────────────────────────────────────────────────────
  {
    key: 'S3_BUCKET',
    type: 'env',
    class: 'required',
    scope: 'storage',
    format: 'string',
    description: 'Bucket receiving the site mirror.',
    remediation: 'Set S3_BUCKET in .env or storage.bucket in site-sentinel.json.',
  },
  {
    key: 'S3_ENDPOINT',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    format: 'url',
    description: 'S3-compatible endpoint URL, e.g. a Backblaze B2 region endpoint. Empty means AWS.',
    remediation: 'Set S3_ENDPOINT to a full URL such as https://s3.us-west-004.backblazeb2.com.',
  },
  {
    key: 'S3_REGION',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    format: 'string',
    description: 'Region passed to the S3 client (default: us-east-1).',
    remediation: 'Set S3_REGION to the region of your bucket.',
  },
  {
    key: 'S3_ACCESS_KEY_ID',
    type: 'secret',
    class: 'required',
    scope: 'storage',
    format: 'string',
    description: 'Access key id (B2 application key id) for the bucket.',
    remediation: 'Set S3_ACCESS_KEY_ID in .env.',
  },
  {
    key: 'S3_SECRET_ACCESS_KEY',
    type: 'secret',
    class: 'required',
    scope: 'storage',
    format: 'string',
    description: 'Secret access key (B2 application key) for the bucket.',
    remediation: 'Set S3_SECRET_ACCESS_KEY in .env.',
  },

  // ── Transfer ────────────────────────────────────────────────────────────────
  {
    key: 'TRANSFER_CONCURRENCY',
    type: 'env',
    class: 'optional',
    scope: 'transfer',
    format: 'positive_integer',
    description: 'Maximum parallel object transfers per operation (default: 4).',
    remediation: 'Set TRANSFER_CONCURRENCY to a positive integer.',
  },
  {
    key: 'TRANSFER_MAX_ATTEMPTS',
    type: 'env',
    class: 'optional',
    scope: 'transfer',
    format: 'positive_integer',
    description: 'Attempts per object before a transfer is declared failed (default: 3).',
    remediation: 'Set TRANSFER_MAX_ATTEMPTS to a positive integer.',
  },
  {
    key: 'TRANSFER_BASE_DELAY_MS',
    type: 'env',
    class: 'optional',
    scope: 'transfer',
    format: 'non_negative_integer',
    description: 'Backoff before the first retry, doubled after each attempt (default: 1000).',
    remediation: 'Set TRANSFER_BASE_DELAY_MS to a whole number of milliseconds.',
  },
  {
    key: 'OPERATION_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'transfer',
    format: 'non_negative_integer',
    description: 'Deadline for a whole backup, restore or disaster run; 0 disables it (default: 0).',
    remediation: 'Set OPERATION_TIMEOUT_MS to a whole number of milliseconds.',
  },

  // ── Publish ─────────────────────────────────────────────────────────────────
  {
    key: 'PUBLISH_ENABLED',
    type: 'env',
    class: 'optional',
    scope: 'publish',
    format: 'boolean',
    description: 'Commit and push the site directory after a successful restore (default: false).',
    remediation: 'Set PUBLISH_ENABLED=true to redeploy through git after restores.',
  },
  {
    key: 'GIT_REMOTE',
    type: 'env',
    class: 'optional',
    scope: 'publish',
    format: 'string',
    description: 'Remote pushed to after a restore (default: origin).',
    remediation: 'Set GIT_REMOTE to the name of the deploy remote.',
  },
  {
    key: 'GIT_BRANCH',
    type: 'env',
    class: 'optional',
    scope: 'publish',
    format: 'string',
    description: 'Branch pushed to after a restore (default: main).',
    remediation: 'Set GIT_BRANCH to the branch your host deploys from.',
  },

  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'ADMIN_TOKEN',
    type: 'secret',
    class: 'conditional',
    condition: 'api:control-plane',
    scope: 'runtime',
    format: 'string',
    description: 'Bearer token required by the HTTP control plane.',
    remediation: 'Set ADMIN_TOKEN in .env before running `serve`.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'port',
    description: 'Listening port for the HTTP control plane (default: 3100).',
    remediation: 'Set API_PORT to an integer between 1 and 65535.',
  },
  {
    key: 'DB_PATH',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'string',
    description: 'SQLite file holding operation records (default: data/site-sentinel.db).',
    remediation: 'Set DB_PATH to a writable file path.',
  },
  {
    key: 'LOG_DIR',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'string',
    description: 'Directory of the daily markdown logs (default: logs).',
    remediation: 'Set LOG_DIR to a writable directory.',
  },
  {
    key: 'STALE_OPERATION_MS',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'non_negative_integer',
    description: 'Age after which an unfinished record is marked interrupted at startup (default: 900000).',
    remediation: 'Set STALE_OPERATION_MS to a whole number of milliseconds.',
  },
  {
    key: 'DISASTER_BACKUP_FIRST',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'boolean',
    description: 'Take a safety backup before a simulated disaster clears the site (default: true).',
    remediation: 'Set DISASTER_BACKUP_FIRST=false to skip the safety backup.',
  },

  // ── Monitor ─────────────────────────────────────────────────────────────────
  {
    key: 'BACKUP_MAX_AGE_HOURS',
    type: 'env',
    class: 'optional',
    scope: 'monitor',
    format: 'positive_integer',
    description: 'A successful backup older than this makes the health check fail (default: 48).',
    remediation: 'Set BACKUP_MAX_AGE_HOURS to a positive integer.',
  },
  {
    key: 'ALERT_WEBHOOK_URL',
    type: 'secret',
    class: 'optional',
    scope: 'monitor',
    format: 'url',
    description: 'Endpoint that receives a JSON alert when `health` finds a problem; unset logs the alert only.',
    remediation: 'Set ALERT_WEBHOOK_URL to an absolute http(s) URL, or leave it empty.',
  },
];
