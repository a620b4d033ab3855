/**
 * Runtime configuration validator.
 *
 * Produces redaction-safe diagnostics: missing required keys, missing keys of
 * requested features and format violations. No secret value is ever included
 * in the output.
 */

import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigCondition, ConfigKeySpec } from './env-schema.js';
import { getConfigValue } from './json-config.js';
import { SiteBackupError } from '../types/errors.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'missing_conditional' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when nothing blocks startup. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  /** Features the caller asked to validate. */
  activeFeatures: ConfigCondition[];
  /** Issues that block startup; currently every issue found. */
  fatalIssues: ConfigIssue[];
  validatedAt: string;
}

export interface ValidateConfigOptions {
  /** Conditional keys of these features are treated as required. */
  features?: ConfigCondition[];
  now?: () => Date;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

function formatError(spec: ConfigKeySpec, raw: string): string | null {
  const value = raw.trim();
  const shown = spec.type === 'secret' ? '<redacted>' : `'${value}'`;

  switch (spec.format) {
    case 'port': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        return `${spec.key} must be an integer in range 1-65535, got ${shown}.`;
      }
      return null;
    }
    case 'positive_integer': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1) {
        return `${spec.key} must be a positive integer, got ${shown}.`;
      }
      return null;
    }
    case 'non_negative_integer': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 0) {
        return `${spec.key} must be a non-negative integer, got ${shown}.`;
      }
      return null;
    }
    case 'boolean': {
      if (!['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'].includes(value.toLowerCase())) {
        return `${spec.key} must be true or false, got ${shown}.`;
      }
      return null;
    }
    case 'url': {
      if (!URL.canParse(value)) {
        return `${spec.key} must be an absolute URL, got ${shown}.`;
      }
      return null;
    }
    case 'string':
      return null;
  }
}

// ── Public API ───────────────────────────────────────────────────────────────

export function validateRuntimeConfig(options: ValidateConfigOptions = {}): ConfigValidationResult {
  const now = options.now ?? (() => new Date());
  const features = new Set<ConfigCondition>(options.features ?? []);
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const raw = getConfigValue(spec.key);

    if (raw !== undefined) {
      presentKeys.push(spec.key);
      const formatErr = formatError(spec, raw);
      if (formatErr) {
        issues.push({ key: spec.key, class: 'format_error', message: formatErr, remediation: spec.remediation });
      }
      continue;
    }

    if (spec.class === 'required') {
      issues.push({
        key: spec.key,
        class: 'missing_required',
        message: `Required config key '${spec.key}' is missing. ${spec.description}`,
        remediation: spec.remediation,
      });
    } else if (spec.class === 'conditional' && spec.condition && features.has(spec.condition)) {
      issues.push({
        key: spec.key,
        class: 'missing_conditional',
        message: `'${spec.key}' is required by ${spec.condition} but is missing. ${spec.description}`,
        remediation: spec.remediation,
      });
    }
  }

  return {
    ok: issues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    activeFeatures: [...features].sort(),
    fatalIssues: [...issues],
    validatedAt: now().toISOString(),
  };
}

/**
 * Validates the configuration and throws a `configuration` error listing
 * every fatal issue. The message never contains secret values.
 */
export function assertRuntimeConfig(options: ValidateConfigOptions = {}): ConfigValidationResult {
  const result = validateRuntimeConfig(options);

  if (result.fatalIssues.length > 0) {
    const reasons = result.fatalIssues.map((i) => i.message).join(' | ');
    throw new SiteBackupError('configuration', `Runtime config validation failed: ${reasons}`);
  }

  return result;
}
