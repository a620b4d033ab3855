import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LoggerOptions {
  /** Directory holding the daily `<YYYY-MM-DD>.md` log files. */
  logDir?: string;
  /** Mirror every entry to the console. */
  echo?: boolean;
}

const DEFAULT_LOG_DIR = 'logs';
const REDACTED = '[REDACTED]';

/** Env variables whose raw values must never reach a log line. */
const SENSITIVE_ENV_KEYS = [
  'ADMIN_TOKEN',
  'S3_ACCESS_KEY_ID',
  'S3_SECRET_ACCESS_KEY',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
];

const KEY_VALUE_SECRET_PATTERN =
  /\b([A-Za-z0-9_]*(?:token|secret|password|access_key|api_key|apikey)[A-Za-z0-9_]*)(\s*[=:]\s*)("?)[^\s"',;&]+\3/gi;
const BEARER_PATTERN = /\b(Bearer\s+)[A-Za-z0-9._~+/=-]+/g;

let logDir = path.resolve(DEFAULT_LOG_DIR);
let echo = false;

export function configureLogger(options: LoggerOptions): void {
  if (options.logDir !== undefined) {
    logDir = path.resolve(options.logDir);
  }
  if (options.echo !== undefined) {
    echo = options.echo;
  }
}

export function getLogDir(): string {
  return logDir;
}

export function dailyLogPath(date: Date = new Date()): string {
  return path.join(logDir, `${date.toISOString().slice(0, 10)}.md`);
}

/**
 * Redacts credentials from free text: raw values of known secret env
 * variables, `key=value` pairs with secret-looking keys and bearer tokens.
 */
export function scrubSensitiveText(value: string): string {
  let scrubbed = value;

  for (const key of SENSITIVE_ENV_KEYS) {
    const secret = process.env[key];
    if (secret && secret.length >= 4) {
      scrubbed = scrubbed.split(secret).join(REDACTED);
    }
  }

  scrubbed = scrubbed.replace(KEY_VALUE_SECRET_PATTERN, `$1$2$3${REDACTED}$3`);
  scrubbed = scrubbed.replace(BEARER_PATTERN, `$1${REDACTED}`);
  return scrubbed;
}

export interface ParsedLogEntry {
  timestamp: string;
  level: string;
  message: string;
}

/** Splits a daily log file into entries, oldest first. */
export function parseLogEntries(content: string): ParsedLogEntry[] {
  return content
    .split(/^## /m)
    .filter((section) => section.trim() !== '')
    .map((section) => {
      const [header, ...bodyLines] = section.split('\n');
      const [level, timestamp] = header.split(' @ ');
      return {
        timestamp: (timestamp ?? '').trim(),
        level: level.trim().toUpperCase(),
        message: bodyLines.join('\n').trim(),
      };
    });
}

export async function logEvent(level: LogLevel, message: string): Promise<void> {
  const now = new Date();
  const entry = `## ${level} @ ${now.toISOString()}\n${scrubSensitiveText(message)}\n\n`;

  if (echo) {
    const line = entry.trimEnd();
    if (level === 'ERROR') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(dailyLogPath(now), entry, 'utf8');
  } catch (error) {
    console.error(`[Logger] Failed to write log entry: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function logInfo(message: string): Promise<void> {
  return logEvent('INFO', message);
}

export function logWarn(message: string): Promise<void> {
  return logEvent('WARN', message);
}

export function logError(message: string): Promise<void> {
  return logEvent('ERROR', message);
}
