import { existsSync, readFileSync } from 'fs';
import * as path from 'path';

export interface SiteSentinelConfig {
    site: {
        dir: string;
        remotePrefix: string;
    };
    storage: {
        bucket: string;
        endpoint: string;
        region: string;
        accessKeyId: string;
        secretAccessKey: string;
    };
    transfer: {
        concurrency: number;
        maxAttempts: number;
        baseDelayMs: number;
        operationTimeoutMs: number;
    };
    publish: {
        enabled: boolean;
        gitRemote: string;
        gitBranch: string;
    };
    runtime: {
        adminToken: string;
        apiPort: number;
        dbPath: string;
        logDir: string;
        staleOperationMs: number;
    };
    disaster: {
        backupFirst: boolean;
    };
    monitor: {
        backupMaxAgeHours: number;
        alertWebhookUrl: string;
    };
}

export const DEFAULT_CONFIG: SiteSentinelConfig = {
    site: {
        dir: 'docs',
        remotePrefix: 'docs',
    },
    storage: {
        bucket: '',
        endpoint: '',
        region: 'us-east-1',
        accessKeyId: '',
        secretAccessKey: '',
    },
    transfer: {
        concurrency: 4,
        maxAttempts: 3,
        baseDelayMs: 1000,
        operationTimeoutMs: 0,
    },
    publish: {
        enabled: false,
        gitRemote: 'origin',
        gitBranch: 'main',
    },
    runtime: {
        adminToken: '',
        apiPort: 3100,
        dbPath: 'data/site-sentinel.db',
        logDir: 'logs',
        staleOperationMs: 15 * 60 * 1000,
    },
    disaster: {
        backupFirst: true,
    },
    monitor: {
        backupMaxAgeHours: 48,
        alertWebhookUrl: '',
    },
};

export const DEFAULT_CONFIG_FILE = 'site-sentinel.json';

/** `SITE_SENTINEL_CONFIG_PATH` when set, else `site-sentinel.json` in the working directory. */
export function getConfigPath(): string {
    if (process.env.SITE_SENTINEL_CONFIG_PATH) {
        return path.resolve(process.env.SITE_SENTINEL_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(loaded: Record<string, unknown>, name: string): Record<string, unknown> {
    const value = loaded[name];
    return isRecord(value) ? value : {};
}

function str(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function num(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function bool(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

/** Overlays a parsed config file on the defaults; fields of the wrong type keep their default. */
export function mergeWithDefaults(loaded: unknown): SiteSentinelConfig {
    const record = isRecord(loaded) ? loaded : {};
    const d = DEFAULT_CONFIG;

    const site = section(record, 'site');
    const storage = section(record, 'storage');
    const transfer = section(record, 'transfer');
    const publish = section(record, 'publish');
    const runtime = section(record, 'runtime');
    const disaster = section(record, 'disaster');
    const monitor = section(record, 'monitor');

    return {
        site: {
            dir: str(site, 'dir', d.site.dir),
            remotePrefix: str(site, 'remotePrefix', d.site.remotePrefix),
        },
        storage: {
            bucket: str(storage, 'bucket', d.storage.bucket),
            endpoint: str(storage, 'endpoint', d.storage.endpoint),
            region: str(storage, 'region', d.storage.region),
            accessKeyId: str(storage, 'accessKeyId', d.storage.accessKeyId),
            secretAccessKey: str(storage, 'secretAccessKey', d.storage.secretAccessKey),
        },
        transfer: {
            concurrency: num(transfer, 'concurrency', d.transfer.concurrency),
            maxAttempts: num(transfer, 'maxAttempts', d.transfer.maxAttempts),
            baseDelayMs: num(transfer, 'baseDelayMs', d.transfer.baseDelayMs),
            operationTimeoutMs: num(transfer, 'operationTimeoutMs', d.transfer.operationTimeoutMs),
        },
        publish: {
            enabled: bool(publish, 'enabled', d.publish.enabled),
            gitRemote: str(publish, 'gitRemote', d.publish.gitRemote),
            gitBranch: str(publish, 'gitBranch', d.publish.gitBranch),
        },
        runtime: {
            adminToken: str(runtime, 'adminToken', d.runtime.adminToken),
            apiPort: num(runtime, 'apiPort', d.runtime.apiPort),
            dbPath: str(runtime, 'dbPath', d.runtime.dbPath),
            logDir: str(runtime, 'logDir', d.runtime.logDir),
            staleOperationMs: num(runtime, 'staleOperationMs', d.runtime.staleOperationMs),
        },
        disaster: {
            backupFirst: bool(disaster, 'backupFirst', d.disaster.backupFirst),
        },
        monitor: {
            backupMaxAgeHours: num(monitor, 'backupMaxAgeHours', d.monitor.backupMaxAgeHours),
            alertWebhookUrl: str(monitor, 'alertWebhookUrl', d.monitor.alertWebhookUrl),
        },
    };
}

// ── Flat KV Adapter ─────────────────────────────────────────────────────────

export type ConfigKey =
    | 'SITE_DIR'
    | 'REMOTE_PREFIX'
    | 'S3_BUCKET'
    | 'S3_ENDPOINT'
    | 'S3_REGION'
    | 'S3_ACCESS_KEY_ID'
    | 'S3_SECRET_ACCESS_KEY'
    | 'TRANSFER_CONCURRENCY'
    | 'TRANSFER_MAX_ATTEMPTS'
    | 'TRANSFER_BASE_DELAY_MS'
    | 'OPERATION_TIMEOUT_MS'
    | 'PUBLISH_ENABLED'
    | 'GIT_REMOTE'
    | 'GIT_BRANCH'
    | 'ADMIN_TOKEN'
    | 'API_PORT'
    | 'DB_PATH'
    | 'LOG_DIR'
    | 'STALE_OPERATION_MS'
    | 'DISASTER_BACKUP_FIRST'
    | 'BACKUP_MAX_AGE_HOURS'
    | 'ALERT_WEBHOOK_URL';

let cachedConfig: SiteSentinelConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): SiteSentinelConfig {
    const configPath = getConfigPath();
    let loaded: SiteSentinelConfig = mergeWithDefaults({});
    try {
        if (existsSync(configPath)) {
            loaded = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
        }
    } catch (error) {
        console.error(`[Config] Failed to parse JSON config at ${configPath}: ${describeError(error)}`);
    }
    cachedConfig = loaded;
    return loaded;
}

function currentConfig(): SiteSentinelConfig {
    return cachedConfig ?? reloadConfigSync();
}

function jsonValueFor(config: SiteSentinelConfig, key: ConfigKey): string | number | boolean {
    switch (key) {
        case 'SITE_DIR': return config.site.dir;
        case 'REMOTE_PREFIX': return config.site.remotePrefix;

        case 'S3_BUCKET': return config.storage.bucket;
        case 'S3_ENDPOINT': return config.storage.endpoint;
        case 'S3_REGION': return config.storage.region;
        case 'S3_ACCESS_KEY_ID': return config.storage.accessKeyId;
        case 'S3_SECRET_ACCESS_KEY': return config.storage.secretAccessKey;

        case 'TRANSFER_CONCURRENCY': return config.transfer.concurrency;
        case 'TRANSFER_MAX_ATTEMPTS': return config.transfer.maxAttempts;
        case 'TRANSFER_BASE_DELAY_MS': return config.transfer.baseDelayMs;
        case 'OPERATION_TIMEOUT_MS': return config.transfer.operationTimeoutMs;

        case 'PUBLISH_ENABLED': return config.publish.enabled;
        case 'GIT_REMOTE': return config.publish.gitRemote;
        case 'GIT_BRANCH': return config.publish.gitBranch;

        case 'ADMIN_TOKEN': return config.runtime.adminToken;
        case 'API_PORT': return config.runtime.apiPort;
        case 'DB_PATH': return config.runtime.dbPath;
        case 'LOG_DIR': return config.runtime.logDir;
        case 'STALE_OPERATION_MS': return config.runtime.staleOperationMs;

        case 'DISASTER_BACKUP_FIRST': return config.disaster.backupFirst;
        case 'BACKUP_MAX_AGE_HOURS': return config.monitor.backupMaxAgeHours;
        case 'ALERT_WEBHOOK_URL': return config.monitor.alertWebhookUrl;
    }
}

/**
 * Gets a configured value: a non-empty env variable wins, then
 * `site-sentinel.json` merged with defaults.
 */
export function getConfigValue(key: ConfigKey): string | undefined {
    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const jsonValue = String(jsonValueFor(currentConfig(), key));
    return jsonValue.trim() === '' ? undefined : jsonValue;
}

/** Numeric view of {@link getConfigValue}; unparsable or negative values fall back. */
export function getNumberConfig(key: ConfigKey, fallback: number): number {
    const raw = getConfigValue(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function getBooleanConfig(key: ConfigKey, fallback: boolean): boolean {
    const raw = getConfigValue(key)?.trim().toLowerCase();
    if (raw === undefined) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
    if (['0', 'false', 'no', 'off'].includes(raw)) return false;
    return fallback;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
