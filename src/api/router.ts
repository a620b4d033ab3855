import { createServer, type Server } from 'node:http';
import { readFile } from 'node:fs/promises';
import express, { type Express } from 'express';
import { handleHealth, handleLiveness } from './handlers/health.js';
import {
    handleBackup,
    handleOperations,
    handleRestore,
    handleSimulateDisaster,
    handleStatus,
    type OperationDeps,
} from './handlers/operations.js';
import { requestLogger, requireAdminToken, sendError, sendOk } from './shared.js';
import type { SiteBackupService } from '../services/site-backup.js';
import type { LogEntry } from '../types/api.js';
import { dailyLogPath, logInfo, parseLogEntries } from '../utils/logger.js';
import { getConfigValue } from '../config/json-config.js';

export interface ApiServerDeps {
    service: SiteBackupService;
    /** Defaults to the configured ADMIN_TOKEN, read per request. */
    getAdminToken?: () => string | undefined;
}

const DEFAULT_PORT = 3100;
const MAX_LOG_ENTRIES = 100;

/**
 * Build the control plane express app.
 *
 * Endpoints:
 *   GET  /health              — Backup freshness and process vitals (public)
 *   GET  /health/live         — Liveness check (public)
 *   GET  /status              — Lock state and last record per operation kind
 *   GET  /operations          — Recent operation records, newest first
 *   GET  /logs                — Today's log entries, newest first
 *   POST /backup              — Snapshot and upload the site
 *   POST /restore             — Restore from the remote snapshot ({ clean? })
 *   POST /simulate-disaster   — Clear the site directory ({ confirm: true, backupFirst? })
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    const operationDeps: OperationDeps = { service: deps.service };
    const requireAuth = requireAdminToken(deps.getAdminToken ?? (() => getConfigValue('ADMIN_TOKEN')));

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json());
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth({ service: deps.service }));
    app.get('/health/live', handleLiveness());

    app.get('/status', requireAuth, handleStatus(operationDeps));
    app.get('/operations', requireAuth, handleOperations(operationDeps));
    app.post('/backup', requireAuth, handleBackup(operationDeps));
    app.post('/restore', requireAuth, handleRestore(operationDeps));
    app.post('/simulate-disaster', requireAuth, handleSimulateDisaster(operationDeps));

    app.get('/logs', requireAuth, async (_req, res) => {
        try {
            const content = await readFile(dailyLogPath(), 'utf8').catch(() => '');
            const entries: LogEntry[] = parseLogEntries(content).reverse().slice(0, MAX_LOG_ENTRIES);
            sendOk(res, entries);
        } catch {
            sendError(res, 'Failed to read logs.', 500);
        }
    });

    // ── Malformed JSON bodies ──────────────────────────────────────────────────
    app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (err instanceof SyntaxError) {
            sendError(res, 'Malformed JSON body.', 400);
            return;
        }
        next(err);
    });

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Create the control plane app and listen on the configured port. */
export function startApiServer(deps: ApiServerDeps, port?: number): Server {
    const app = createApiApp(deps);
    const listenPort = port ?? (Number(getConfigValue('API_PORT')) || DEFAULT_PORT);
    const server = createServer(app);

    server.listen(listenPort, () => {
        console.log(`[SiteSentinel API] Control plane listening on http://localhost:${listenPort}`);
        void logInfo(`[API] HTTP server started on port ${listenPort}.`);
    });
    return server;
}
