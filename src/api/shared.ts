import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { SiteBackupError, type SiteBackupErrorCode } from '../types/errors.js';
import { logInfo, logWarn, scrubSensitiveText } from '../utils/logger.js';

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

export interface SendErrorOptions<T> {
    code?: string;
    data?: T;
}

/** Send an error JSON response using the standard envelope. */
export function sendError<T = never>(
    res: Response,
    message: string,
    status = 400,
    options: SendErrorOptions<T> = {},
): void {
    const body: ApiEnvelope<T> = {
        ok: false,
        error: scrubSensitiveText(message),
        code: options.code,
        data: options.data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

function digest(value: string): Buffer {
    return createHash('sha256').update(value).digest();
}

/**
 * Require `Authorization: Bearer <ADMIN_TOKEN>`.
 *
 * When no token is configured every protected request is rejected with 503.
 */
export function requireAdminToken(getToken: () => string | undefined): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const adminToken = getToken() ?? '';

        if (!adminToken) {
            void logWarn('[API] Protected request rejected: ADMIN_TOKEN not configured.');
            sendError(res, 'Protected endpoints are unavailable (missing admin token).', 503);
            return;
        }

        const header = req.headers.authorization;
        if (typeof header !== 'string' || !header.startsWith('Bearer ')) {
            void logWarn('[API] Protected request rejected: missing or malformed Authorization header.');
            sendError(res, 'Authentication required.', 401);
            return;
        }

        const provided = digest(header.slice('Bearer '.length).trim());
        if (!timingSafeEqual(provided, digest(adminToken))) {
            void logWarn('[API] Protected request rejected: token mismatch.');
            sendError(res, 'Invalid token.', 403);
            return;
        }

        next();
    };
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_BY_CODE: Record<SiteBackupErrorCode, number> = {
    configuration: 503,
    operation_in_progress: 409,
    source_missing: 422,
    target_missing: 422,
    no_snapshot_found: 404,
    unreadable_file: 422,
    transient_transfer: 502,
    upload_failed: 502,
    partial_download: 502,
    traversal_rejected: 422,
    unsafe_target: 403,
    timeout: 504,
    interrupted: 500,
    internal: 500,
};

export function statusForCode(code: SiteBackupErrorCode): number {
    return STATUS_BY_CODE[code];
}

/** Map a caught error to a status code, failure code and message. */
export function mapError(err: unknown): { status: number; code: SiteBackupErrorCode; message: string } {
    if (err instanceof SiteBackupError) {
        return { status: statusForCode(err.code), code: err.code, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, code: 'internal', message: scrubSensitiveText(err.message) };
    }
    return { status: 500, code: 'internal', message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logInfo(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
