import type { Request, Response } from 'express';
import type { SiteBackupService } from '../../services/site-backup.js';
import type { OperationRecord } from '../../types/backup.js';
import type {
    DisasterRequest,
    OperationData,
    OperationListData,
    RestoreRequest,
    StatusData,
} from '../../types/api.js';
import { isSiteBackupErrorCode } from '../../types/errors.js';
import { mapError, sendError, sendOk, statusForCode } from '../shared.js';

export interface OperationDeps {
    service: SiteBackupService;
}

class RequestValidationError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRestoreRequestBody(body: unknown): RestoreRequest {
    if (!isRecord(body) || body.clean === undefined) {
        return {};
    }
    if (typeof body.clean !== 'boolean') {
        throw new RequestValidationError("Field 'clean' must be boolean when provided.");
    }
    return { clean: body.clean };
}

export function parseDisasterRequestBody(body: unknown): DisasterRequest {
    if (!isRecord(body) || body.confirm !== true) {
        throw new RequestValidationError("Field 'confirm' must be true to simulate a disaster.");
    }
    if (body.backupFirst !== undefined && typeof body.backupFirst !== 'boolean') {
        throw new RequestValidationError("Field 'backupFirst' must be boolean when provided.");
    }
    return { confirm: true, backupFirst: body.backupFirst };
}

/** Succeeded records answer 200; failed ones carry the record under the status of their error code. */
function sendRecord(res: Response, record: OperationRecord): void {
    const data: OperationData = { record };
    if (record.status === 'succeeded') {
        sendOk(res, data);
        return;
    }
    const status = isSiteBackupErrorCode(record.errorCode) ? statusForCode(record.errorCode) : 500;
    sendError(res, record.errorMessage ?? `${record.kind} failed.`, status, {
        code: record.errorCode ?? undefined,
        data,
    });
}

function sendCaught(res: Response, error: unknown): void {
    if (error instanceof RequestValidationError) {
        sendError(res, error.message, 400);
        return;
    }
    const mapped = mapError(error);
    sendError(res, mapped.message, mapped.status, { code: mapped.code });
}

export function handleBackup(deps: OperationDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            sendRecord(res, await deps.service.triggerBackup());
        } catch (error) {
            sendCaught(res, error);
        }
    };
}

export function handleRestore(deps: OperationDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const request = parseRestoreRequestBody(req.body);
            sendRecord(res, await deps.service.triggerRestore({ clean: request.clean }));
        } catch (error) {
            sendCaught(res, error);
        }
    };
}

export function handleSimulateDisaster(deps: OperationDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const request = parseDisasterRequestBody(req.body);
            sendRecord(res, await deps.service.triggerDisaster({ backupFirst: request.backupFirst }));
        } catch (error) {
            sendCaught(res, error);
        }
    };
}

export function handleStatus(deps: OperationDeps) {
    return (_req: Request, res: Response): void => {
        const data: StatusData = deps.service.getStatus();
        sendOk(res, data);
    };
}

export function handleOperations(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        const requestedLimit = Number(req.query.limit ?? 50);
        const limit = Number.isFinite(requestedLimit) && requestedLimit > 0
            ? Math.min(500, Math.floor(requestedLimit))
            : 50;
        const data: OperationListData = { operations: deps.service.listOperations(limit) };
        sendOk(res, data);
    };
}
