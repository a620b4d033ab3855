import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { SiteBackupService } from '../../services/site-backup.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    service: SiteBackupService;
}

/** GET /health: Process vitals plus the backup freshness verdict. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const backup = deps.service.checkHealth();
        const data: HealthData = {
            status: backup.healthy ? 'ok' : 'degraded',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            backup,
        };
        sendOk(res, data);
    };
}

/** GET /health/live: Liveness check; answers as long as the process serves requests. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { status: 'live' });
    };
}
