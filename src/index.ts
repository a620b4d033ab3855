#!/usr/bin/env node
import 'dotenv/config';
import { handleDoctorCli, handleHelpCli, handleOperationCli, handleStatusCli, handleUnknownCommand } from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { startApiServer } from './api/router.js';
import { createSiteBackupServiceFromConfig } from './services/site-backup.js';
import { getConfigValue } from './config/json-config.js';
import { configureLogger, logError, logInfo } from './utils/logger.js';
import { errorMessage } from './types/errors.js';

const argv = process.argv.slice(2);

configureLogger({ logDir: getConfigValue('LOG_DIR') ?? 'logs' });

const cliDeps = { createService: () => createSiteBackupServiceFromConfig() };

async function main(): Promise<void> {
    // ── One-shot CLI commands ───────────────────────────────────────────────────
    if (handleHelpCli(argv)) return;
    if (handleUnknownCommand(argv)) return;
    if (handleDoctorCli(argv)) return;
    if (await handleStatusCli(argv, cliDeps)) return;
    if (await handleLogsCli(argv)) return;
    if (await handleOperationCli(argv, cliDeps)) return;

    if (argv[0] !== 'serve') {
        handleHelpCli(['--help']);
        return;
    }

    // ── Control plane ───────────────────────────────────────────────────────────
    configureLogger({ echo: true });
    const service = createSiteBackupServiceFromConfig({ features: ['api:control-plane'] });
    service.start();
    const server = startApiServer({ service });

    const shutdown = (signal: string): void => {
        void logInfo(`SiteSentinel received ${signal}; shutting down.`);
        server.close(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(async (err: unknown) => {
    const message = errorMessage(err);
    console.error(`[SiteSentinel] Startup failed: ${message}`);
    await logError(`Startup failed: ${message}`);
    process.exitCode = 2;
});
