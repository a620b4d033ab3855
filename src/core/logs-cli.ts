import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { dailyLogPath } from '../utils/logger.js';

const TAIL_CONTEXT_BYTES = 4096;

/**
 * Handle the `logs` command.
 * Prints today's log file, or tails it with `--follow`.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const follow = argv.includes('--follow') || argv.includes('-f');
    const logPath = dailyLogPath();

    if (!fs.existsSync(logPath)) {
        console.error(`[SiteSentinel Logs] No logs found for today at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (follow) {
        console.log(`[SiteSentinel Logs] Following logs from ${logPath}...\n`);
        tailFile(logPath);
    } else {
        const contents = await fsPromises.readFile(logPath, 'utf8');
        process.stdout.write(contents);
        process.exitCode = 0;
    }

    return true;
}

/**
 * Tail a file similar to `tail -f`. Returns the watcher so callers can close it.
 */
export function tailFile(filePath: string): fs.FSWatcher | null {
    let position = fs.statSync(filePath).size;
    const startPos = Math.max(0, position - TAIL_CONTEXT_BYTES);

    if (startPos < position) {
        fs.createReadStream(filePath, { start: startPos, end: position - 1, encoding: 'utf8' }).pipe(process.stdout);
    }

    try {
        return fs.watch(filePath, (eventType) => {
            if (eventType !== 'change') return;
            const stats = fs.statSync(filePath);
            if (stats.size > position) {
                const stream = fs.createReadStream(filePath, {
                    start: position,
                    end: stats.size - 1,
                    encoding: 'utf8',
                });
                stream.on('data', (chunk) => {
                    process.stdout.write(chunk);
                });
                position = stats.size;
            } else if (stats.size < position) {
                // Truncated or rolled over.
                position = stats.size;
            }
        });
    } catch (err) {
        console.error(`[SiteSentinel Logs] Failed to watch file: ${err instanceof Error ? err.message : String(err)}`);
        return null;
    }
}
