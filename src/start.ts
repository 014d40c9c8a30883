import 'dotenv/config';

import { Server } from 'http';
import { bootstrap, MarketRuntime } from './bootstrap';
import { loadMarketConfig } from './config/marketConfig';
import { startDashboard } from './dashboard/server';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

const FLUSH_INTERVAL_MS = 5_000;

let runtime: MarketRuntime | null = null;
let server: Server | null = null;
let flushTimer: NodeJS.Timeout | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 1. Stop the flush timer
 * 2. Close the HTTP server
 * 3. Flush buffered events
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        logger.info(`[SHUTDOWN] Already shutting down, ignoring ${signal}`);
        return;
    }
    isShuttingDown = true;
    logger.info(`[SHUTDOWN] Received ${signal}, shutting down`);

    if (flushTimer) clearInterval(flushTimer);

    const current = server;
    if (current) {
        await new Promise<void>((resolve) => current.close(() => resolve()));
    }

    if (runtime) {
        const persisted = await runtime.sink.flush();
        logger.info(`[SHUTDOWN] Flushed ${persisted} events; ${runtime.sink.pending} left unpersisted`);
    }
    process.exit(0);
}

function attachProcessHandlers(): void {
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('unhandledRejection', (reason) => {
        logger.error(`[FATAL] Unhandled Rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

function start(): void {
    attachProcessHandlers();

    const config = loadMarketConfig();
    runtime = bootstrap(config);
    server = startDashboard(runtime.engine, config.port);

    const sink = runtime.sink;
    if (sink.enabled) {
        flushTimer = setInterval(() => {
            sink.flush().catch((err: unknown) => {
                logger.error(`[EVENTS] Flush crashed: ${err instanceof Error ? err.message : String(err)}`);
            });
        }, FLUSH_INTERVAL_MS);
    }
}

try {
    start();
} catch (err) {
    logger.error(`[STARTUP] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
}
