/**
 * Schema CRUD API - Main Entry Point
 *
 * Orchestrates server startup:
 * - Environment loading and validation
 * - Database adapter selection
 * - HTTP server startup
 * - Graceful shutdown coordination
 */

// Must stay the first import: ESM evaluates imports in order, before this body runs
import '@src/lib/env/preload.js';

import { resolve } from 'node:path';
import { CrudEnv } from '@src/lib/crud-env.js';
import { CrudService } from '@src/lib/crud-service.js';
import { DatabaseConnection } from '@src/lib/database-connection.js';
import { logger } from '@src/lib/logger.js';
import { FileSchemaSource } from '@src/lib/schema/schema-loader.js';
import { startHttpServer } from '@src/servers/http.js';

// Invalid configuration fails here, before anything listens
const settings = CrudEnv.fromEnv();
logger.setDebug(settings.debugMode);

logger.info('Starting schema CRUD API', {
    nodeEnv: process.env.NODE_ENV,
    port: settings.port,
    databaseType: settings.databaseType,
    schemaPath: settings.schemaPath,
    cacheEnabled: settings.cacheEnabled,
});

const service = new CrudService({
    source: new FileSchemaSource(resolve(settings.schemaPath)),
    adapterFactory: DatabaseConnection.adapterFactory(settings),
    settings,
});

const httpServer = startHttpServer(settings.port, { service });

// Graceful shutdown
const gracefulShutdown = async (signal: string) => {
    logger.info('Shutting down gracefully', { signal });

    try {
        await httpServer.stop();
        await DatabaseConnection.closeConnections();
        process.exit(0);
    } catch (error) {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
    }
};

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

// Named export for testing
const app = httpServer.app;
export { app };
