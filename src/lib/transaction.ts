/**
 * Transaction Runner
 *
 * Adapter lifecycle management, decoupled from any HTTP framework. Every
 * CrudService operation runs through one of these two helpers.
 */

import { logger, type LogMeta } from '@src/lib/logger.js';
import type { AdapterFactory, DatabaseAdapter } from '@src/lib/database/adapter.js';

/**
 * Options for transaction execution
 */
export interface TransactionOptions {
    /** Custom logging context for debugging */
    logContext?: LogMeta;
}

/**
 * Core transaction runner
 *
 * Handles the complete transaction lifecycle:
 * 1. Creates and connects a database adapter
 * 2. Begins transaction
 * 3. Executes handler
 * 4. Commits on success, rolls back on error
 * 5. Disconnects the adapter
 *
 * @throws Re-throws any error from handler after rollback
 *
 * @example
 * const record = await runTransaction(factory, async (adapter) => {
 *     return await adapter.query('INSERT INTO "users" ("name") VALUES ($1) RETURNING *', ['Ada']);
 * });
 */
export async function runTransaction<T>(
    adapterFactory: AdapterFactory,
    handler: (adapter: DatabaseAdapter) => Promise<T>,
    options: TransactionOptions = {}
): Promise<T> {
    const adapter = adapterFactory();
    const logContext = { dbType: adapter.getType(), ...options.logContext };

    try {
        await adapter.connect();
        await adapter.beginTransaction();
        logger.debug('Transaction started', logContext);

        const result = await handler(adapter);

        await adapter.commit();
        logger.debug('Transaction committed', logContext);

        return result;
    } catch (error) {
        try {
            await adapter.rollback();
            logger.info('Transaction rolled back', {
                ...logContext,
                error: error instanceof Error ? error.message : String(error),
            });
        } catch (rollbackError) {
            logger.warn('Failed to rollback transaction', {
                ...logContext,
                rollbackError: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
            });
        }

        // Re-throw original error for caller to handle
        throw error;
    } finally {
        await adapter.disconnect();
    }
}

/**
 * Run a read-only operation on a connected adapter, without BEGIN / COMMIT
 */
export async function runWithAdapter<T>(
    adapterFactory: AdapterFactory,
    handler: (adapter: DatabaseAdapter) => Promise<T>
): Promise<T> {
    const adapter = adapterFactory();

    try {
        await adapter.connect();
        return await handler(adapter);
    } finally {
        await adapter.disconnect();
    }
}
