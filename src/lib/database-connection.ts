import pg from 'pg';
import Database from 'better-sqlite3';
import { logger } from '@src/lib/logger.js';
import type { CrudSettings } from '@src/lib/crud-env.js';
import type { AdapterFactory } from '@src/lib/database/adapter.js';
import { PostgresAdapter } from '@src/lib/database/postgres-adapter.js';
import { SqliteAdapter } from '@src/lib/database/sqlite-adapter.js';

const { Pool } = pg;

/**
 * Centralized Database Connection Manager
 *
 * The only place that creates pg pools or opens SQLite handles. Pools and
 * handles are shared process-wide; adapters built from them are per request.
 */
export class DatabaseConnection {
    private static pools = new Map<string, pg.Pool>();
    private static sqliteHandles = new Map<string, Database.Database>();

    /** Get (or create) the pool for a connection string */
    static getPool(connectionString: string, max = 10): pg.Pool {
        const existing = this.pools.get(connectionString);
        if (existing) {
            return existing;
        }

        const pool = new Pool({
            connectionString,
            max,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
        });

        pool.on('error', error => {
            logger.error('Idle database client error', { error: error.message });
        });

        this.pools.set(connectionString, pool);
        return pool;
    }

    /** Get (or open) a SQLite database handle */
    static getSqlite(path: string): Database.Database {
        const existing = this.sqliteHandles.get(path);
        if (existing) {
            return existing;
        }

        const db = new Database(path);
        if (path !== ':memory:') {
            db.pragma('journal_mode = WAL');
        }
        db.pragma('foreign_keys = ON');

        this.sqliteHandles.set(path, db);
        return db;
    }

    /**
     * Adapter factory for the configured backend
     */
    static adapterFactory(settings: CrudSettings): AdapterFactory {
        switch (settings.databaseType) {
            case 'sqlite': {
                const db = this.getSqlite(settings.sqlitePath);
                return () => new SqliteAdapter(db);
            }
            case 'postgresql': {
                if (!settings.databaseUrl) {
                    throw new Error('DATABASE_URL is required when DATABASE_TYPE is postgresql');
                }
                const pool = this.getPool(settings.databaseUrl);
                return () => new PostgresAdapter(pool);
            }
        }
    }

    /** Close all pools and handles - used during shutdown */
    static async closeConnections(): Promise<void> {
        const pools = [...this.pools.entries()];
        this.pools.clear();

        await Promise.all(
            pools.map(async ([, pool]) => {
                try {
                    await pool.end();
                } catch (error) {
                    logger.warn('Failed to close database pool', {
                        error: error instanceof Error ? error.message : String(error),
                    });
                }
            })
        );

        for (const db of this.sqliteHandles.values()) {
            db.close();
        }
        this.sqliteHandles.clear();

        logger.info('All database connections closed');
    }
}
