/**
 * PostgreSQL Database Adapter
 *
 * Wraps a PoolClient checked out from a shared pg.Pool.
 */

import type { Pool, PoolClient } from 'pg';
import type { DatabaseAdapter, QueryResult, DatabaseType } from './adapter.js';

/**
 * Lifecycle:
 * 1. connect() - Acquires client from pool
 * 2. query() - Executes queries through client
 * 3. beginTransaction/commit/rollback - Transaction control
 * 4. disconnect() - Releases client back to pool
 */
export class PostgresAdapter implements DatabaseAdapter {
    private client: PoolClient | null = null;
    private inTransaction: boolean = false;

    constructor(private readonly pool: Pool) {}

    async connect(): Promise<void> {
        if (this.client) {
            return;
        }

        this.client = await this.pool.connect();
    }

    async disconnect(): Promise<void> {
        if (!this.client) {
            return;
        }

        const client = this.client;
        this.client = null;

        try {
            if (this.inTransaction) {
                await client.query('ROLLBACK');
            }
        } finally {
            this.inTransaction = false;
            client.release();
        }
    }

    isConnected(): boolean {
        return this.client !== null;
    }

    async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
        const client = this.requireClient();
        const result = await client.query(sql, params);

        return {
            rows: result.rows,
            rowCount: result.rowCount ?? result.rows.length,
        };
    }

    async beginTransaction(): Promise<void> {
        const client = this.requireClient();

        if (this.inTransaction) {
            throw new Error('PostgresAdapter: Transaction already in progress');
        }

        await client.query('BEGIN');
        this.inTransaction = true;
    }

    async commit(): Promise<void> {
        const client = this.requireClient();

        if (!this.inTransaction) {
            throw new Error('PostgresAdapter: No transaction in progress');
        }

        await client.query('COMMIT');
        this.inTransaction = false;
    }

    async rollback(): Promise<void> {
        const client = this.requireClient();

        if (!this.inTransaction) {
            return;
        }

        await client.query('ROLLBACK');
        this.inTransaction = false;
    }

    getType(): DatabaseType {
        return 'postgresql';
    }

    private requireClient(): PoolClient {
        if (!this.client) {
            throw new Error('PostgresAdapter: Not connected. Call connect() first.');
        }
        return this.client;
    }
}
