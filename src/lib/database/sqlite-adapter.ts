/**
 * SQLite Database Adapter
 *
 * Uses better-sqlite3. The database handle is owned by DatabaseConnection and
 * shared between adapters, so disconnect() releases the adapter without
 * closing the handle (an in-memory database would otherwise be lost).
 *
 * A better-sqlite3 handle is a single connection: one transaction at a time,
 * visible to every statement on it. connect() therefore waits for the handle's
 * previous unit of work to disconnect before it returns.
 */

import type Database from 'better-sqlite3';
import type { DatabaseAdapter, QueryResult, DatabaseType } from './adapter.js';

/** Tail of the queue of units of work per handle */
const handleQueues = new WeakMap<Database.Database, Promise<void>>();

/**
 * Differences from PostgreSQL handled here:
 * - Parameter placeholders: ? instead of $1, $2 (converted internally)
 * - Booleans are bound as 1 / 0
 * - Dates are bound as ISO strings
 */
export class SqliteAdapter implements DatabaseAdapter {
    private connected: boolean = false;
    private inTransaction: boolean = false;
    private release?: () => void;

    constructor(private readonly db: Database.Database) {}

    async connect(): Promise<void> {
        if (this.connected) {
            return;
        }

        const previous = handleQueues.get(this.db) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const held = new Promise<void>(resolve => {
            release = resolve;
        });
        handleQueues.set(this.db, previous.then(() => held));

        await previous;
        this.release = release;
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        if (!this.connected) {
            return;
        }

        try {
            if (this.inTransaction) {
                this.inTransaction = false;
                this.db.exec('ROLLBACK');
            }
        } finally {
            this.connected = false;
            this.release?.();
            this.release = undefined;
        }
    }

    isConnected(): boolean {
        return this.connected;
    }

    /**
     * Execute SQL query
     *
     * Statements that return data (SELECT, ... RETURNING) yield rows; others
     * report the number of changed rows.
     */
    async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
        this.requireConnection();

        const stmt = this.db.prepare<unknown[], T>(convertPlaceholders(sql));
        const bound = params.map(bindValue);

        if (stmt.reader) {
            const rows = stmt.all(...bound);
            return { rows, rowCount: rows.length };
        }

        const info = stmt.run(...bound);
        return { rows: [], rowCount: info.changes };
    }

    async beginTransaction(): Promise<void> {
        this.requireConnection();

        if (this.inTransaction) {
            throw new Error('SqliteAdapter: Transaction already in progress');
        }

        this.db.exec('BEGIN');
        this.inTransaction = true;
    }

    async commit(): Promise<void> {
        this.requireConnection();

        if (!this.inTransaction) {
            throw new Error('SqliteAdapter: No transaction in progress');
        }

        this.db.exec('COMMIT');
        this.inTransaction = false;
    }

    async rollback(): Promise<void> {
        this.requireConnection();

        if (!this.inTransaction) {
            return;
        }

        this.db.exec('ROLLBACK');
        this.inTransaction = false;
    }

    getType(): DatabaseType {
        return 'sqlite';
    }

    private requireConnection(): void {
        if (!this.connected) {
            throw new Error('SqliteAdapter: Not connected. Call connect() first.');
        }
    }
}

/**
 * Convert PostgreSQL-style $1, $2, $3 placeholders to SQLite ? placeholders
 *
 * SQL generated here numbers placeholders in order of appearance, so a
 * positional rewrite keeps parameters aligned.
 */
export function convertPlaceholders(sql: string): string {
    return sql.replace(/\$\d+/g, '?');
}

function bindValue(value: unknown): unknown {
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (typeof value === 'object' && value !== null) {
        return JSON.stringify(value);
    }
    return value;
}
