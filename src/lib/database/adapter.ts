/**
 * Database Adapter Interface
 *
 * Abstraction over the record store (PostgreSQL, SQLite). Adapters are
 * per-request instances: connect, run one or more parameterized queries,
 * disconnect. Placeholders are always written PostgreSQL-style ($1, $2, ...);
 * adapters translate where the backend differs.
 */

/**
 * Supported database backend types
 */
export type DatabaseType = 'postgresql' | 'sqlite';

/**
 * Query result matching pg.QueryResult structure
 */
export interface QueryResult<T = Record<string, unknown>> {
    /** Array of result rows */
    rows: T[];
    /** Number of rows returned or affected */
    rowCount: number;
}

export interface DatabaseAdapter {
    /**
     * Acquire the underlying connection
     */
    connect(): Promise<void>;

    /**
     * Release the underlying connection, rolling back any open transaction
     */
    disconnect(): Promise<void>;

    isConnected(): boolean;

    /**
     * Execute a parameterized query
     *
     * @param sql - SQL with $1, $2 ... placeholders
     * @param params - Bound values, in placeholder order
     */
    query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;

    beginTransaction(): Promise<void>;

    commit(): Promise<void>;

    rollback(): Promise<void>;

    /**
     * Backend type, used to pick dialect-specific SQL (ILIKE vs LIKE)
     */
    getType(): DatabaseType;
}

/**
 * Creates a fresh, unconnected adapter for each unit of work
 */
export type AdapterFactory = () => DatabaseAdapter;
