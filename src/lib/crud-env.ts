import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(9001),
    DATABASE_TYPE: z.enum(['postgresql', 'sqlite']).default('postgresql'),
    DATABASE_URL: z.string().min(1).optional(),
    SQLITE_PATH: z.string().min(1).default(':memory:'),
    CRUD_SCHEMA_PATH: z.string().min(1).default('./schema'),
    CRUD_DEBUG_MODE: booleanFlag.default('false'),
    CRUD_CACHE_ENABLED: booleanFlag.default('true'),
    CRUD_CACHE_TTL: z.coerce.number().int().nonnegative().default(3600),
    CRUD_DEFAULT_PAGE_SIZE: z.coerce.number().int().positive().default(25),
    CRUD_MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
    CRUD_RELATION_MAX_HOPS: z.coerce.number().int().min(1).max(4).default(2),
});

/**
 * Typed engine settings derived from the environment
 */
export interface CrudSettings {
    port: number;
    databaseType: 'postgresql' | 'sqlite';
    databaseUrl?: string;
    sqlitePath: string;
    schemaPath: string;
    debugMode: boolean;
    cacheEnabled: boolean;
    /** Persistent cache TTL in seconds */
    cacheTtl: number;
    defaultPageSize: number;
    maxPageSize: number;
    relationMaxHops: number;
}

/**
 * CrudEnv - Configuration management for the CRUD engine
 *
 * Reads process.env (after loadEnv() has merged any .env file) and validates
 * every setting once. Invalid values throw at startup rather than surfacing
 * later as odd query behaviour.
 */
export class CrudEnv {
    static fromEnv(env: NodeJS.ProcessEnv = process.env): CrudSettings {
        const result = envSchema.safeParse(env);

        if (!result.success) {
            const issue = result.error.issues[0];
            throw new Error(`Invalid configuration for ${issue.path.join('.')}: ${issue.message}`);
        }

        const parsed = result.data;

        if (parsed.CRUD_DEFAULT_PAGE_SIZE > parsed.CRUD_MAX_PAGE_SIZE) {
            throw new Error('Invalid configuration: CRUD_DEFAULT_PAGE_SIZE exceeds CRUD_MAX_PAGE_SIZE');
        }

        return {
            port: parsed.PORT,
            databaseType: parsed.DATABASE_TYPE,
            databaseUrl: parsed.DATABASE_URL,
            sqlitePath: parsed.SQLITE_PATH,
            schemaPath: parsed.CRUD_SCHEMA_PATH,
            debugMode: parsed.CRUD_DEBUG_MODE,
            cacheEnabled: parsed.CRUD_CACHE_ENABLED,
            cacheTtl: parsed.CRUD_CACHE_TTL,
            defaultPageSize: parsed.CRUD_DEFAULT_PAGE_SIZE,
            maxPageSize: parsed.CRUD_MAX_PAGE_SIZE,
            relationMaxHops: parsed.CRUD_RELATION_MAX_HOPS,
        };
    }

    /**
     * Defaults with optional overrides, used by tests and embedders
     */
    static defaults(overrides: Partial<CrudSettings> = {}): CrudSettings {
        return { ...CrudEnv.fromEnv({}), ...overrides };
    }
}
