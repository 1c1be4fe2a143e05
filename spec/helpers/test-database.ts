import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { CrudEnv, type CrudSettings } from '@src/lib/crud-env.js';
import { CrudService } from '@src/lib/crud-service.js';
import { SqliteAdapter } from '@src/lib/database/sqlite-adapter.js';
import { fixtureSource } from './test-schemas.js';

const SEED_SQL = fileURLToPath(new URL('../fixtures/sql/seed.sql', import.meta.url));

/**
 * Fresh in-memory database with the fixture tables and rows
 */
export function createSeededDatabase(): Database.Database {
  const db = new Database(':memory:');
  db.exec(readFileSync(SEED_SQL, 'utf-8'));
  return db;
}

export interface TestService {
  db: Database.Database;
  service: CrudService;
}

/**
 * CrudService over the schema fixtures and a seeded in-memory database
 */
export function createTestService(overrides: Partial<CrudSettings> = {}): TestService {
  const db = createSeededDatabase();
  const service = new CrudService({
    source: fixtureSource(),
    adapterFactory: () => new SqliteAdapter(db),
    settings: CrudEnv.defaults({ databaseType: 'sqlite', ...overrides }),
  });

  return { db, service };
}
