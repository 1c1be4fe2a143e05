import { describe, test, expect } from 'vitest';
import { FilterSqlGenerator } from '@lib/filter-sql-generator.js';
import { FilterOp, type FilterState } from '@lib/filter-types.js';

function state(overrides: Partial<FilterState> = {}): FilterState {
  return {
    tableName: 'users',
    select: [],
    joins: [],
    where: [],
    order: [],
    adapterType: 'sqlite',
    ...overrides,
  };
}

describe('FilterSqlGenerator', () => {
  test('should select every column when no columns are listed', () => {
    expect(FilterSqlGenerator.toSQL(state())).toEqual({ query: 'SELECT "users".* FROM "users"', params: [] });
  });

  test('should alias selected columns to their bare names', () => {
    const { query } = FilterSqlGenerator.toSQL(
      state({
        select: [
          { table: 'users', column: 'id' },
          { table: 'users', column: 'email' },
        ],
      })
    );

    expect(query).toBe('SELECT "users"."id" AS "id", "users"."email" AS "email" FROM "users"');
  });

  test('should assemble joins, where, order, limit and offset', () => {
    const { query, params } = FilterSqlGenerator.toSQL(
      state({
        tableName: 'permissions',
        select: [{ table: 'permissions', column: 'slug' }],
        joins: [
          {
            table: 'permission_roles',
            on: [
              { table: 'permission_roles', column: 'permission_id' },
              { table: 'permissions', column: 'id' },
            ],
          },
        ],
        where: [{ op: FilterOp.EQ, column: { table: 'permission_roles', column: 'role_id' }, value: 3 }],
        order: [{ column: { table: 'permissions', column: 'id' }, sort: 'asc' }],
        limit: 10,
        offset: 20,
      })
    );

    expect(query).toBe(
      'SELECT "permissions"."slug" AS "slug" FROM "permissions" ' +
        'INNER JOIN "permission_roles" ON "permission_roles"."permission_id" = "permissions"."id" ' +
        'WHERE "permission_roles"."role_id" = $1 ORDER BY "permissions"."id" ASC LIMIT 10 OFFSET 20'
    );
    expect(params).toEqual([3]);
  });

  test('should omit a zero offset', () => {
    const { query } = FilterSqlGenerator.toSQL(state({ limit: 5, offset: 0 }));

    expect(query).toBe('SELECT "users".* FROM "users" LIMIT 5');
  });

  test('should count over the same joins and conditions without order or limit', () => {
    const { query, params } = FilterSqlGenerator.toCountSQL(
      state({
        where: [{ op: FilterOp.NULL, column: { table: 'users', column: 'deleted_at' } }],
        order: [{ column: { table: 'users', column: 'id' }, sort: 'asc' }],
        limit: 25,
      })
    );

    expect(query).toBe('SELECT COUNT(*) AS count FROM "users" WHERE "users"."deleted_at" IS NULL');
    expect(params).toEqual([]);
  });
});
