import { describe, test, expect } from 'vitest';
import { CrudModel, castValue } from '@lib/crud-model.js';
import { fixtureSchema, prepareSchema } from '@spec/helpers/test-schemas.js';

const STAMP = '2024-06-01T12:00:00.000Z';
const now = () => new Date(STAMP);

function widgets(fields: Record<string, unknown>, overrides: Record<string, unknown> = {}) {
  return prepareSchema({ model: 'widgets', table: 'widgets', fields: { id: { type: 'integer', auto_increment: true }, ...fields }, ...overrides }, 'widgets');
}

describe('castValue', () => {
  const cases: Array<[string, Parameters<typeof castValue>[0], unknown, unknown]> = [
    ['integer from text', 'integer', '42', 42],
    ['integer truncation', 'integer', '4.9', 4],
    ['integer garbage', 'integer', 'abc', null],
    ['float from text', 'float', '2.50', 2.5],
    ['decimal number', 'decimal', 3.25, 3.25],
    ['boolean word', 'boolean', 'off', false],
    ['boolean digit', 'boolean', 1, true],
    ['boolean garbage', 'boolean', 'maybe', null],
    ['date from Date', 'date', new Date('2024-03-05T10:00:00Z'), '2024-03-05'],
    ['datetime from Date', 'datetime', new Date('2024-03-05T10:00:00Z'), '2024-03-05T10:00:00.000Z'],
    ['datetime text', 'datetime', '2024-03-05 10:00:00', '2024-03-05 10:00:00'],
    ['json text', 'json', '{"a":1}', { a: 1 }],
    ['json unparseable', 'json', 'nope', 'nope'],
    ['json object', 'json', { a: 1 }, { a: 1 }],
    ['multiselect json', 'multiselect', '["x","y"]', ['x', 'y']],
    ['multiselect csv', 'multiselect', 'a, b', ['a', 'b']],
    ['multiselect empty', 'multiselect', '', []],
    ['multiselect array', 'multiselect', [1, 2], ['1', '2']],
    ['string from number', 'string', 12, '12'],
    ['smartlookup passthrough', 'smartlookup', 7, 7],
    ['null', 'integer', null, null],
    ['undefined', 'string', undefined, null],
  ];

  test.each(cases)('should cast %s', (_label, type, value, expected) => {
    expect(castValue(type, value)).toEqual(expected);
  });
});

describe('CrudModel', () => {
  const users = CrudModel.fromSchema(fixtureSchema('users'), { now });

  describe('Columns', () => {
    test('should list stored columns and the fillable subset', () => {
      expect(users.columns).toEqual(['id', 'user_name', 'email', 'flag_enabled', 'group_id', 'password']);
      expect(users.fillable).toEqual(['user_name', 'email', 'flag_enabled', 'group_id', 'password']);
    });

    test('should never fill engine-managed columns', () => {
      const model = CrudModel.fromSchema(
        widgets({ name: { type: 'string' }, created_at: { type: 'datetime' }, deleted_at: { type: 'datetime' } }, { soft_delete: true })
      );

      expect(model.fillable).toEqual(['name']);
    });

    test('should skip fields marked not editable', () => {
      const model = CrudModel.fromSchema(widgets({ name: { type: 'string' }, code: { type: 'string', editable: false } }));

      expect(model.fillable).toEqual(['name']);
    });

    test('should list detail fields', () => {
      expect(users.detailFields()).toEqual(['id', 'user_name', 'email', 'flag_enabled', 'group_id']);
    });
  });

  describe('toInsert', () => {
    test('should write fillable values and timestamps', () => {
      const statement = users.toInsert({
        user_name: 'erin',
        email: 'erin@example.com',
        flag_enabled: 'yes',
        tags: ['a'],
        id: 9,
      });

      expect(statement).toEqual({
        query:
          'INSERT INTO "users" ("user_name", "email", "flag_enabled", "created_at", "updated_at") VALUES ($1, $2, $3, $4, $5) RETURNING *',
        params: ['erin', 'erin@example.com', true, STAMP, STAMP],
      });
    });

    test('should insert default values when nothing is fillable', () => {
      const model = CrudModel.fromSchema(widgets({}, { timestamps: false }));

      expect(model.toInsert({ id: 1 })).toEqual({ query: 'INSERT INTO "widgets" DEFAULT VALUES RETURNING *', params: [] });
    });

    test('should store structured values as JSON text', () => {
      const model = CrudModel.fromSchema(widgets({ tags: { type: 'multiselect' }, meta: { type: 'json' } }, { timestamps: false }));

      expect(model.toInsert({ tags: 'a, b', meta: { color: 'red' } }).params).toEqual(['["a","b"]', '{"color":"red"}']);
      expect(model.toInsert({ meta: 'plain' }).params).toEqual(['plain']);
      expect(model.toInsert({ meta: null }).params).toEqual([null]);
    });
  });

  describe('toUpdate', () => {
    test('should set fillable values and bind the primary key last', () => {
      expect(users.toUpdate(3, { email: 'carol@example.net', created_at: 'x' })).toEqual({
        query: 'UPDATE "users" SET "email" = $1, "updated_at" = $2 WHERE "id" = $3 RETURNING *',
        params: ['carol@example.net', STAMP, 3],
      });
    });

    test('should skip soft-deleted rows', () => {
      const activities = CrudModel.fromSchema(fixtureSchema('activities'), { now });

      expect(activities.toUpdate(1, { description: 'Edited' }).query).toBe(
        'UPDATE "activities" SET "description" = $1, "updated_at" = $2 WHERE "id" = $3 AND "deleted_at" IS NULL RETURNING *'
      );
    });

    test('should reject an update with nothing fillable', () => {
      expect(() => users.toUpdate(3, { tags: ['x'], password_confirm: 'x' })).toThrow(
        expect.objectContaining({ statusCode: 400, errorCode: 'NO_FILLABLE_VALUES', details: { model: 'users' } })
      );
    });
  });

  describe('castId', () => {
    test.each([
      ['7', 7],
      [' 12 ', 12],
      [3, 3],
    ])('should cast %j to an integer key', (id, expected) => {
      expect(users.castId(id)).toBe(expected);
    });

    test.each(['abc', '1.5', '', '1e30'])('should report %j as a missing record', id => {
      expect(() => users.castId(id)).toThrow(
        expect.objectContaining({ statusCode: 404, errorCode: 'RECORD_NOT_FOUND', details: { model: 'users', id } })
      );
    });

    test('should bind the cast key in reads and updates', () => {
      expect(users.selectOne('5').params).toEqual([5]);
      expect(users.toUpdate('3', { email: 'carol@example.net' }).params).toEqual(['carol@example.net', STAMP, 3]);
    });
  });

  describe('selectOne', () => {
    test('should select one row by primary key', () => {
      expect(users.selectOne(5)).toEqual({ query: 'SELECT "users".* FROM "users" WHERE "users"."id" = $1 LIMIT 1', params: [5] });
    });

    test('should exclude soft-deleted rows', () => {
      expect(CrudModel.fromSchema(fixtureSchema('activities')).selectOne(3).query).toBe(
        'SELECT "activities".* FROM "activities" WHERE "activities"."id" = $1 AND "activities"."deleted_at" IS NULL LIMIT 1'
      );
    });
  });

  describe('castRow', () => {
    test('should project onto the given fields and always keep the primary key', () => {
      const row = { id: '3', user_name: 'carol', flag_enabled: 1, password: 'test-secret', extra: 'x' };

      expect(users.castRow(row, ['user_name', 'flag_enabled'])).toEqual({ id: 3, user_name: 'carol', flag_enabled: true });
    });

    test('should default to every stored column', () => {
      expect(users.castRow({ id: 1, group_id: 2, tags: 'a' })).toEqual({ id: 1, group_id: 2 });
    });
  });
});
