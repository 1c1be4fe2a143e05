import { describe, test, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { CrudService } from '@lib/crud-service.js';
import { createTestService } from '@spec/helpers/test-database.js';

function countUsers(db: Database.Database): unknown {
  return db.prepare('SELECT COUNT(*) AS total FROM users').get();
}

describe('CrudService', () => {
  let db: Database.Database;
  let service: CrudService;

  beforeEach(() => {
    ({ db, service } = createTestService());
  });

  describe('Schemas', () => {
    test('should cache prepared schemas', async () => {
      const first = await service.getSchema('users');

      expect(await service.getSchema('users')).toBe(first);
      expect(first.actions.map(action => action.key)).toContain('toggle_enabled');
    });

    test('should reload after clearing the cache', async () => {
      const first = await service.getSchema('users');

      await service.clearCache('users');
      const afterInvalidate = await service.getSchema('users');
      await service.clearCache();

      expect(afterInvalidate).not.toBe(first);
      expect(await service.getSchema('users')).not.toBe(afterInvalidate);
    });

    test('should report unknown models', async () => {
      await expect(service.getSchema('ghosts')).rejects.toMatchObject({ statusCode: 404, errorCode: 'SCHEMA_NOT_FOUND' });
    });

    test('should project context schemas', async () => {
      const view = await service.getContextSchema('users', 'list');

      expect(view).toMatchObject({ model: 'users', contexts: ['list'] });
      expect(Object.keys(view.fields)).toEqual(['id', 'user_name', 'email', 'flag_enabled']);
      expect(await service.getContextSchema('users', 'full')).toBe(await service.getSchema('users'));
    });

    test('should filter actions by scope and permission', async () => {
      const all = await service.getActionsForScope('users', 'detail');
      const allowed = await service.getActionsForScope('users', 'detail', permission => permission !== 'delete_user');

      expect(all.map(action => action.key)).toEqual(['edit_action', 'delete_action', 'toggle_enabled']);
      expect(allowed.map(action => action.key)).toEqual(['edit_action', 'toggle_enabled']);
    });
  });

  describe('listRecords', () => {
    test('should list the listable projection', async () => {
      const result = await service.listRecords('users');

      expect(result.count).toBe(5);
      expect(result.rows[0]).toEqual({ id: 1, user_name: 'alice', email: 'alice@example.com', flag_enabled: true });
    });

    test('should honor filters and sizes from the settings', async () => {
      ({ service } = createTestService({ defaultPageSize: 2, maxPageSize: 3 }));

      const result = await service.listRecords('users', { filters: { group_id: '2' }, size: 'all' });

      expect(result.count_filtered).toBe(3);
      expect(result.rows.map(row => row.user_name)).toEqual(['bob', 'carol', 'davexx']);
      expect((await service.listRecords('users')).rows).toHaveLength(2);
    });
  });

  describe('listRelatedRecords', () => {
    test('should list a direct relation through the detail list fields', async () => {
      const result = await service.listRelatedRecords('users', 1, 'activities');

      expect(result).toEqual({
        count: 2,
        count_filtered: 2,
        rows: [
          { id: 2, occurred_at: '2024-01-02T10:00:00Z', description: 'Updated profile' },
          { id: 1, occurred_at: '2024-01-01T10:00:00Z', description: 'Signed in' },
        ],
      });
    });

    test('should filter within the relation', async () => {
      const result = await service.listRelatedRecords('users', 1, 'activities', { filters: { description: 'signed' } });

      expect(result.count).toBe(2);
      expect(result.count_filtered).toBe(1);
      expect(result.rows.map(row => row.id)).toEqual([1]);
    });

    test('should list a pivot relation', async () => {
      const result = await service.listRelatedRecords('roles', 3, 'permissions');

      expect(result).toEqual({
        count: 2,
        count_filtered: 2,
        rows: [
          { id: 1, slug: 'uri_users', name: 'View users' },
          { id: 5, slug: 'view_reports', name: 'View reports' },
        ],
      });
    });

    test('should apply the target default sort to pivot relations', async () => {
      const result = await service.listRelatedRecords('roles', '3', 'users');

      expect(result.rows).toEqual([
        { id: 2, user_name: 'bob', email: 'bob@example.com' },
        { id: 3, user_name: 'carol', email: 'carol@example.com' },
      ]);
    });

    test('should list a through chain', async () => {
      const result = await service.listRelatedRecords('users', 2, 'permissions');

      expect(result.count).toBe(3);
      expect(result.rows.map(row => row.slug)).toEqual(['uri_users', 'create_user', 'view_reports']);
    });

    test('should reject chains beyond the configured hop limit', async () => {
      ({ service } = createTestService({ relationMaxHops: 1 }));

      await expect(service.listRelatedRecords('users', 2, 'permissions')).rejects.toMatchObject({
        statusCode: 422,
        errorCode: 'RELATIONSHIP_DEPTH_EXCEEDED',
      });
    });

    test('should check the parent record first', async () => {
      await expect(service.listRelatedRecords('users', 99, 'activities')).rejects.toMatchObject({
        statusCode: 404,
        errorCode: 'RECORD_NOT_FOUND',
        details: { model: 'users', id: 99 },
      });
    });

    test('should reject undeclared relations', async () => {
      await expect(service.listRelatedRecords('users', 1, 'groups')).rejects.toMatchObject({
        statusCode: 422,
        errorCode: 'MISSING_RELATIONSHIP_CONFIG',
        details: { model: 'users', relation: 'groups' },
      });
    });
  });

  describe('Namespaces', () => {
    test('should list with the namespaced schema', async () => {
      const result = await service.listRecords('users', { size: 2 }, 'tenant_b');

      expect(result.count).toBe(5);
      expect(result.rows).toEqual([
        { id: 1, user_name: 'alice' },
        { id: 2, user_name: 'bob' },
      ]);
    });

    test('should resolve related schemas in the same namespace', async () => {
      const result = await service.listRelatedRecords('users', 2, 'roles', {}, 'tenant_b');

      expect(result.rows).toEqual([
        { id: 2, slug: 'editor' },
        { id: 3, slug: 'viewer' },
      ]);
    });

    test('should take actions and records from the namespaced schema', async () => {
      expect(await service.getActionsForScope('users', 'list', undefined, 'tenant_b')).toEqual([]);
      expect(await service.getRecord('users', 1, 'tenant_b')).toEqual({ id: 1, user_name: 'alice' });
    });
  });

  describe('Records', () => {
    test('should return the detail projection of one record', async () => {
      expect(await service.getRecord('users', 1)).toEqual({
        id: 1,
        user_name: 'alice',
        email: 'alice@example.com',
        flag_enabled: true,
        group_id: 1,
      });
    });

    test('should not find soft-deleted records', async () => {
      await expect(service.getRecord('activities', 3)).rejects.toMatchObject({ errorCode: 'RECORD_NOT_FOUND' });
    });

    test('should create a record from fillable values only', async () => {
      const created = await service.createRecord('users', {
        user_name: 'erin',
        email: 'erin@example.com',
        flag_enabled: false,
        password: 'test-secret',
        tags: ['a'],
        id: 77,
      });

      expect(created).toEqual({ id: 6, user_name: 'erin', email: 'erin@example.com', flag_enabled: false, group_id: null });
      expect(db.prepare('SELECT password FROM users WHERE id = 6').get()).toEqual({ password: 'test-secret' });
    });

    test('should roll back a failed insert', async () => {
      await expect(service.createRecord('users', { user_name: null, email: 'nobody@example.com' })).rejects.toThrow();

      expect(countUsers(db)).toEqual({ total: 5 });
    });

    test('should run overlapping writes one after another', async () => {
      const results = await Promise.allSettled([
        service.createRecord('users', { user_name: 'erin', email: 'erin@example.com' }),
        service.createRecord('users', { user_name: null, email: 'nobody@example.com' }),
        service.createRecord('users', { user_name: 'frank', email: 'frank@example.com' }),
      ]);

      expect(results.map(result => result.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
      expect(countUsers(db)).toEqual({ total: 7 });
    });

    test('should update fillable values', async () => {
      expect(await service.updateRecord('users', 2, { email: 'robert@example.com' })).toEqual({
        id: 2,
        user_name: 'bob',
        email: 'robert@example.com',
        flag_enabled: false,
        group_id: 2,
      });
    });

    test('should report updates to missing records', async () => {
      await expect(service.updateRecord('users', 99, { email: 'x@example.com' })).rejects.toMatchObject({
        statusCode: 404,
        errorCode: 'RECORD_NOT_FOUND',
      });
    });

    test('should reject updates with nothing fillable', async () => {
      await expect(service.updateRecord('users', 2, {})).rejects.toMatchObject({
        statusCode: 400,
        errorCode: 'NO_FILLABLE_VALUES',
      });
    });
  });
});
