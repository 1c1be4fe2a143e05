import { describe, test, expect } from 'vitest';
import { SchemaActionManager, humanize } from '@lib/schema/schema-actions.js';
import type { ActionDefinition, SchemaDocument } from '@lib/schema/schema-types.js';
import { SchemaNormalizer } from '@lib/schema/schema-normalizer.js';
import { SchemaValidator } from '@lib/schema/schema-validator.js';
import { fixtureSchema, prepareSchema, rawFixture } from '@spec/helpers/test-schemas.js';

function widgets(overrides: Record<string, unknown> = {}): SchemaDocument {
  return prepareSchema(
    {
      model: 'widgets',
      table: 'widgets',
      permissions: { create: 'create_widget', update: 'update_widget', delete: 'delete_widget' },
      fields: { id: { type: 'integer' }, is_active: { type: 'boolean' } },
      ...overrides,
    },
    'widgets'
  );
}

describe('SchemaActionManager', () => {
  const manager = new SchemaActionManager();

  describe('Default actions', () => {
    test('should place defaults before custom actions', () => {
      expect(fixtureSchema('users').actions.map(action => action.key)).toEqual([
        'create_action',
        'edit_action',
        'delete_action',
        'toggle_enabled',
        'export_users',
      ]);
    });

    test('should synthesize only the defaults with a declared permission', () => {
      expect(fixtureSchema('roles').actions).toEqual([
        {
          key: 'create_action',
          label: 'ACTION.CREATE',
          icon: 'plus',
          type: 'form',
          style: 'primary',
          scope: ['list'],
          permission: 'create_role',
          modal_config: { type: 'form', title: 'ACTION.CREATE' },
        },
      ]);
    });

    test('should confirm deletes', () => {
      const remove = fixtureSchema('users').actions.find(action => action.key === 'delete_action');

      expect(remove).toMatchObject({
        type: 'delete',
        scope: ['detail'],
        permission: 'delete_user',
        confirm: 'ACTION.DELETE_CONFIRM',
        modal_config: { type: 'confirm', buttons: 'yes_no', warning: 'WARNING_CANNOT_UNDONE' },
      });
    });

    test('should not replace an action that uses a default key', () => {
      const schema = widgets({ actions: [{ key: 'edit_action', label: 'Quick edit', scope: 'detail' }] });

      expect(schema.actions.map(action => action.key)).toEqual(['create_action', 'delete_action', 'edit_action']);
      expect(schema.actions[2]).toMatchObject({ label: 'Quick edit' });
    });

    test('should honor default_actions: false', () => {
      const schema = widgets({ default_actions: false, actions: [{ key: 'export', scope: 'list' }] });

      expect(schema.actions.map(action => action.key)).toEqual(['export']);
    });
  });

  describe('Toggle actions', () => {
    test('should add confirmation, field label and a confirm modal', () => {
      const toggle = fixtureSchema('users').actions.find(action => action.key === 'toggle_enabled');

      expect(toggle).toMatchObject({
        confirm: 'ACTION.TOGGLE_CONFIRM',
        field_label: 'Enabled',
        modal_config: { type: 'confirm', buttons: 'yes_no' },
      });
    });

    test('should humanize the field name when it has no label', () => {
      const schema = widgets({
        actions: [{ key: 'flip', type: 'field_update', field: 'is_active', toggle: true, scope: 'detail' }],
      });

      expect(schema.actions.find(action => action.key === 'flip')).toMatchObject({
        field_label: 'Is active',
        confirm: 'ACTION.TOGGLE_CONFIRM',
      });
    });

    test('should keep an explicit confirm and modal settings', () => {
      const schema = widgets({
        actions: [
          {
            key: 'flip',
            type: 'field_update',
            field: 'is_active',
            toggle: true,
            scope: 'detail',
            confirm: 'Really?',
            modal_config: { title: 'Flip it' },
          },
        ],
      });
      const flip = schema.actions.find(action => action.key === 'flip');

      expect(flip?.confirm).toBe('Really?');
      expect(flip?.field_label).toBeUndefined();
      expect(flip?.modal_config).toEqual({ title: 'Flip it', type: 'confirm' });
    });

    test('should leave non-toggle field updates alone', () => {
      const schema = widgets({
        actions: [{ key: 'activate', type: 'field_update', field: 'is_active', value: true, scope: 'detail' }],
      });

      expect(schema.actions.find(action => action.key === 'activate')?.confirm).toBeUndefined();
    });
  });

  describe('Scope filtering', () => {
    const actions = fixtureSchema('users').actions;

    test('should match single and array scopes', () => {
      expect(manager.filterByScope(actions, 'list').map(action => action.key)).toEqual(['create_action', 'export_users']);
      expect(manager.filterByScope(actions, 'detail').map(action => action.key)).toEqual([
        'edit_action',
        'delete_action',
        'toggle_enabled',
      ]);
    });

    test('should never return unscoped actions', () => {
      const unscoped: ActionDefinition[] = [{ key: 'orphan' }, { key: 'listed', scope: 'list' }];

      expect(manager.filterByScope(unscoped, 'list').map(action => action.key)).toEqual(['listed']);
      expect(manager.filterByScope(unscoped, 'detail')).toEqual([]);
    });

    test('should return nothing for an unknown scope', () => {
      expect(manager.filterByScope(actions, 'sidebar')).toEqual([]);
    });
  });

  describe('Permission filtering', () => {
    test('should drop actions whose permission is not held', () => {
      const detail = manager.filterByScope(fixtureSchema('users').actions, 'detail');
      const allowed = manager.filterByPermission(detail, permission => permission !== 'delete_user');

      expect(allowed.map(action => action.key)).toEqual(['edit_action', 'toggle_enabled']);
    });

    test('should keep actions without a permission', () => {
      const allowed = manager.filterByPermission([{ key: 'help', scope: 'list' }], () => false);

      expect(allowed.map(action => action.key)).toEqual(['help']);
    });
  });

  test('prepare should not mutate the normalized document', () => {
    const normalized = new SchemaNormalizer().normalize(new SchemaValidator().validate(rawFixture('users'), 'users'));

    const prepared = manager.prepare(normalized);

    expect(prepared.actions).toHaveLength(5);
    expect(normalized.actions.map(action => action.key)).toEqual(['toggle_enabled', 'export_users']);
    expect(normalized.actions[0].confirm).toBeUndefined();
  });
});

describe('humanize', () => {
  test('should turn snake case into a label', () => {
    expect(humanize('is_active')).toBe('Is active');
    expect(humanize('id')).toBe('Id');
  });
});
