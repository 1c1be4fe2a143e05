import { logger } from '@src/lib/logger.js';
import type { ActionDefinition, SchemaDocument } from '@src/lib/schema/schema-types.js';

/**
 * Permission check supplied by the caller's authorization layer
 */
export type PermissionChecker = (permissionKey: string) => boolean;

/**
 * SchemaActionManager - default, toggle and scope handling for schema actions
 *
 * Default actions:
 * - create_action: scope list, requires permissions.create
 * - edit_action: scope detail, requires permissions.update
 * - delete_action: scope detail, requires permissions.delete, confirm modal
 *
 * Defaults are placed before custom actions and never replace an action that
 * already uses the same key. `default_actions: false` disables them.
 */
export class SchemaActionManager {
    /**
     * Apply toggle normalization and default synthesis
     */
    prepare(schema: SchemaDocument): SchemaDocument {
        const withDefaults = this.synthesizeDefaults(schema);
        return { ...withDefaults, actions: this.normalizeToggles(withDefaults.actions, withDefaults) };
    }

    synthesizeDefaults(schema: SchemaDocument): SchemaDocument {
        if (schema.default_actions === false) {
            logger.debug('Default actions disabled', { model: schema.model });
            return schema;
        }

        const existing = new Set(schema.actions.map(action => action.key));
        const permissions = schema.permissions ?? {};
        const defaults: ActionDefinition[] = [];

        if (!existing.has('create_action') && permissions.create) {
            defaults.push({
                key: 'create_action',
                label: 'ACTION.CREATE',
                icon: 'plus',
                type: 'form',
                style: 'primary',
                scope: ['list'],
                permission: permissions.create,
                modal_config: { type: 'form', title: 'ACTION.CREATE' },
            });
        }

        if (!existing.has('edit_action') && permissions.update) {
            defaults.push({
                key: 'edit_action',
                label: 'ACTION.EDIT',
                icon: 'pen-to-square',
                type: 'form',
                style: 'primary',
                scope: ['detail'],
                permission: permissions.update,
                modal_config: { type: 'form', title: 'ACTION.EDIT' },
            });
        }

        if (!existing.has('delete_action') && permissions.delete) {
            defaults.push({
                key: 'delete_action',
                label: 'ACTION.DELETE',
                icon: 'trash',
                type: 'delete',
                style: 'danger',
                scope: ['detail'],
                permission: permissions.delete,
                confirm: 'ACTION.DELETE_CONFIRM',
                modal_config: { type: 'confirm', buttons: 'yes_no', warning: 'WARNING_CANNOT_UNDONE' },
            });
        }

        if (defaults.length === 0) {
            return schema;
        }

        logger.debug('Default actions added', { model: schema.model, actions: defaults.map(action => action.key) });
        return { ...schema, actions: [...defaults, ...schema.actions] };
    }

    /**
     * Toggle actions (field_update + toggle) always confirm before flipping a value
     */
    normalizeToggles(actions: readonly ActionDefinition[], schema: SchemaDocument): ActionDefinition[] {
        return actions.map(action => {
            if (action.type !== 'field_update' || action.toggle !== true || !action.field) {
                return action;
            }

            const normalized: ActionDefinition = { ...action };

            if (normalized.confirm === undefined) {
                normalized.field_label ??= schema.fields[action.field]?.label ?? humanize(action.field);
                normalized.confirm = 'ACTION.TOGGLE_CONFIRM';
            }

            normalized.modal_config = action.modal_config
                ? { ...action.modal_config, type: action.modal_config.type ?? 'confirm' }
                : { type: 'confirm', buttons: 'yes_no' };

            return normalized;
        });
    }

    /**
     * Actions whose scope contains (or equals) `scope`. Unscoped actions are
     * never returned.
     */
    filterByScope(actions: readonly ActionDefinition[], scope: string): ActionDefinition[] {
        return actions.filter(action => {
            if (action.scope === undefined) {
                logger.debug('Action without scope excluded', { action: action.key, scope });
                return false;
            }

            return Array.isArray(action.scope) ? action.scope.includes(scope) : action.scope === scope;
        });
    }

    /**
     * Drop actions whose declared permission the caller does not hold
     */
    filterByPermission(actions: readonly ActionDefinition[], hasPermission: PermissionChecker): ActionDefinition[] {
        return actions.filter(action => action.permission === undefined || hasPermission(action.permission));
    }
}

/** `is_active` -> `Is active` */
export function humanize(name: string): string {
    const spaced = name.replace(/_/g, ' ');
    return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}
