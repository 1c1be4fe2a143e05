import { logger } from '@src/lib/logger.js';
import type {
    RawActionDefinition,
    RawFieldDefinition,
    RawRelationshipDefinition,
    RawSchemaDocument,
} from '@src/lib/schema/schema-validator.js';
import {
    assertNever,
    isFieldType,
    isLegacyBooleanType,
    isRecord,
    type ActionDefinition,
    type FieldContext,
    type FieldDefinition,
    type FieldType,
    type LegacyBooleanType,
    type RelationshipDefinition,
    type SchemaDocument,
} from '@src/lib/schema/schema-types.js';

/**
 * SchemaNormalizer - rewrites a validated raw document into canonical form
 *
 * Order of passes per field:
 *   1. ORM-style aliases (nullable, autoIncrement, references, nested ui object, ...)
 *   2. Smartlookup attributes
 *   3. Legacy boolean types (boolean-tgl, boolean-yn, ...)
 *   4. Visibility (show_in expansion, listable/editable/viewable flags)
 *   5. FieldPolicy
 *
 * Top-level defaults: primary_key "id", timestamps true, soft_delete false.
 * Explicit values are never overwritten, and the output of normalize() is a
 * fixed point: normalizing it again yields an equal document.
 */

const LEGACY_BOOLEAN_UI: Record<LegacyBooleanType, string> = {
    'boolean-tgl': 'toggle',
    'boolean-chk': 'checkbox',
    'boolean-sel': 'select',
    'boolean-yn': 'select',
};

const CONTEXTS: readonly FieldContext[] = ['list', 'create', 'edit', 'form', 'detail'];

function isFieldContext(value: unknown): value is FieldContext {
    return CONTEXTS.some(context => context === value);
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
    return typeof value === 'boolean' ? value : undefined;
}

/** Working shape while passes run; type stays a raw string until pass 3 */
interface FieldDraft extends Omit<FieldDefinition, 'type' | 'show_in' | 'sortable' | 'filterable' | 'listable' | 'policy'> {
    type: string;
    show_in?: FieldContext[];
    sortable?: boolean;
    filterable?: boolean;
    listable?: boolean;
}

export class SchemaNormalizer {
    normalize(raw: RawSchemaDocument): SchemaDocument {
        const fields: Record<string, FieldDefinition> = {};

        for (const [name, field] of Object.entries(raw.fields)) {
            fields[name] = this.normalizeField(raw.model, name, field);
        }

        return {
            model: raw.model,
            table: raw.table,
            primary_key: raw.primary_key ?? 'id',
            timestamps: raw.timestamps ?? true,
            soft_delete: raw.soft_delete ?? false,
            connection: raw.connection,
            title: raw.title,
            singular_title: raw.singular_title,
            description: raw.description,
            title_field: raw.title_field,
            permissions: raw.permissions,
            default_sort: raw.default_sort,
            default_actions: raw.default_actions,
            detail_editable: raw.detail_editable,
            render_mode: raw.render_mode,
            fields,
            actions: raw.actions.map(action => this.normalizeAction(action)),
            relationships: raw.relationships.map(relationship => this.normalizeRelationship(relationship)),
            details: raw.details.map(detail => ({ ...detail })),
            detail: raw.detail ? { ...raw.detail } : undefined,
        };
    }

    private normalizeField(model: string, name: string, raw: RawFieldDefinition): FieldDefinition {
        const draft = this.normalizeOrmAttributes(raw);
        this.normalizeLookupAttributes(draft, raw);
        const type = this.normalizeBooleanType(draft);
        this.normalizeVisibility(draft, type);

        let sortable = draft.sortable ?? false;
        let filterable = draft.filterable ?? false;
        let listable = draft.listable ?? false;

        // Virtual columns cannot be queried, passwords are never exposed
        if (draft.computed || type === 'password') {
            if (sortable || filterable || listable) {
                logger.debug('Field exposure flags cleared', { model, field: name, type, computed: draft.computed });
            }
            sortable = false;
            filterable = false;
            listable = false;
        }

        const show_in = (draft.show_in ?? []).filter(context => context !== 'list' || listable);

        return {
            ...draft,
            type,
            show_in,
            sortable,
            filterable,
            listable,
            policy: { sortable, filterable, listable },
        };
    }

    /**
     * Pass 1: ORM-style attribute aliases
     */
    private normalizeOrmAttributes(raw: RawFieldDefinition): FieldDraft {
        const nested = isRecord(raw.ui) ? raw.ui : undefined;
        const nestedShowIn = nested?.show_in;
        const nullable = optionalBoolean(raw.nullable);

        const validation: Record<string, unknown> = {
            ...(isRecord(raw.validate) ? raw.validate : {}),
            ...(raw.validation ?? {}),
        };
        if (raw.unique === true && validation.unique === undefined) {
            validation.unique = true;
        }
        if (typeof raw.length === 'number' && validation.length === undefined) {
            validation.length = { max: raw.length };
        }

        const draft: FieldDraft = {
            type: raw.type,
            ui: typeof raw.ui === 'string' ? raw.ui : optionalString(nested?.widget),
            label: raw.label ?? optionalString(nested?.label),
            required: raw.required ?? (nullable === undefined ? undefined : !nullable),
            readonly: raw.readonly,
            editable: raw.editable,
            viewable: raw.viewable,
            sortable: raw.sortable ?? optionalBoolean(nested?.sortable),
            filterable: raw.filterable ?? optionalBoolean(nested?.filterable),
            listable: raw.listable,
            show_in: raw.show_in ?? (Array.isArray(nestedShowIn) ? nestedShowIn.filter(isFieldContext) : undefined),
            computed: raw.computed,
            auto_increment: raw.auto_increment ?? optionalBoolean(raw.autoIncrement),
            primary: raw.primary ?? optionalBoolean(raw.primaryKey),
            default: 'default' in raw ? raw.default : raw.defaultValue,
            validation: Object.keys(validation).length > 0 ? validation : undefined,
            placeholder: raw.placeholder,
            description: raw.description,
            icon: raw.icon,
            rows: raw.rows,
            width: raw.width,
            field_template: raw.field_template,
            filter_type: raw.filter_type,
            lookup_model: raw.lookup_model,
            lookup_id: raw.lookup_id,
            lookup_desc: raw.lookup_desc,
        };

        if (isRecord(raw.references)) {
            const display = optionalString(raw.references.display) ?? optionalString(raw.references.desc);
            draft.lookup_model ??= optionalString(raw.references.model) ?? optionalString(raw.references.table);
            draft.lookup_id ??= optionalString(raw.references.key) ?? optionalString(raw.references.id);

            if (display !== undefined) {
                draft.lookup_desc ??= display;
                draft.type = 'smartlookup';
            }
        }

        return draft;
    }

    /**
     * Pass 2: smartlookup attributes from `lookup: {model,id,desc}` or the
     * short `model` / `id` / `desc` keys
     */
    private normalizeLookupAttributes(draft: FieldDraft, raw: RawFieldDefinition): void {
        if (draft.type !== 'smartlookup') {
            return;
        }

        const lookup = isRecord(raw.lookup) ? raw.lookup : {};
        draft.lookup_model ??= optionalString(lookup.model) ?? optionalString(raw.model);
        draft.lookup_id ??= optionalString(lookup.id) ?? optionalString(raw.id) ?? 'id';
        draft.lookup_desc ??= optionalString(lookup.desc) ?? optionalString(raw.desc) ?? 'name';
    }

    /**
     * Pass 3: legacy boolean suffixes become `{type: boolean, ui}`
     */
    private normalizeBooleanType(draft: FieldDraft): FieldType {
        const type = draft.type;

        if (isLegacyBooleanType(type)) {
            draft.ui ??= LEGACY_BOOLEAN_UI[type];
            return 'boolean';
        }

        if (type === 'boolean') {
            draft.ui ??= 'checkbox';
            return 'boolean';
        }

        if (isFieldType(type)) {
            return type;
        }

        // Unreachable for validated documents
        throw new Error(`Unknown field type '${type}'`);
    }

    /**
     * Pass 4: show_in and the listable/editable/viewable flags agree
     */
    private normalizeVisibility(draft: FieldDraft, type: FieldType): void {
        if (draft.show_in !== undefined) {
            const expanded = draft.show_in.flatMap((context): FieldContext[] =>
                context === 'form' ? ['create', 'edit'] : [context]
            );
            draft.show_in = [...new Set(expanded)];
            draft.listable ??= draft.show_in.includes('list');
            draft.editable ??= draft.show_in.includes('create') || draft.show_in.includes('edit');
            draft.viewable ??= draft.show_in.includes('detail');
        } else {
            const show_in: FieldContext[] = [];
            if (draft.listable) {
                show_in.push('list');
            }
            if (draft.editable !== false) {
                show_in.push('create', 'edit');
            }
            if (draft.viewable !== false) {
                show_in.push('detail');
            }
            draft.show_in = show_in;
            draft.listable ??= false;
            draft.editable ??= true;
            draft.viewable ??= true;
        }

        if (draft.listable && !draft.show_in.includes('list')) {
            draft.show_in = ['list', ...draft.show_in];
        }

        if (type === 'password') {
            draft.show_in = draft.show_in.filter(context => context !== 'detail');
        }
    }

    private normalizeAction(action: RawActionDefinition): ActionDefinition {
        return {
            ...action,
            scope: Array.isArray(action.scope) ? [...action.scope] : action.scope,
            modal_config: action.modal_config ? { ...action.modal_config } : undefined,
        };
    }

    private normalizeRelationship(relationship: RawRelationshipDefinition): RelationshipDefinition {
        switch (relationship.type) {
            case 'has_many':
            case 'belongs_to_many_through':
                return { ...relationship };
            case 'many_to_many':
            case 'belongs_to_many':
                return { ...relationship, type: 'many_to_many' };
            default:
                return assertNever(relationship);
        }
    }
}
