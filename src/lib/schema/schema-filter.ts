import { logger } from '@src/lib/logger.js';
import { SchemaActionManager, humanize } from '@src/lib/schema/schema-actions.js';
import type {
    ActionDefinition,
    DetailDefinition,
    FieldDefinition,
    FieldType,
    Permissions,
    RelationshipDefinition,
    SchemaDocument,
    SortDirection,
} from '@src/lib/schema/schema-types.js';

export type SchemaContext = 'meta' | 'list' | 'create' | 'edit' | 'form' | 'detail';

const KNOWN_CONTEXTS: readonly SchemaContext[] = ['meta', 'list', 'create', 'edit', 'form', 'detail'];

function isSchemaContext(value: string): value is SchemaContext {
    return KNOWN_CONTEXTS.some(context => context === value);
}

/**
 * A field as exposed to one or more contexts. Attributes present depend on
 * which contexts contributed the field.
 */
export interface ContextField {
    type: FieldType;
    label: string;
    ui?: string;
    sortable?: boolean;
    filterable?: boolean;
    width?: string | number;
    field_template?: string;
    filter_type?: string;
    required?: boolean;
    readonly?: boolean;
    editable?: boolean;
    validation?: Record<string, unknown>;
    placeholder?: string;
    description?: string;
    default?: unknown;
    icon?: string;
    rows?: number;
    show_in?: string[];
    lookup_model?: string;
    lookup_id?: string;
    lookup_desc?: string;
}

/**
 * Context-scoped schema view, safe to serialize to an external caller
 */
export interface SchemaView {
    model: string;
    title: string;
    singular_title: string;
    primary_key: string;
    description?: string;
    permissions?: Permissions;
    title_field?: string;
    contexts: SchemaContext[];
    fields: Record<string, ContextField>;
    default_sort?: Record<string, SortDirection>;
    actions?: ActionDefinition[];
    details?: DetailDefinition[];
    detail?: DetailDefinition;
    relationships?: RelationshipDefinition[];
    detail_editable?: boolean;
    render_mode?: string;
}

/** Everything a context contributes besides its fields */
type ContextExtras = Omit<SchemaView, 'model' | 'title' | 'singular_title' | 'primary_key' | 'description' | 'permissions' | 'contexts' | 'fields'>;

interface ContextProjection {
    fields: Record<string, ContextField>;
    extras: ContextExtras;
}

/**
 * SchemaFilter - projects a normalized schema into list / form / detail / meta views
 *
 * Several contexts can be requested at once ("list,form"). Their field maps are
 * merged field by field, attribute by attribute, so no context can erase
 * fields contributed by another. Remaining context data merges shallowly on top
 * of the base view; action lists are combined by key.
 */
export class SchemaFilter {
    constructor(private readonly actions: SchemaActionManager = new SchemaActionManager()) {}

    /**
     * Parse "list,form" / ["list", "form"] into known contexts. Empty input or
     * "full" means the full document.
     */
    static parseContexts(contexts: string | readonly string[] | undefined): SchemaContext[] | 'full' {
        const requested = (typeof contexts === 'string' ? contexts.split(',') : contexts ?? [])
            .map(context => context.trim())
            .filter(context => context !== '');

        if (requested.length === 0 || requested.includes('full')) {
            return 'full';
        }

        const known: SchemaContext[] = [];
        for (const context of requested) {
            if (!isSchemaContext(context)) {
                logger.debug('Unknown schema context ignored', { context });
                continue;
            }
            if (!known.includes(context)) {
                known.push(context);
            }
        }

        return known;
    }

    filter(schema: SchemaDocument, contexts: string | readonly string[] | undefined): SchemaDocument | SchemaView {
        const parsed = SchemaFilter.parseContexts(contexts);
        if (parsed === 'full') {
            return schema;
        }

        const view: SchemaView = { ...this.base(schema), contexts: parsed, fields: {} };

        for (const context of parsed) {
            const projection = this.project(schema, context);
            const mergedActions = mergeActions(view.actions, projection.extras.actions);

            Object.assign(view, projection.extras);
            if (mergedActions) {
                view.actions = mergedActions;
            }

            for (const [name, field] of Object.entries(projection.fields)) {
                view.fields[name] = { ...view.fields[name], ...field };
            }
        }

        return view;
    }

    private base(schema: SchemaDocument) {
        const title = schema.title ?? humanize(schema.model);

        return {
            model: schema.model,
            title,
            singular_title: schema.singular_title ?? title,
            primary_key: schema.primary_key,
            ...(schema.description !== undefined && { description: schema.description }),
            ...(schema.permissions !== undefined && { permissions: schema.permissions }),
            ...(schema.title_field !== undefined && { title_field: schema.title_field }),
        };
    }

    private project(schema: SchemaDocument, context: SchemaContext): ContextProjection {
        switch (context) {
            case 'meta':
                return { fields: {}, extras: {} };
            case 'list':
                return this.listContext(schema);
            case 'create':
            case 'edit':
                return { fields: this.formFields(schema, [context]), extras: {} };
            case 'form':
                return { fields: this.formFields(schema, ['create', 'edit']), extras: {} };
            case 'detail':
                return this.detailContext(schema);
        }
    }

    private listContext(schema: SchemaDocument): ContextProjection {
        const fields: Record<string, ContextField> = {};

        for (const [name, field] of Object.entries(schema.fields)) {
            if (!field.policy.listable) {
                continue;
            }

            fields[name] = {
                type: field.type,
                label: field.label ?? humanize(name),
                sortable: field.policy.sortable,
                filterable: field.policy.filterable,
                ...(field.width !== undefined && { width: field.width }),
                ...(field.field_template !== undefined && { field_template: field.field_template }),
                ...(field.policy.filterable && { filter_type: field.filter_type ?? 'text' }),
            };
        }

        return {
            fields,
            extras: {
                ...(schema.default_sort !== undefined && { default_sort: schema.default_sort }),
                actions: this.actions.filterByScope(schema.actions, 'list'),
            },
        };
    }

    private formFields(schema: SchemaDocument, contexts: Array<'create' | 'edit'>): Record<string, ContextField> {
        const fields: Record<string, ContextField> = {};

        for (const [name, field] of Object.entries(schema.fields)) {
            if (field.computed || !contexts.some(context => field.show_in.includes(context))) {
                continue;
            }

            fields[name] = this.formField(name, field);
        }

        return fields;
    }

    private formField(name: string, field: FieldDefinition): ContextField {
        return {
            type: field.type,
            label: field.label ?? humanize(name),
            ...(field.ui !== undefined && { ui: field.ui }),
            required: field.required ?? false,
            readonly: field.readonly ?? false,
            editable: field.editable !== false,
            show_in: field.show_in,
            ...(field.validation !== undefined && { validation: field.validation }),
            ...(field.placeholder !== undefined && { placeholder: field.placeholder }),
            ...(field.description !== undefined && { description: field.description }),
            ...(field.default !== undefined && { default: field.default }),
            ...(field.icon !== undefined && { icon: field.icon }),
            ...(field.rows !== undefined && { rows: field.rows }),
            ...(field.type === 'smartlookup' && {
                lookup_model: field.lookup_model,
                lookup_id: field.lookup_id,
                lookup_desc: field.lookup_desc,
            }),
        };
    }

    private detailContext(schema: SchemaDocument): ContextProjection {
        const fields: Record<string, ContextField> = {};

        for (const [name, field] of Object.entries(schema.fields)) {
            if (!field.show_in.includes('detail') || field.viewable === false) {
                continue;
            }

            fields[name] = {
                type: field.type,
                label: field.label ?? humanize(name),
                ...(field.ui !== undefined && { ui: field.ui }),
                editable: field.editable !== false,
                readonly: field.readonly ?? false,
                ...(field.description !== undefined && { description: field.description }),
                ...(field.field_template !== undefined && { field_template: field.field_template }),
                ...(field.default !== undefined && { default: field.default }),
            };
        }

        return {
            fields,
            extras: {
                details: schema.details,
                ...(schema.detail !== undefined && { detail: schema.detail }),
                relationships: schema.relationships,
                actions: this.actions.filterByScope(schema.actions, 'detail'),
                ...(schema.detail_editable !== undefined && { detail_editable: schema.detail_editable }),
                ...(schema.render_mode !== undefined && { render_mode: schema.render_mode }),
                ...(schema.title_field !== undefined && { title_field: schema.title_field }),
            },
        };
    }
}

function mergeActions(
    current: ActionDefinition[] | undefined,
    incoming: ActionDefinition[] | undefined
): ActionDefinition[] | undefined {
    if (!current || !incoming) {
        return incoming ?? current;
    }

    const keys = new Set(current.map(action => action.key));
    return [...current, ...incoming.filter(action => !keys.has(action.key))];
}
