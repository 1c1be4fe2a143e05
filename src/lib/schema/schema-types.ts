/**
 * Schema document types
 *
 * Raw documents (as read from storage) are validated into RawSchemaDocument by
 * SchemaValidator, then rewritten into the canonical SchemaDocument below by
 * SchemaNormalizer. Everything downstream of the cache reads SchemaDocument.
 */

/**
 * Canonical field types. Legacy aliases (boolean-tgl, boolean-yn, ...) only
 * exist in raw documents.
 */
export const FIELD_TYPES = [
    'string',
    'text',
    'textarea',
    'integer',
    'float',
    'decimal',
    'boolean',
    'date',
    'datetime',
    'email',
    'password',
    'phone',
    'url',
    'zip',
    'json',
    'multiselect',
    'smartlookup',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export type LegacyBooleanType = 'boolean-tgl' | 'boolean-chk' | 'boolean-sel' | 'boolean-yn';

export const LEGACY_BOOLEAN_TYPES: readonly LegacyBooleanType[] = ['boolean-tgl', 'boolean-chk', 'boolean-sel', 'boolean-yn'];

/** Contexts a field can be tagged for via show_in */
export type FieldContext = 'list' | 'create' | 'edit' | 'form' | 'detail';

export type ActionScope = 'list' | 'detail';

export type ActionType = 'form' | 'delete' | 'field_update' | 'api_call' | 'modal';

export type SortDirection = 'asc' | 'desc';

/**
 * Opt-in exposure of a field to the listing engine. Computed once at
 * normalization time.
 */
export interface FieldPolicy {
    sortable: boolean;
    filterable: boolean;
    listable: boolean;
}

export interface FieldDefinition {
    type: FieldType;
    ui?: string;
    label?: string;
    required?: boolean;
    readonly?: boolean;
    editable?: boolean;
    viewable?: boolean;
    sortable: boolean;
    filterable: boolean;
    listable: boolean;
    show_in: FieldContext[];
    computed?: boolean;
    auto_increment?: boolean;
    primary?: boolean;
    default?: unknown;
    validation?: Record<string, unknown>;
    placeholder?: string;
    description?: string;
    icon?: string;
    rows?: number;
    width?: string | number;
    field_template?: string;
    filter_type?: string;
    lookup_model?: string;
    lookup_id?: string;
    lookup_desc?: string;
    policy: FieldPolicy;
}

export interface ModalConfig {
    type?: string;
    title?: string;
    buttons?: string;
    warning?: string;
    [key: string]: unknown;
}

export interface ActionDefinition {
    key: string;
    label?: string;
    type?: ActionType;
    scope?: string | string[];
    permission?: string;
    icon?: string;
    style?: string;
    confirm?: string;
    field?: string;
    field_label?: string;
    toggle?: boolean;
    value?: unknown;
    modal_config?: ModalConfig;
    [key: string]: unknown;
}

export interface HasManyRelationship {
    name: string;
    type: 'has_many';
    model?: string;
    foreign_key: string;
}

export interface ManyToManyRelationship {
    name: string;
    type: 'many_to_many';
    model?: string;
    pivot_table: string;
    foreign_key: string;
    related_key: string;
}

export interface ThroughRelationship {
    name: string;
    type: 'belongs_to_many_through';
    model?: string;
    through: string;
    first_pivot_table?: string;
    first_foreign_key?: string;
    first_related_key?: string;
    second_pivot_table?: string;
    second_foreign_key?: string;
    second_related_key?: string;
}

export type RelationshipDefinition = HasManyRelationship | ManyToManyRelationship | ThroughRelationship;

export interface DetailDefinition {
    model: string;
    foreign_key?: string;
    list_fields?: string[];
    title?: string;
}

/** Operation (read, create, update, delete, ...) to permission key */
export type Permissions = Record<string, string>;

export interface SchemaDocument {
    model: string;
    table: string;
    primary_key: string;
    timestamps: boolean;
    soft_delete: boolean;
    connection?: string;
    title?: string;
    singular_title?: string;
    description?: string;
    title_field?: string;
    permissions?: Permissions;
    default_sort?: Record<string, SortDirection>;
    default_actions?: boolean;
    detail_editable?: boolean;
    render_mode?: string;
    fields: Record<string, FieldDefinition>;
    actions: ActionDefinition[];
    relationships: RelationshipDefinition[];
    details: DetailDefinition[];
    detail?: DetailDefinition;
}

export function isFieldType(value: string): value is FieldType {
    return FIELD_TYPES.some(type => type === value);
}

export function isLegacyBooleanType(value: string): value is LegacyBooleanType {
    return LEGACY_BOOLEAN_TYPES.some(type => type === value);
}

/**
 * Text-like field types. LIKE matching applies directly to these; other
 * types are cast to text for search and compared by equality for filters.
 */
export function isTextualType(type: FieldType): boolean {
    switch (type) {
        case 'string':
        case 'text':
        case 'textarea':
        case 'email':
        case 'phone':
        case 'url':
        case 'zip':
        case 'password':
        case 'multiselect':
            return true;
        case 'integer':
        case 'float':
        case 'decimal':
        case 'boolean':
        case 'date':
        case 'datetime':
        case 'json':
        case 'smartlookup':
            return false;
        default:
            return assertNever(type);
    }
}

export function assertNever(value: never): never {
    throw new Error(`Unhandled value: ${String(value)}`);
}

/** Plain SQL identifier, the only form schema-sourced names may take */
export const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
