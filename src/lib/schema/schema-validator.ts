import { z } from 'zod';
import { HttpErrors } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import {
    IDENTIFIER_PATTERN,
    isFieldType,
    isLegacyBooleanType,
    isRecord,
} from '@src/lib/schema/schema-types.js';

/**
 * SchemaValidator - structural validation of raw schema documents
 *
 * Runs before normalization. Every failure is an INVALID_SCHEMA error naming the
 * model and the dotted path of the offending key; nothing is patched silently.
 * Legacy aliases the normalizer understands (boolean-tgl, nullable, ui objects,
 * ...) pass through untouched.
 */

const identifier = z.string().regex(IDENTIFIER_PATTERN, 'must be a plain SQL identifier');

const fieldContext = z.enum(['list', 'create', 'edit', 'form', 'detail']);
const actionScope = z.enum(['list', 'detail']);

const rawFieldSchema = z
    .object({
        type: z
            .string()
            .default('string')
            .refine(type => isFieldType(type) || isLegacyBooleanType(type), type => ({
                message: `unknown field type '${type}'`,
            })),
        ui: z.union([z.string(), z.record(z.unknown())]).optional(),
        label: z.string().optional(),
        required: z.boolean().optional(),
        readonly: z.boolean().optional(),
        editable: z.boolean().optional(),
        viewable: z.boolean().optional(),
        sortable: z.boolean().optional(),
        filterable: z.boolean().optional(),
        listable: z.boolean().optional(),
        show_in: z.array(fieldContext).optional(),
        computed: z.boolean().optional(),
        auto_increment: z.boolean().optional(),
        primary: z.boolean().optional(),
        validation: z.record(z.unknown()).optional(),
        placeholder: z.string().optional(),
        description: z.string().optional(),
        icon: z.string().optional(),
        rows: z.number().int().positive().optional(),
        width: z.union([z.string(), z.number()]).optional(),
        field_template: z.string().optional(),
        filter_type: z.string().optional(),
        lookup_model: identifier.optional(),
        lookup_id: identifier.optional(),
        lookup_desc: identifier.optional(),
    })
    .passthrough();

const modalConfigSchema = z
    .object({
        type: z.string().optional(),
        title: z.string().optional(),
        buttons: z.string().optional(),
        warning: z.string().optional(),
    })
    .passthrough();

const rawActionSchema = z
    .object({
        key: z.string().min(1),
        label: z.string().optional(),
        type: z.enum(['form', 'delete', 'field_update', 'api_call', 'modal']).optional(),
        scope: z.union([actionScope, z.array(actionScope).min(1)]),
        permission: z.string().optional(),
        icon: z.string().optional(),
        style: z.string().optional(),
        confirm: z.string().optional(),
        field: identifier.optional(),
        field_label: z.string().optional(),
        toggle: z.boolean().optional(),
        value: z.unknown().optional(),
        modal_config: modalConfigSchema.optional(),
    })
    .passthrough();

const hasManySchema = z.object({
    name: identifier,
    type: z.literal('has_many'),
    model: identifier.optional(),
    foreign_key: identifier,
});

const manyToManySchema = z.object({
    name: identifier,
    type: z.enum(['many_to_many', 'belongs_to_many']),
    model: identifier.optional(),
    pivot_table: identifier,
    foreign_key: identifier,
    related_key: identifier,
});

const throughSchema = z.object({
    name: identifier,
    type: z.literal('belongs_to_many_through'),
    model: identifier.optional(),
    through: identifier,
    first_pivot_table: identifier.optional(),
    first_foreign_key: identifier.optional(),
    first_related_key: identifier.optional(),
    second_pivot_table: identifier.optional(),
    second_foreign_key: identifier.optional(),
    second_related_key: identifier.optional(),
});

// Relationships without a type are pivot relationships
const rawRelationshipSchema = z.preprocess(
    value => (isRecord(value) && value.type === undefined ? { ...value, type: 'many_to_many' } : value),
    z.discriminatedUnion('type', [hasManySchema, manyToManySchema, throughSchema])
);

const rawDetailSchema = z.object({
    model: identifier,
    foreign_key: identifier.optional(),
    list_fields: z.array(identifier).optional(),
    title: z.string().optional(),
});

const rawSchemaDocument = z
    .object({
        model: identifier,
        table: identifier,
        primary_key: identifier.optional(),
        timestamps: z.boolean().optional(),
        soft_delete: z.boolean().optional(),
        connection: identifier.optional(),
        title: z.string().optional(),
        singular_title: z.string().optional(),
        description: z.string().optional(),
        title_field: identifier.optional(),
        permissions: z.record(z.string().min(1)).optional(),
        default_sort: z.record(identifier, z.string().toLowerCase().pipe(z.enum(['asc', 'desc']))).optional(),
        default_actions: z.boolean().optional(),
        detail_editable: z.boolean().optional(),
        render_mode: z.string().optional(),
        fields: z.record(identifier, rawFieldSchema).refine(fields => Object.keys(fields).length > 0, {
            message: 'must declare at least one field',
        }),
        actions: z.array(rawActionSchema).default([]),
        relationships: z.array(rawRelationshipSchema).default([]),
        details: z.array(rawDetailSchema).default([]),
        detail: rawDetailSchema.optional(),
    })
    .passthrough();

export type RawFieldDefinition = z.infer<typeof rawFieldSchema>;
export type RawActionDefinition = z.infer<typeof rawActionSchema>;
export type RawRelationshipDefinition = z.infer<typeof rawRelationshipSchema>;
export type RawDetailDefinition = z.infer<typeof rawDetailSchema>;
export type RawSchemaDocument = z.infer<typeof rawSchemaDocument>;

export class SchemaValidator {
    /**
     * Validate a raw document loaded for `model`
     *
     * @throws HttpError INVALID_SCHEMA with `{ model, key }` details
     */
    validate(document: unknown, model: string): RawSchemaDocument {
        const result = rawSchemaDocument.safeParse(document);

        if (!result.success) {
            const issue = result.error.issues[0];
            const key = issue.path.length > 0 ? issue.path.join('.') : '$';
            throw HttpErrors.invalidSchema(model, key, issue.message);
        }

        const schema = result.data;

        if (schema.model !== model) {
            throw HttpErrors.invalidSchema(model, 'model', `document declares model '${schema.model}'`);
        }

        this.validateActions(schema);
        this.validateRelationships(schema);
        this.validateReferences(schema);
        this.warnUnresolvedDetails(schema);

        return schema;
    }

    /**
     * True when the schema declares a permission key for the operation
     */
    hasPermission(schema: { permissions?: Record<string, string> }, operation: string): boolean {
        return Boolean(schema.permissions?.[operation]);
    }

    private validateActions(schema: RawSchemaDocument): void {
        const seen = new Set<string>();

        schema.actions.forEach((action, index) => {
            if (seen.has(action.key)) {
                throw HttpErrors.invalidSchema(schema.model, `actions.${index}.key`, `duplicate action key '${action.key}'`);
            }
            seen.add(action.key);

            if (action.type === 'field_update' && action.field === undefined) {
                throw HttpErrors.invalidSchema(schema.model, `actions.${index}.field`, 'field_update actions must name a field');
            }

            if (action.field !== undefined && !(action.field in schema.fields)) {
                throw HttpErrors.invalidSchema(schema.model, `actions.${index}.field`, `unknown field '${action.field}'`);
            }
        });
    }

    private validateRelationships(schema: RawSchemaDocument): void {
        const seen = new Set<string>();

        schema.relationships.forEach((relationship, index) => {
            if (seen.has(relationship.name)) {
                throw HttpErrors.invalidSchema(schema.model, `relationships.${index}.name`, `duplicate relationship '${relationship.name}'`);
            }
            seen.add(relationship.name);

            if (relationship.type !== 'belongs_to_many_through') {
                return;
            }

            // Explicit hop keys come as complete triples or not at all
            const hops: Array<[string, Array<string | undefined>]> = [
                ['first', [relationship.first_pivot_table, relationship.first_foreign_key, relationship.first_related_key]],
                ['second', [relationship.second_pivot_table, relationship.second_foreign_key, relationship.second_related_key]],
            ];

            for (const [hop, keys] of hops) {
                const declared = keys.filter(key => key !== undefined).length;

                if (declared !== 0 && declared !== keys.length) {
                    throw HttpErrors.invalidSchema(
                        schema.model,
                        `relationships.${index}.${hop}_pivot_table`,
                        `${hop}_pivot_table, ${hop}_foreign_key and ${hop}_related_key must be declared together`
                    );
                }
            }
        });
    }

    private validateReferences(schema: RawSchemaDocument): void {
        for (const field of Object.keys(schema.default_sort ?? {})) {
            if (!(field in schema.fields)) {
                throw HttpErrors.invalidSchema(schema.model, `default_sort.${field}`, `unknown field '${field}'`);
            }
        }

        if (schema.title_field !== undefined && !(schema.title_field in schema.fields)) {
            throw HttpErrors.invalidSchema(schema.model, 'title_field', `unknown field '${schema.title_field}'`);
        }
    }

    /**
     * A pivot-mediated detail needs a relationship entry. The request for that
     * relation fails with MISSING_RELATIONSHIP_CONFIG; flag it at load time too.
     */
    private warnUnresolvedDetails(schema: RawSchemaDocument): void {
        const details = schema.detail ? [...schema.details, schema.detail] : schema.details;
        const relationships = new Set(schema.relationships.map(relationship => relationship.name));

        for (const detail of details) {
            if (detail.foreign_key === undefined && !relationships.has(detail.model)) {
                logger.warn('Detail has no foreign_key and no matching relationship', {
                    model: schema.model,
                    detail: detail.model,
                });
            }
        }
    }
}
