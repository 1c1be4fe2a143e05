import { HttpErrors } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import { FilterSqlGenerator } from '@src/lib/filter-sql-generator.js';
import { quoteIdentifier } from '@src/lib/filter-where.js';
import { FilterOp, type WhereCondition } from '@src/lib/filter-types.js';
import type { DatabaseType } from '@src/lib/database/adapter.js';
import { assertNever, type FieldDefinition, type FieldType, type SchemaDocument } from '@src/lib/schema/schema-types.js';

export const CREATED_AT = 'created_at';
export const UPDATED_AT = 'updated_at';
export const DELETED_AT = 'deleted_at';

export interface SqlStatement {
    query: string;
    params: unknown[];
}

export interface CrudModelOptions {
    dialect?: DatabaseType;
    /** Clock for timestamp columns */
    now?: () => Date;
}

function toNumber(value: unknown): number | null {
    const parsed = typeof value === 'number' ? value : Number(String(value).trim());
    return Number.isFinite(parsed) ? parsed : null;
}

function toBoolean(value: unknown): boolean | null {
    if (typeof value === 'boolean') {
        return value;
    }
    switch (String(value).trim().toLowerCase()) {
        case '1':
        case 't':
        case 'true':
        case 'yes':
        case 'on':
            return true;
        case '0':
        case 'f':
        case 'false':
        case 'no':
        case 'off':
            return false;
        default:
            return null;
    }
}

function parseJson(value: string): unknown {
    try {
        return JSON.parse(value);
    } catch {
        logger.debug('Stored JSON value could not be parsed', { length: value.length });
        return value;
    }
}

/**
 * Cast a stored (or submitted) value to the JavaScript shape of its field type.
 * null and undefined always cast to null.
 */
export function castValue(type: FieldType, value: unknown): unknown {
    if (value === null || value === undefined) {
        return null;
    }

    switch (type) {
        case 'string':
        case 'text':
        case 'textarea':
        case 'email':
        case 'password':
        case 'phone':
        case 'url':
        case 'zip':
            return value instanceof Date ? value.toISOString() : String(value);

        case 'integer': {
            const parsed = toNumber(value);
            return parsed === null ? null : Math.trunc(parsed);
        }

        case 'float':
        case 'decimal':
            return toNumber(value);

        case 'boolean':
            return toBoolean(value);

        case 'date':
            return value instanceof Date ? value.toISOString().slice(0, 10) : String(value);

        case 'datetime':
            return value instanceof Date ? value.toISOString() : String(value);

        case 'json':
            return typeof value === 'string' ? parseJson(value) : value;

        case 'multiselect': {
            if (Array.isArray(value)) {
                return value.map(String);
            }
            const text = String(value).trim();
            if (text.startsWith('[')) {
                const parsed = parseJson(text);
                return Array.isArray(parsed) ? parsed.map(String) : [text];
            }
            return text === '' ? [] : text.split(',').map(item => item.trim());
        }

        case 'smartlookup':
            return value;

        default:
            return assertNever(type);
    }
}

/**
 * Columns the engine writes itself
 */
function isManagedColumn(schema: SchemaDocument, name: string): boolean {
    if (schema.timestamps && (name === CREATED_AT || name === UPDATED_AT)) {
        return true;
    }
    return schema.soft_delete && name === DELETED_AT;
}

/**
 * Shape a value for storage. Structured values are serialized to JSON text.
 */
function toStorage(field: FieldDefinition, value: unknown): unknown {
    if (value === null || value === undefined) {
        return null;
    }

    if (field.type === 'json' || field.type === 'multiselect') {
        const cast = castValue(field.type, value);
        return typeof cast === 'string' ? cast : JSON.stringify(cast);
    }

    return castValue(field.type, value);
}

/**
 * CrudModel - table-level view of a normalized schema
 *
 * Builds the parameterized statements behind record reads and writes. Only
 * fillable columns (stored, not auto-increment, editable) are ever written;
 * `created_at` / `updated_at` are maintained when the schema has timestamps.
 */
export class CrudModel {
    readonly table: string;
    readonly primaryKey: string;
    readonly columns: string[];
    readonly fillable: string[];

    private readonly dialect: DatabaseType;
    private readonly now: () => Date;

    private constructor(
        readonly schema: SchemaDocument,
        options: CrudModelOptions
    ) {
        this.table = schema.table;
        this.primaryKey = schema.primary_key;
        this.dialect = options.dialect ?? 'postgresql';
        this.now = options.now ?? (() => new Date());

        const stored = Object.entries(schema.fields).filter(([, field]) => !field.computed);
        this.columns = stored.map(([name]) => name);
        this.fillable = stored
            .filter(([name, field]) => !field.auto_increment && field.editable !== false && name !== this.primaryKey)
            .filter(([name]) => !isManagedColumn(schema, name))
            .map(([name]) => name);
    }

    static fromSchema(schema: SchemaDocument, options: CrudModelOptions = {}): CrudModel {
        return new CrudModel(schema, options);
    }

    castValue(field: string, value: unknown): unknown {
        const definition = this.schema.fields[field];
        return definition ? castValue(definition.type, value) : value;
    }

    /**
     * Project a row onto `fields` (all stored columns by default), casting each
     * value by its field type. The primary key is always kept.
     */
    castRow(row: Record<string, unknown>, fields: readonly string[] = this.columns): Record<string, unknown> {
        const result: Record<string, unknown> = {};

        if (this.primaryKey in row) {
            result[this.primaryKey] = this.castValue(this.primaryKey, row[this.primaryKey]);
        }

        for (const name of fields) {
            if (name in row) {
                result[name] = this.castValue(name, row[name]);
            }
        }

        return result;
    }

    /**
     * Fillable subset of `values`; anything else is dropped
     */
    pickFillable(values: Record<string, unknown>): Array<[string, unknown]> {
        const picked: Array<[string, unknown]> = [];

        for (const [name, value] of Object.entries(values)) {
            const field = this.schema.fields[name];
            if (!field || !this.fillable.includes(name)) {
                logger.debug('Non-fillable value dropped', { model: this.schema.model, field: name });
                continue;
            }
            picked.push([name, toStorage(field, value)]);
        }

        return picked;
    }

    toInsert(values: Record<string, unknown>): SqlStatement {
        const assignments = this.pickFillable(values);

        if (this.schema.timestamps) {
            const stamp = this.now().toISOString();
            assignments.push([CREATED_AT, stamp], [UPDATED_AT, stamp]);
        }

        if (assignments.length === 0) {
            return { query: `INSERT INTO ${quoteIdentifier(this.table)} DEFAULT VALUES RETURNING *`, params: [] };
        }

        const columns = assignments.map(([name]) => quoteIdentifier(name)).join(', ');
        const placeholders = assignments.map((_, index) => `$${index + 1}`).join(', ');

        return {
            query: `INSERT INTO ${quoteIdentifier(this.table)} (${columns}) VALUES (${placeholders}) RETURNING *`,
            params: assignments.map(([, value]) => value),
        };
    }

    /**
     * Cast a client-supplied id (usually a route parameter) to the primary key's
     * field type. An id that cannot be a key of this model is reported as a
     * missing record.
     */
    castId(id: string | number): string | number {
        const field = this.schema.fields[this.primaryKey];
        if (String(id).trim() === '') {
            throw HttpErrors.recordNotFound(this.schema.model, id);
        }
        if (!field) {
            return id;
        }

        const cast = castValue(field.type, id);
        switch (field.type) {
            case 'integer':
                if (typeof cast === 'number' && Number.isSafeInteger(Number(id))) {
                    return cast;
                }
                break;
            case 'float':
            case 'decimal':
                if (typeof cast === 'number') {
                    return cast;
                }
                break;
            default:
                if (typeof cast === 'string' || typeof cast === 'number') {
                    return cast;
                }
                return String(id);
        }

        throw HttpErrors.recordNotFound(this.schema.model, id);
    }

    toUpdate(id: string | number, values: Record<string, unknown>): SqlStatement {
        const key = this.castId(id);
        const assignments = this.pickFillable(values);

        if (assignments.length === 0) {
            throw HttpErrors.badRequest(`No fillable values for model '${this.schema.model}'`, 'NO_FILLABLE_VALUES', {
                model: this.schema.model,
            });
        }

        if (this.schema.timestamps) {
            assignments.push([UPDATED_AT, this.now().toISOString()]);
        }

        const sets = assignments.map(([name], index) => `${quoteIdentifier(name)} = $${index + 1}`);
        const params = assignments.map(([, value]) => value);
        params.push(key);

        const where = [`${quoteIdentifier(this.primaryKey)} = $${params.length}`];
        if (this.schema.soft_delete) {
            where.push(`${quoteIdentifier(DELETED_AT)} IS NULL`);
        }

        return {
            query: `UPDATE ${quoteIdentifier(this.table)} SET ${sets.join(', ')} WHERE ${where.join(' AND ')} RETURNING *`,
            params,
        };
    }

    selectOne(id: string | number): SqlStatement {
        const where: WhereCondition[] = [
            { op: FilterOp.EQ, column: { table: this.table, column: this.primaryKey }, value: this.castId(id) },
        ];
        if (this.schema.soft_delete) {
            where.push({ op: FilterOp.NULL, column: { table: this.table, column: DELETED_AT } });
        }

        return FilterSqlGenerator.toSQL({
            tableName: this.table,
            select: [],
            joins: [],
            where,
            order: [],
            limit: 1,
            adapterType: this.dialect,
        });
    }

    /**
     * Fields shown on the detail view: tagged for detail and viewable
     */
    detailFields(): string[] {
        return Object.entries(this.schema.fields)
            .filter(([, field]) => !field.computed && field.show_in.includes('detail') && field.viewable !== false)
            .map(([name]) => name);
    }
}
