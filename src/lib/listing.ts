import { logger } from '@src/lib/logger.js';
import { castValue, DELETED_AT, type SqlStatement } from '@src/lib/crud-model.js';
import { FilterSqlGenerator } from '@src/lib/filter-sql-generator.js';
import { escapeLike } from '@src/lib/filter-where.js';
import { FilterOp, type ColumnRef, type FilterOrderInfo, type FilterState, type WhereCondition } from '@src/lib/filter-types.js';
import type { DatabaseAdapter, DatabaseType } from '@src/lib/database/adapter.js';
import type { RelationScope } from '@src/lib/relationship-resolver.js';
import {
    assertNever,
    isTextualType,
    type FieldDefinition,
    type SchemaDocument,
    type SortDirection,
} from '@src/lib/schema/schema-types.js';

/**
 * Everything the listing engine needs to know about the queried model
 */
export interface ListingQuery {
    table: string;
    primaryKey: string;
    fields: Record<string, FieldDefinition>;
    sortable: string[];
    filterable: string[];
    listable: string[];
    scope?: RelationScope;
    softDelete: boolean;
    defaultSort?: Record<string, SortDirection>;
}

/**
 * Caller-supplied listing parameters, usually from parseListingQuery()
 */
export interface ListingParams {
    page?: number | string;
    size?: number | string;
    sorts?: Record<string, string>;
    filters?: Record<string, unknown>;
    search?: string;
}

export interface ListingResult {
    count: number;
    count_filtered: number;
    rows: Record<string, unknown>[];
}

export interface ListingOptions {
    dialect: DatabaseType;
    defaultPageSize: number;
    maxPageSize: number;
}

export interface ListingPlan {
    page: number;
    size: number;
    select: SqlStatement;
    count: SqlStatement;
    /** Absent when no filter or search was accepted (count_filtered = count) */
    countFiltered?: SqlStatement;
}

/**
 * Listing - paginated, sorted, filtered and searched reads over one model
 *
 * Only fields the schema opts in are honored: sorts on sortable fields,
 * filters and search on filterable fields, output columns from listable
 * fields. Anything else is dropped and logged at debug level.
 *
 * Conditions are assembled in a fixed order (relation scope, soft delete,
 * filters, search) so parameters are numbered predictably. The primary key
 * ascending is always the final sort term, keeping pages stable.
 */
export class Listing {
    constructor(
        private readonly adapter: DatabaseAdapter,
        private readonly options: ListingOptions
    ) {}

    /**
     * Listing query for a model, optionally scoped to a relation. `listFields`
     * (from a detail entry) replaces the listable set.
     */
    static fromSchema(schema: SchemaDocument, scope?: RelationScope, listFields?: readonly string[]): ListingQuery {
        const named = (predicate: (field: FieldDefinition) => boolean) =>
            Object.entries(schema.fields)
                .filter(([name, field]) => name.trim() !== '' && predicate(field))
                .map(([name]) => name);

        const listable = listFields
            ? listFields.filter(name => {
                  const field = schema.fields[name];
                  return field !== undefined && !field.computed && field.type !== 'password';
              })
            : named(field => field.policy.listable);

        return {
            table: schema.table,
            primaryKey: schema.primary_key,
            fields: schema.fields,
            sortable: named(field => field.policy.sortable),
            filterable: named(field => field.policy.filterable),
            listable,
            scope,
            softDelete: schema.soft_delete,
            defaultSort: schema.default_sort,
        };
    }

    /**
     * Build the statements for one page without touching the database
     */
    build(query: ListingQuery, params: ListingParams = {}): ListingPlan {
        const size = this.resolveSize(params.size);
        const page = this.resolvePage(params.page, size);

        const base: WhereCondition[] = [...(query.scope?.where ?? [])];
        if (query.softDelete) {
            base.push({ op: FilterOp.NULL, column: this.column(query, DELETED_AT) });
        }

        const narrowing = [...this.buildFilters(query, params.filters ?? {}), ...this.buildSearch(query, params.search)];
        const joins = query.scope?.joins ?? [];

        const state = (where: WhereCondition[]): FilterState => ({
            tableName: query.table,
            select: this.buildSelect(query),
            joins,
            where,
            order: this.buildOrder(query, params.sorts ?? {}),
            limit: size,
            offset: page * size,
            adapterType: this.options.dialect,
        });

        const filtered = state([...base, ...narrowing]);

        return {
            page,
            size,
            select: FilterSqlGenerator.toSQL(filtered),
            count: FilterSqlGenerator.toCountSQL(state(base)),
            countFiltered: narrowing.length > 0 ? FilterSqlGenerator.toCountSQL(filtered) : undefined,
        };
    }

    async run(query: ListingQuery, params: ListingParams = {}): Promise<ListingResult> {
        const plan = this.build(query, params);

        const count = await this.count(plan.count);
        const count_filtered = plan.countFiltered ? await this.count(plan.countFiltered) : count;
        const result = await this.adapter.query<Record<string, unknown>>(plan.select.query, plan.select.params);

        logger.debug('Listing executed', {
            table: query.table,
            page: plan.page,
            size: plan.size,
            count,
            count_filtered,
            returned: result.rows.length,
        });

        return {
            count,
            count_filtered,
            rows: result.rows.map(row => this.projectRow(query, row)),
        };
    }

    private async count(statement: SqlStatement): Promise<number> {
        const result = await this.adapter.query<{ count: unknown }>(statement.query, statement.params);
        return Number(result.rows[0]?.count ?? 0);
    }

    private resolveSize(size: ListingParams['size']): number {
        const { defaultPageSize, maxPageSize } = this.options;

        if (size === 'all') {
            return maxPageSize;
        }
        if (size === undefined || size === '') {
            return defaultPageSize;
        }

        const parsed = Number(size);
        if (!Number.isInteger(parsed) || parsed <= 0) {
            logger.debug('Invalid page size ignored', { size });
            return defaultPageSize;
        }

        return Math.min(parsed, maxPageSize);
    }

    private resolvePage(page: ListingParams['page'], size: number): number {
        if (page === undefined || page === '') {
            return 0;
        }

        // The offset must stay an exact integer the store can parse
        const parsed = Number(page);
        if (!Number.isInteger(parsed) || parsed < 0 || !Number.isSafeInteger(parsed * size)) {
            logger.debug('Invalid page ignored', { page });
            return 0;
        }

        return parsed;
    }

    private column(query: ListingQuery, column: string): ColumnRef {
        return { table: query.table, column };
    }

    private buildSelect(query: ListingQuery): ColumnRef[] {
        const names = query.listable.includes(query.primaryKey) ? query.listable : [query.primaryKey, ...query.listable];
        return names.map(name => this.column(query, name));
    }

    private buildOrder(query: ListingQuery, sorts: Record<string, string>): FilterOrderInfo[] {
        const order: FilterOrderInfo[] = [];

        for (const [rawName, rawDirection] of Object.entries(sorts)) {
            const name = rawName.trim();
            const direction = String(rawDirection).trim().toLowerCase();

            if (name === '' || !query.sortable.includes(name)) {
                logger.debug('Sort field rejected', { table: query.table, field: rawName });
                continue;
            }
            if (direction !== 'asc' && direction !== 'desc') {
                logger.debug('Sort direction rejected', { table: query.table, field: name, direction: rawDirection });
                continue;
            }

            order.push({ column: this.column(query, name), sort: direction });
        }

        if (order.length === 0 && query.defaultSort) {
            for (const [name, sort] of Object.entries(query.defaultSort)) {
                order.push({ column: this.column(query, name), sort });
            }
        }

        if (!order.some(info => info.column.column === query.primaryKey)) {
            order.push({ column: this.column(query, query.primaryKey), sort: 'asc' });
        }

        return order;
    }

    private buildFilters(query: ListingQuery, filters: Record<string, unknown>): WhereCondition[] {
        const conditions: WhereCondition[] = [];

        for (const [rawName, value] of Object.entries(filters)) {
            const name = rawName.trim();
            const field = query.fields[name];

            if (name === '' || !field || !query.filterable.includes(name)) {
                logger.debug('Filter field rejected', { table: query.table, field: rawName });
                continue;
            }
            if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
                logger.debug('Filter value rejected', { table: query.table, field: name });
                continue;
            }
            if (String(value).trim() === '') {
                continue;
            }

            const condition = this.filterCondition(query, name, field, value);
            if (condition) {
                conditions.push(condition);
            } else {
                logger.debug('Filter value does not match field type', { table: query.table, field: name, type: field.type });
            }
        }

        return conditions;
    }

    private filterCondition(
        query: ListingQuery,
        name: string,
        field: FieldDefinition,
        value: string | number | boolean
    ): WhereCondition | undefined {
        const column = this.column(query, name);
        const text = String(value).trim();

        switch (field.type) {
            case 'string':
            case 'text':
            case 'textarea':
            case 'email':
            case 'password':
            case 'phone':
            case 'url':
            case 'zip':
            case 'multiselect':
                return { op: FilterOp.LIKE, column, pattern: `%${escapeLike(text)}%` };

            case 'integer':
            case 'float':
            case 'decimal':
            case 'boolean': {
                const cast = castValue(field.type, value);
                if (cast === null || (field.type === 'integer' && !Number.isInteger(Number(text)))) {
                    return undefined;
                }
                return { op: FilterOp.EQ, column, value: cast };
            }

            case 'date':
            case 'datetime':
                return { op: FilterOp.LIKE, column, pattern: `${escapeLike(text)}%`, castText: true };

            case 'json':
                return { op: FilterOp.LIKE, column, pattern: `%${escapeLike(text)}%`, castText: true };

            // Lookup keys may be numeric or textual; compare as text so any value binds
            case 'smartlookup':
                return { op: FilterOp.EQ, column, value: text, castText: true };

            default:
                return assertNever(field.type);
        }
    }

    private buildSearch(query: ListingQuery, search: string | undefined): WhereCondition[] {
        const term = search?.trim() ?? '';
        if (term === '') {
            return [];
        }

        const pattern = `%${escapeLike(term)}%`;
        const conditions: WhereCondition[] = [];

        for (const name of query.filterable) {
            const field = query.fields[name];
            if (!field) {
                continue;
            }
            conditions.push({
                op: FilterOp.LIKE,
                column: this.column(query, name),
                pattern,
                castText: !isTextualType(field.type),
            });
        }

        if (conditions.length === 0) {
            logger.debug('Search ignored, no filterable fields', { table: query.table });
            return [];
        }

        return [{ op: FilterOp.OR, conditions }];
    }

    private projectRow(query: ListingQuery, row: Record<string, unknown>): Record<string, unknown> {
        const projected: Record<string, unknown> = {};

        for (const name of [query.primaryKey, ...query.listable]) {
            if (!(name in row) || name in projected) {
                continue;
            }
            const field = query.fields[name];
            projected[name] = field ? castValue(field.type, row[name]) : row[name];
        }

        return projected;
    }
}

const BRACKETED = /^(sorts|filters)\[([^\]]*)\]$/;

/**
 * Convert a flat HTTP query (`sorts[name]=asc`, `filters[name]=x`, `search`,
 * `page`, `size`) into ListingParams
 */
export function parseListingQuery(query: Record<string, string | undefined>): ListingParams {
    const params: ListingParams = { sorts: {}, filters: {} };

    for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
            continue;
        }

        const match = BRACKETED.exec(key);
        if (match) {
            const [, group, name] = match;
            if (group === 'sorts') {
                params.sorts = { ...params.sorts, [name]: value };
            } else {
                params.filters = { ...params.filters, [name]: value };
            }
            continue;
        }

        switch (key) {
            case 'page':
                params.page = value;
                break;
            case 'size':
                params.size = value;
                break;
            case 'search':
                params.search = value;
                break;
        }
    }

    return params;
}
