import { HttpErrors } from '@src/lib/errors/http-error.js';
import { IDENTIFIER_PATTERN, assertNever } from '@src/lib/schema/schema-types.js';
import { FilterOp, type ColumnRef, type JoinSpec, type FilterWhereOptions, type SubquerySpec, type WhereCondition } from '@src/lib/filter-types.js';

/**
 * Quote a schema identifier. Identifiers are validated when the schema is
 * loaded; anything else reaching this point is a programming error.
 */
export function quoteIdentifier(name: string): string {
    if (!IDENTIFIER_PATTERN.test(name)) {
        throw HttpErrors.badRequest(`Invalid identifier format: ${name}`, 'FILTER_INVALID_FIELD_FORMAT');
    }
    return `"${name}"`;
}

export function quoteColumn(ref: ColumnRef): string {
    return `${quoteIdentifier(ref.table)}.${quoteIdentifier(ref.column)}`;
}

export function renderJoin(join: JoinSpec): string {
    return `INNER JOIN ${quoteIdentifier(join.table)} ON ${quoteColumn(join.on[0])} = ${quoteColumn(join.on[1])}`;
}

/**
 * Escape LIKE wildcards so user input only ever matches literally
 */
export function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, match => `\\${match}`);
}

/**
 * FilterWhere - WHERE clause generation from structured conditions
 *
 * Conditions are joined with AND. Parameters are numbered in order of
 * appearance, starting after `startingParamIndex`, which keeps the positional
 * rewrite done by the SQLite adapter aligned.
 *
 * Quick Examples:
 * - `FilterWhere.generate([{ op: FilterOp.EQ, column: { table: 'users', column: 'id' }, value: 3 }])`
 *   → `"users"."id" = $1`
 * - Offset: `FilterWhere.generate(conditions, { startingParamIndex: 2 })` → uses $3, $4, etc.
 */
export class FilterWhere {
    private _paramValues: unknown[] = [];
    private _paramIndex: number;
    private readonly likeOperator: string;

    constructor(options: FilterWhereOptions = {}) {
        this._paramIndex = options.startingParamIndex ?? 0;
        this.likeOperator = options.adapterType === 'postgresql' ? 'ILIKE' : 'LIKE';
    }

    static generate(conditions: readonly WhereCondition[], options: FilterWhereOptions = {}): { whereClause: string; params: unknown[] } {
        const filterWhere = new FilterWhere(options);
        const whereClause = filterWhere.build(conditions);
        return { whereClause, params: filterWhere._paramValues };
    }

    /**
     * Add parameter to collection and return its placeholder
     */
    private PARAM(value: unknown): string {
        this._paramValues.push(value);
        return `$${++this._paramIndex}`;
    }

    private build(conditions: readonly WhereCondition[]): string {
        return conditions.map(condition => this.buildCondition(condition)).join(' AND ');
    }

    private buildCondition(condition: WhereCondition): string {
        switch (condition.op) {
            case FilterOp.EQ:
                if (condition.value === null || condition.value === undefined) {
                    return `${quoteColumn(condition.column)} IS NULL`;
                }
                if (condition.castText) {
                    return `CAST(${quoteColumn(condition.column)} AS TEXT) = ${this.PARAM(String(condition.value))}`;
                }
                return `${quoteColumn(condition.column)} = ${this.PARAM(condition.value)}`;

            case FilterOp.LIKE: {
                const column = condition.castText
                    ? `CAST(${quoteColumn(condition.column)} AS TEXT)`
                    : quoteColumn(condition.column);
                return `${column} ${this.likeOperator} ${this.PARAM(condition.pattern)} ESCAPE '\\'`;
            }

            case FilterOp.NULL:
                return `${quoteColumn(condition.column)} IS NULL`;

            case FilterOp.IN:
                return `${quoteColumn(condition.column)} IN (${this.buildSubquery(condition.subquery)})`;

            case FilterOp.OR: {
                if (condition.conditions.length === 0) {
                    return '1 = 0';
                }
                const parts = condition.conditions.map(child => this.buildCondition(child));
                return parts.length === 1 ? parts[0] : `(${parts.join(' OR ')})`;
            }

            default:
                return assertNever(condition);
        }
    }

    private buildSubquery(subquery: SubquerySpec): string {
        return [
            `SELECT ${quoteColumn(subquery.select)}`,
            `FROM ${quoteIdentifier(subquery.from)}`,
            ...subquery.joins.map(renderJoin),
            subquery.where.length > 0 ? `WHERE ${this.build(subquery.where)}` : '',
        ]
            .filter(Boolean)
            .join(' ');
    }
}
