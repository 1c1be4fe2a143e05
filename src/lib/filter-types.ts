/**
 * Shared types and enums for the Filter system
 *
 * Used by FilterWhere, FilterOrder and FilterSqlGenerator. Every identifier in
 * these structures comes from a validated schema document; request values only
 * ever appear as bound parameters.
 */

import type { DatabaseType } from '@src/lib/database/adapter.js';
import type { SortDirection } from '@src/lib/schema/schema-types.js';

export type { SortDirection };

export enum FilterOp {
    EQ = '$eq', // "t"."c" = $1 (CAST("t"."c" AS TEXT) = $1 with castText)
    LIKE = '$like', // "t"."c" LIKE $1 ESCAPE '\' (ILIKE on PostgreSQL)
    NULL = '$null', // "t"."c" IS NULL
    IN = '$in', // "t"."c" IN (SELECT ...)
    OR = '$or', // (a OR b OR c)
}

/**
 * Table-qualified column reference
 */
export interface ColumnRef {
    table: string;
    column: string;
}

export interface JoinSpec {
    table: string;
    /** INNER JOIN "table" ON on[0] = on[1] */
    on: [ColumnRef, ColumnRef];
}

export interface SubquerySpec {
    select: ColumnRef;
    from: string;
    joins: JoinSpec[];
    where: WhereCondition[];
}

export type WhereCondition =
    | { op: FilterOp.EQ; column: ColumnRef; value: unknown; castText?: boolean }
    | { op: FilterOp.LIKE; column: ColumnRef; pattern: string; castText?: boolean }
    | { op: FilterOp.NULL; column: ColumnRef }
    | { op: FilterOp.IN; column: ColumnRef; subquery: SubquerySpec }
    | { op: FilterOp.OR; conditions: WhereCondition[] };

export interface FilterOrderInfo {
    column: ColumnRef;
    sort: SortDirection;
}

export interface FilterWhereOptions {
    /** Selects LIKE (sqlite) or ILIKE (postgresql) */
    adapterType?: DatabaseType;
    /** Offset for placeholder numbering ($n+1 is the first) */
    startingParamIndex?: number;
}

/**
 * Everything FilterSqlGenerator needs to build a SELECT / COUNT pair
 */
export interface FilterState {
    tableName: string;
    select: ColumnRef[];
    joins: JoinSpec[];
    where: WhereCondition[];
    order: FilterOrderInfo[];
    limit?: number;
    offset?: number;
    adapterType: DatabaseType;
}
