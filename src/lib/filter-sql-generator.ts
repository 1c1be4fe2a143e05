import { FilterWhere, quoteColumn, quoteIdentifier, renderJoin } from '@src/lib/filter-where.js';
import { FilterOrder } from '@src/lib/filter-order.js';
import { logger } from '@src/lib/logger.js';
import type { FilterState } from '@src/lib/filter-types.js';

/**
 * FilterSqlGenerator - SELECT and COUNT generation for a FilterState
 *
 * Pure functions: state in, SQL plus parameters out.
 */
export class FilterSqlGenerator {
    /**
     * SELECT with joins, WHERE, ORDER BY and LIMIT/OFFSET
     */
    static toSQL(state: FilterState): { query: string; params: unknown[] } {
        const { whereClause, params } = FilterWhere.generate(state.where, { adapterType: state.adapterType });

        const query = [
            `SELECT ${this.buildSelectClause(state)}`,
            `FROM ${quoteIdentifier(state.tableName)}`,
            ...state.joins.map(renderJoin),
            whereClause ? `WHERE ${whereClause}` : '',
            FilterOrder.generate(state.order),
            this.buildLimitClause(state.limit, state.offset),
        ]
            .filter(Boolean)
            .join(' ');

        logger.debug('SQL query generated', { tableName: state.tableName, paramCount: params.length });
        return { query, params };
    }

    /**
     * COUNT(*) over the same joins and WHERE conditions
     */
    static toCountSQL(state: FilterState): { query: string; params: unknown[] } {
        const { whereClause, params } = FilterWhere.generate(state.where, { adapterType: state.adapterType });

        const query = [
            `SELECT COUNT(*) AS count`,
            `FROM ${quoteIdentifier(state.tableName)}`,
            ...state.joins.map(renderJoin),
            whereClause ? `WHERE ${whereClause}` : '',
        ]
            .filter(Boolean)
            .join(' ');

        return { query, params };
    }

    private static buildSelectClause(state: FilterState): string {
        if (state.select.length === 0) {
            return `${quoteIdentifier(state.tableName)}.*`;
        }

        return state.select.map(ref => `${quoteColumn(ref)} AS ${quoteIdentifier(ref.column)}`).join(', ');
    }

    private static buildLimitClause(limit?: number, offset?: number): string {
        const parts: string[] = [];

        if (limit !== undefined) {
            parts.push(`LIMIT ${Math.max(0, Math.floor(limit))}`);
        }
        if (offset !== undefined && offset > 0) {
            parts.push(`OFFSET ${Math.floor(offset)}`);
        }

        return parts.join(' ');
    }
}
