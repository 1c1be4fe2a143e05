import { quoteColumn } from '@src/lib/filter-where.js';
import type { FilterOrderInfo } from '@src/lib/filter-types.js';

/**
 * FilterOrder - ORDER BY clause generation
 *
 * Quick Example:
 * - `FilterOrder.generate([{ column: { table: 'users', column: 'name' }, sort: 'desc' }])`
 *   → `ORDER BY "users"."name" DESC`
 */
export class FilterOrder {
    static generate(order: readonly FilterOrderInfo[]): string {
        if (order.length === 0) {
            return '';
        }

        const terms = order.map(info => `${quoteColumn(info.column)} ${info.sort === 'desc' ? 'DESC' : 'ASC'}`);
        return `ORDER BY ${terms.join(', ')}`;
    }
}
