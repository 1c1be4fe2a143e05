import { HttpErrors } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import { FilterOp, type JoinSpec, type WhereCondition } from '@src/lib/filter-types.js';
import type {
    DetailDefinition,
    RelationshipDefinition,
    SchemaDocument,
    ThroughRelationship,
} from '@src/lib/schema/schema-types.js';

/**
 * Loads a normalized schema by model name (usually CrudService.getSchema)
 */
export type SchemaProvider = (model: string) => Promise<SchemaDocument>;

/**
 * One link between two models: rows of `table` where `foreignKey` holds the
 * source id and `relatedKey` holds the next model's id.
 */
export interface RelationHop {
    table: string;
    foreignKey: string;
    relatedKey: string;
}

interface PlanBase {
    relation: string;
    target: SchemaDocument;
    listFields?: string[];
}

/** target.foreign_key = parent id */
export interface DirectPlan extends PlanBase {
    kind: 'direct';
    foreignKey: string;
}

/** target joined through one pivot table */
export interface PivotPlan extends PlanBase {
    kind: 'pivot';
    hop: RelationHop;
}

/** target.pk IN (subquery walking every hop) */
export interface ChainPlan extends PlanBase {
    kind: 'chain';
    hops: RelationHop[];
}

export type RelationPlan = DirectPlan | PivotPlan | ChainPlan;

export interface RelationScope {
    joins: JoinSpec[];
    where: WhereCondition[];
}

/**
 * RelationshipResolver - turns a detail / relationship name into a query plan
 *
 * Resolution order for `resolve(users, 'permissions')`:
 * 1. A detail entry for the model with a `foreign_key` is a direct plan
 * 2. Otherwise the relationship entry with that name decides:
 *    has_many → direct, many_to_many → pivot, belongs_to_many_through → chain
 * 3. Neither → MISSING_RELATIONSHIP_CONFIG
 *
 * Through-chains are expanded recursively and bounded by `maxHops`.
 */
export class RelationshipResolver {
    constructor(
        private readonly schemaProvider: SchemaProvider,
        private readonly maxHops: number = 2
    ) {}

    async resolve(schema: SchemaDocument, relationName: string): Promise<RelationPlan> {
        const detail = findDetail(schema, relationName);
        const listFields = detail?.list_fields;

        if (detail?.foreign_key) {
            const target = await this.schemaProvider(detail.model);
            logger.debug('Relation resolved', { model: schema.model, relation: relationName, kind: 'direct' });
            return { kind: 'direct', relation: relationName, target, foreignKey: detail.foreign_key, listFields };
        }

        const relationship = schema.relationships.find(entry => entry.name === relationName);
        if (!relationship) {
            throw HttpErrors.missingRelationshipConfig(
                schema.model,
                relationName,
                'detail has no foreign_key and no relationship entry'
            );
        }

        const target = await this.schemaProvider(targetModel(relationship));
        logger.debug('Relation resolved', { model: schema.model, relation: relationName, kind: relationship.type });

        switch (relationship.type) {
            case 'has_many':
                return { kind: 'direct', relation: relationName, target, foreignKey: relationship.foreign_key, listFields };

            case 'many_to_many':
                return { kind: 'pivot', relation: relationName, target, hop: pivotHop(relationship), listFields };

            case 'belongs_to_many_through': {
                const hops = await this.throughHops(schema, relationship, 1);
                if (hops.length > this.maxHops) {
                    throw depthExceeded(schema.model, relationName, this.maxHops);
                }
                return { kind: 'chain', relation: relationName, target, hops, listFields };
            }
        }
    }

    /**
     * Hops for any relationship kind, `owner` being the model that declares it
     */
    private async hopsFor(owner: SchemaDocument, relationship: RelationshipDefinition, depth: number): Promise<RelationHop[]> {
        switch (relationship.type) {
            case 'has_many': {
                const child = await this.schemaProvider(targetModel(relationship));
                return [{ table: child.table, foreignKey: relationship.foreign_key, relatedKey: child.primary_key }];
            }
            case 'many_to_many':
                return [pivotHop(relationship)];
            case 'belongs_to_many_through':
                return this.throughHops(owner, relationship, depth + 1);
        }
    }

    /**
     * First leg: explicit first_* keys or the owner's relationship named by
     * `through`. Second leg: explicit second_* keys or the intermediate
     * model's relationship to the target.
     */
    private async throughHops(owner: SchemaDocument, relationship: ThroughRelationship, depth: number): Promise<RelationHop[]> {
        if (depth > this.maxHops) {
            throw depthExceeded(owner.model, relationship.name, this.maxHops);
        }

        let intermediate = relationship.through;
        let first: RelationHop[];

        if (relationship.first_pivot_table && relationship.first_foreign_key && relationship.first_related_key) {
            first = [
                {
                    table: relationship.first_pivot_table,
                    foreignKey: relationship.first_foreign_key,
                    relatedKey: relationship.first_related_key,
                },
            ];
        } else {
            const via = owner.relationships.find(entry => entry.name === relationship.through);
            if (!via || via === relationship) {
                throw HttpErrors.missingRelationshipConfig(
                    owner.model,
                    relationship.name,
                    `no relationship named '${relationship.through}' to walk through`
                );
            }
            first = await this.hopsFor(owner, via, depth);
            intermediate = targetModel(via);
        }

        let second: RelationHop[];

        if (relationship.second_pivot_table && relationship.second_foreign_key && relationship.second_related_key) {
            second = [
                {
                    table: relationship.second_pivot_table,
                    foreignKey: relationship.second_foreign_key,
                    relatedKey: relationship.second_related_key,
                },
            ];
        } else {
            const target = targetModel(relationship);
            const middle = await this.schemaProvider(intermediate);
            const onward = middle.relationships.find(entry => targetModel(entry) === target);
            if (!onward) {
                throw HttpErrors.missingRelationshipConfig(
                    owner.model,
                    relationship.name,
                    `model '${intermediate}' declares no relationship to '${target}'`
                );
            }
            second = await this.hopsFor(middle, onward, depth);
        }

        return [...first, ...second];
    }

    /**
     * SQL fragments restricting the target table to rows related to `parentId`
     */
    toScope(plan: RelationPlan, parentId: unknown): RelationScope {
        const target = plan.target;

        switch (plan.kind) {
            case 'direct':
                return {
                    joins: [],
                    where: [{ op: FilterOp.EQ, column: { table: target.table, column: plan.foreignKey }, value: parentId }],
                };

            case 'pivot':
                return {
                    joins: [
                        {
                            table: plan.hop.table,
                            on: [
                                { table: plan.hop.table, column: plan.hop.relatedKey },
                                { table: target.table, column: target.primary_key },
                            ],
                        },
                    ],
                    where: [{ op: FilterOp.EQ, column: { table: plan.hop.table, column: plan.hop.foreignKey }, value: parentId }],
                };

            case 'chain':
                return { joins: [], where: [chainCondition(plan, parentId)] };
        }
    }
}

function findDetail(schema: SchemaDocument, relationName: string): DetailDefinition | undefined {
    if (schema.detail?.model === relationName) {
        return schema.detail;
    }
    return schema.details.find(detail => detail.model === relationName);
}

/** Model a relationship points at; `model` overrides the relationship name */
export function targetModel(relationship: RelationshipDefinition): string {
    return relationship.model ?? relationship.name;
}

function pivotHop(relationship: { pivot_table: string; foreign_key: string; related_key: string }): RelationHop {
    return { table: relationship.pivot_table, foreignKey: relationship.foreign_key, relatedKey: relationship.related_key };
}

function depthExceeded(model: string, relation: string, maxHops: number) {
    return HttpErrors.unprocessableEntity(
        `Relationship '${relation}' on model '${model}' exceeds ${maxHops} hops`,
        'RELATIONSHIP_DEPTH_EXCEEDED',
        { model, relation, max_hops: maxHops }
    );
}

/**
 * target.pk IN (SELECT last.related FROM last JOIN ... JOIN first WHERE first.foreign = $n)
 */
function chainCondition(plan: ChainPlan, parentId: unknown): WhereCondition {
    const hops = plan.hops;
    const first = hops[0];
    const last = hops[hops.length - 1];
    const joins: JoinSpec[] = [];

    for (let i = hops.length - 2; i >= 0; i--) {
        joins.push({
            table: hops[i].table,
            on: [
                { table: hops[i].table, column: hops[i].relatedKey },
                { table: hops[i + 1].table, column: hops[i + 1].foreignKey },
            ],
        });
    }

    return {
        op: FilterOp.IN,
        column: { table: plan.target.table, column: plan.target.primary_key },
        subquery: {
            select: { table: last.table, column: last.relatedKey },
            from: last.table,
            joins,
            where: [{ op: FilterOp.EQ, column: { table: first.table, column: first.foreignKey }, value: parentId }],
        },
    };
}
