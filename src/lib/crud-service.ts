import { HttpErrors } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import { CrudEnv, type CrudSettings } from '@src/lib/crud-env.js';
import { CrudModel } from '@src/lib/crud-model.js';
import { Listing, type ListingParams, type ListingResult } from '@src/lib/listing.js';
import { RelationshipResolver } from '@src/lib/relationship-resolver.js';
import { runTransaction, runWithAdapter } from '@src/lib/transaction.js';
import type { AdapterFactory, DatabaseAdapter } from '@src/lib/database/adapter.js';
import type { CacheBackend } from '@src/lib/schema/cache-backend.js';
import { SchemaActionManager, type PermissionChecker } from '@src/lib/schema/schema-actions.js';
import { SchemaCache } from '@src/lib/schema/schema-cache.js';
import { SchemaFilter, type SchemaView } from '@src/lib/schema/schema-filter.js';
import { SchemaLoader, type SchemaSource } from '@src/lib/schema/schema-loader.js';
import { SchemaNormalizer } from '@src/lib/schema/schema-normalizer.js';
import { SchemaValidator } from '@src/lib/schema/schema-validator.js';
import type { ActionDefinition, SchemaDocument } from '@src/lib/schema/schema-types.js';

export interface CrudServiceOptions {
    source: SchemaSource;
    adapterFactory: AdapterFactory;
    settings?: CrudSettings;
    cacheBackend?: CacheBackend;
}

export type CrudRecord = Record<string, unknown>;

/**
 * CrudService - composition root of the schema-driven CRUD engine
 *
 * Schema pipeline: loader → validator → normalizer → action manager → cache.
 * Record operations open one adapter per call; writes run in one transaction.
 * Every operation takes an optional schema namespace, also used for the
 * schemas of related models.
 */
export class CrudService {
    readonly settings: CrudSettings;

    private readonly loader: SchemaLoader;
    private readonly validator = new SchemaValidator();
    private readonly normalizer = new SchemaNormalizer();
    private readonly actions = new SchemaActionManager();
    private readonly filter = new SchemaFilter(this.actions);
    private readonly cache: SchemaCache;
    private readonly adapterFactory: AdapterFactory;

    constructor(options: CrudServiceOptions) {
        this.settings = options.settings ?? CrudEnv.defaults();
        this.loader = new SchemaLoader(options.source);
        this.adapterFactory = options.adapterFactory;
        this.cache = new SchemaCache({
            enabled: this.settings.cacheEnabled,
            ttlSeconds: this.settings.cacheTtl,
            backend: options.cacheBackend,
        });
    }

    /**
     * Validated, normalized schema with default and toggle actions applied
     *
     * @throws HttpError SCHEMA_NOT_FOUND, INVALID_SCHEMA
     */
    async getSchema(model: string, namespace?: string): Promise<SchemaDocument> {
        return this.cache.getOrLoad(model, namespace, async () => {
            const document = await this.loader.load(model, namespace);
            const raw = this.validator.validate(document, model);
            return this.actions.prepare(this.normalizer.normalize(raw));
        });
    }

    /**
     * Schema projected to one or more contexts ("list,form"); empty or "full"
     * returns the whole document
     */
    async getContextSchema(
        model: string,
        contexts: string | readonly string[] | undefined,
        namespace?: string
    ): Promise<SchemaDocument | SchemaView> {
        return this.filter.filter(await this.getSchema(model, namespace), contexts);
    }

    async getActionsForScope(
        model: string,
        scope: string,
        hasPermission?: PermissionChecker,
        namespace?: string
    ): Promise<ActionDefinition[]> {
        const schema = await this.getSchema(model, namespace);
        const scoped = this.actions.filterByScope(schema.actions, scope);
        return hasPermission ? this.actions.filterByPermission(scoped, hasPermission) : scoped;
    }

    async listRecords(model: string, params: ListingParams = {}, namespace?: string): Promise<ListingResult> {
        const schema = await this.getSchema(model, namespace);

        return runWithAdapter(this.adapterFactory, adapter => this.listing(adapter).run(Listing.fromSchema(schema), params));
    }

    /**
     * Listing of `relationName` rows related to one parent record
     *
     * @throws HttpError RECORD_NOT_FOUND when the parent is missing
     * @throws HttpError MISSING_RELATIONSHIP_CONFIG when the relation is undeclared
     */
    async listRelatedRecords(
        model: string,
        recordId: string | number,
        relationName: string,
        params: ListingParams = {},
        namespace?: string
    ): Promise<ListingResult> {
        const schema = await this.getSchema(model, namespace);
        const resolver = new RelationshipResolver(related => this.getSchema(related, namespace), this.settings.relationMaxHops);

        return runWithAdapter(this.adapterFactory, async adapter => {
            const parent = CrudModel.fromSchema(schema, { dialect: adapter.getType() });
            await this.requireRecord(adapter, parent, recordId);

            const plan = await resolver.resolve(schema, relationName);
            const query = Listing.fromSchema(plan.target, resolver.toScope(plan, parent.castId(recordId)), plan.listFields);

            logger.debug('Listing related records', { model, relation: relationName, kind: plan.kind });
            return this.listing(adapter).run(query, params);
        });
    }

    /**
     * Detail-viewable projection of one record
     */
    async getRecord(model: string, id: string | number, namespace?: string): Promise<CrudRecord> {
        const schema = await this.getSchema(model, namespace);

        return runWithAdapter(this.adapterFactory, async adapter => {
            const crud = CrudModel.fromSchema(schema, { dialect: adapter.getType() });
            const row = await this.requireRecord(adapter, crud, id);
            return crud.castRow(row, crud.detailFields());
        });
    }

    async createRecord(model: string, values: CrudRecord, namespace?: string): Promise<CrudRecord> {
        const schema = await this.getSchema(model, namespace);

        return runTransaction(
            this.adapterFactory,
            async adapter => {
                const crud = CrudModel.fromSchema(schema, { dialect: adapter.getType() });
                const statement = crud.toInsert(values);
                const result = await adapter.query<CrudRecord>(statement.query, statement.params);
                const row = result.rows[0];

                if (!row) {
                    throw HttpErrors.internal(`Insert into '${model}' returned no row`, 'DATABASE_ERROR');
                }

                logger.info('Record created', { model, id: row[crud.primaryKey] });
                return crud.castRow(row, crud.detailFields());
            },
            { logContext: { model, operation: 'create' } }
        );
    }

    async updateRecord(model: string, id: string | number, values: CrudRecord, namespace?: string): Promise<CrudRecord> {
        const schema = await this.getSchema(model, namespace);

        return runTransaction(
            this.adapterFactory,
            async adapter => {
                const crud = CrudModel.fromSchema(schema, { dialect: adapter.getType() });
                const statement = crud.toUpdate(id, values);
                const result = await adapter.query<CrudRecord>(statement.query, statement.params);
                const row = result.rows[0];

                if (!row) {
                    throw HttpErrors.recordNotFound(model, id);
                }

                logger.info('Record updated', { model, id });
                return crud.castRow(row, crud.detailFields());
            },
            { logContext: { model, operation: 'update' } }
        );
    }

    /**
     * Invalidate one model, or every cached schema when no model is given
     */
    async clearCache(model?: string, namespace?: string): Promise<void> {
        if (model === undefined) {
            this.cache.clear();
            return;
        }

        await this.cache.invalidate(model, namespace);
    }

    private listing(adapter: DatabaseAdapter): Listing {
        return new Listing(adapter, {
            dialect: adapter.getType(),
            defaultPageSize: this.settings.defaultPageSize,
            maxPageSize: this.settings.maxPageSize,
        });
    }

    private async requireRecord(adapter: DatabaseAdapter, crud: CrudModel, id: string | number): Promise<CrudRecord> {
        const statement = crud.selectOne(id);
        const result = await adapter.query<CrudRecord>(statement.query, statement.params);
        const row = result.rows[0];

        if (!row) {
            throw HttpErrors.recordNotFound(crud.schema.model, id);
        }

        return row;
    }
}
