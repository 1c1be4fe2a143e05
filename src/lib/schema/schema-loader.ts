import { readFile } from 'fs/promises';
import { join } from 'path';
import { load as decodeYaml } from 'js-yaml';
import { HttpErrors } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import { IDENTIFIER_PATTERN, isRecord } from '@src/lib/schema/schema-types.js';

/**
 * A raw schema document as read from storage, before validation
 */
export interface LoadedDocument {
    document: unknown;
    /** Where the document came from (file path or memory key) */
    location: string;
}

/**
 * Storage backend for schema documents
 */
export interface SchemaSource {
    /**
     * Read the document for a model. Namespaced lookups try the namespace first
     * and fall back to the shared location. Resolves undefined when absent.
     */
    read(model: string, namespace?: string): Promise<LoadedDocument | undefined>;
}

const SCHEMA_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;

/**
 * Reads `<root>/<namespace>/<model>.<ext>` then `<root>/<model>.<ext>`.
 * JSON and YAML documents are both accepted.
 */
export class FileSchemaSource implements SchemaSource {
    constructor(private readonly root: string) {}

    async read(model: string, namespace?: string): Promise<LoadedDocument | undefined> {
        for (const path of this.candidates(model, namespace)) {
            const content = await this.readIfExists(path);
            if (content === undefined) {
                continue;
            }

            return { document: this.parse(model, path, content), location: path };
        }

        return undefined;
    }

    private candidates(model: string, namespace?: string): string[] {
        const dirs = namespace ? [join(this.root, namespace), this.root] : [this.root];
        return dirs.flatMap(dir => SCHEMA_EXTENSIONS.map(ext => join(dir, `${model}${ext}`)));
    }

    private async readIfExists(path: string): Promise<string | undefined> {
        try {
            return await readFile(path, 'utf-8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return undefined;
            }
            throw error;
        }
    }

    private parse(model: string, path: string, content: string): unknown {
        try {
            return path.endsWith('.json') ? JSON.parse(content) : decodeYaml(content);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw HttpErrors.invalidSchema(model, '$', `unable to parse ${path}: ${reason}`);
        }
    }
}

/**
 * In-process schema documents, keyed by model or `namespace/model`
 */
export class MemorySchemaSource implements SchemaSource {
    private readonly documents = new Map<string, unknown>();

    constructor(documents: Record<string, unknown> = {}) {
        for (const [key, document] of Object.entries(documents)) {
            this.documents.set(key, document);
        }
    }

    register(model: string, document: unknown, namespace?: string): this {
        this.documents.set(namespace ? `${namespace}/${model}` : model, document);
        return this;
    }

    async read(model: string, namespace?: string): Promise<LoadedDocument | undefined> {
        const keys = namespace ? [`${namespace}/${model}`, model] : [model];

        for (const key of keys) {
            if (this.documents.has(key)) {
                return { document: this.documents.get(key), location: `memory:${key}` };
            }
        }

        return undefined;
    }
}

/**
 * SchemaLoader - resolves a model name (and optional namespace) to a raw document
 */
export class SchemaLoader {
    constructor(private readonly source: SchemaSource) {}

    async load(model: string, namespace?: string): Promise<unknown> {
        if (!IDENTIFIER_PATTERN.test(model)) {
            throw HttpErrors.badRequest(`Invalid model name: ${model}`, 'INVALID_MODEL_NAME', { model });
        }

        if (namespace !== undefined && !IDENTIFIER_PATTERN.test(namespace)) {
            throw HttpErrors.badRequest(`Invalid schema namespace: ${namespace}`, 'INVALID_MODEL_NAME', { model, namespace });
        }

        const loaded = await this.source.read(model, namespace);
        if (!loaded) {
            throw HttpErrors.schemaNotFound(model, namespace);
        }

        logger.debug('Schema document loaded', { model, namespace, location: loaded.location });

        // Record which namespace served the document
        if (namespace && isRecord(loaded.document) && loaded.document.connection === undefined) {
            return { ...loaded.document, connection: namespace };
        }

        return loaded.document;
    }
}
