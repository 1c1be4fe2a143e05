import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * HttpError - Structured error handling for the CRUD engine
 *
 * Business logic throws semantic errors (schema missing, schema invalid,
 * relation undeclared), the HTTP layer maps them to status codes and the
 * JSON error envelope.
 *
 * Error codes raised by the schema pipeline:
 * - 404 SCHEMA_NOT_FOUND: no document for the model (and namespace)
 * - 404 RECORD_NOT_FOUND: no row for the primary key
 * - 422 INVALID_SCHEMA: structural defect in a schema document
 * - 422 MISSING_RELATIONSHIP_CONFIG: a detail names a relation with no relationship entry
 * - 422 RELATIONSHIP_DEPTH_EXCEEDED: a through-chain is longer than the hop limit
 */
export class HttpError extends Error {
    public readonly name = 'HttpError';

    constructor(
        public readonly statusCode: ContentfulStatusCode,
        message: string,
        public readonly errorCode: string = 'INTERNAL_ERROR',
        public readonly details?: Record<string, unknown>
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, HttpError.prototype);
    }

    /**
     * Convert to JSON-serializable object for API responses
     */
    toJSON() {
        return {
            success: false as const,
            error: this.message,
            error_code: this.errorCode,
            ...(this.details && { data: this.details }),
        };
    }
}

/**
 * Factory methods for common error scenarios
 */
export class HttpErrors {
    static badRequest(message: string, errorCode = 'BAD_REQUEST', details?: Record<string, unknown>) {
        return new HttpError(400, message, errorCode, details);
    }

    static notFound(message = 'Not found', errorCode = 'NOT_FOUND', details?: Record<string, unknown>) {
        return new HttpError(404, message, errorCode, details);
    }

    static unprocessableEntity(message: string, errorCode = 'UNPROCESSABLE_ENTITY', details?: Record<string, unknown>) {
        return new HttpError(422, message, errorCode, details);
    }

    static internal(message = 'Internal server error', errorCode = 'INTERNAL_ERROR') {
        return new HttpError(500, message, errorCode);
    }

    static schemaNotFound(model: string, namespace?: string) {
        const where = namespace ? ` in namespace '${namespace}'` : '';
        return HttpErrors.notFound(`Schema not found for model '${model}'${where}`, 'SCHEMA_NOT_FOUND', {
            model,
            ...(namespace && { namespace }),
        });
    }

    static recordNotFound(model: string, id: string | number) {
        return HttpErrors.notFound(`Record '${id}' not found in model '${model}'`, 'RECORD_NOT_FOUND', { model, id });
    }

    /**
     * Structural defect in a schema document. `key` is the dotted path of the
     * offending attribute (`$` for the document itself).
     */
    static invalidSchema(model: string, key: string, message: string) {
        return HttpErrors.unprocessableEntity(`Invalid schema for model '${model}' at '${key}': ${message}`, 'INVALID_SCHEMA', {
            model,
            key,
        });
    }

    static missingRelationshipConfig(model: string, relation: string, reason?: string) {
        const suffix = reason ? `: ${reason}` : '';
        return HttpErrors.unprocessableEntity(
            `No relationship configuration for '${relation}' on model '${model}'${suffix}`,
            'MISSING_RELATIONSHIP_CONFIG',
            { model, relation }
        );
    }
}

/**
 * Type guard for HttpError instances
 */
export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}
