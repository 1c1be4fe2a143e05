import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { HttpErrors, isHttpError } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import { isRecord } from '@src/lib/schema/schema-types.js';
import type { CrudService } from '@src/lib/crud-service.js';
import type { PermissionChecker } from '@src/lib/schema/schema-actions.js';

/**
 * API Request/Response Helpers
 *
 * Route handler wrapper, request body parsing and the JSON envelopes shared by
 * every endpoint.
 */

// ===========================
// Response Types & Interfaces
// ===========================

export interface ApiSuccessResponse<T> {
    success: true;
    data: T;
}

export interface ApiErrorResponse {
    success: false;
    error: string;
    error_code: string;
    data?: Record<string, unknown>;
}

export enum ApiErrorCode {
    NOT_FOUND = 'NOT_FOUND',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
    JSON_PARSE_ERROR = 'JSON_PARSE_ERROR',
    INVALID_BODY = 'INVALID_BODY',
    MISSING_PARAMETER = 'MISSING_PARAMETER',
}

/**
 * Hono environment shared by the app and every route
 */
export interface AppEnv {
    Variables: {
        crudService: CrudService;
        permissionChecker: PermissionChecker | undefined;
    };
}

export type AppContext = Context<AppEnv>;

const ROUTE_PARAMS = ['model', 'id', 'relation', 'scope'] as const;

export type RouteParamName = (typeof ROUTE_PARAMS)[number];

// Route parameter interface for withService() helper
export interface RouteParams {
    service: CrudService;
    params: Partial<Record<RouteParamName, string>>; // Dynamic route params (:model, :id, etc)
    query: Record<string, string>; // Query string params (?foo=bar)
    body: Record<string, unknown>; // Parsed JSON body, empty for GET
    permissionChecker?: PermissionChecker;
}

// Route handler type - pure function that returns result
type RouteHandler<T> = (params: RouteParams) => Promise<T>;

/**
 * Service wrapper that provides a clean route handler interface
 *
 * Routes receive { service, params, query, body } and return their result,
 * which is wrapped in the success envelope. Errors propagate to the app's
 * onError handler.
 */
export function withService<T>(handler: RouteHandler<T>, successStatus: ContentfulStatusCode = 200) {
    return async (context: AppContext) => {
        const result = await handler({
            service: context.get('crudService'),
            params: routeParams(context),
            query: context.req.query(),
            body: await parseBody(context),
            permissionChecker: context.get('permissionChecker'),
        });

        return createSuccessResponse(context, result, successStatus);
    };
}

/**
 * Route parameter that the matched path guarantees
 */
export function requireParam(params: RouteParams['params'], name: RouteParamName): string {
    const value = params[name];
    if (value === undefined || value === '') {
        throw HttpErrors.badRequest(`Missing route parameter '${name}'`, ApiErrorCode.MISSING_PARAMETER, { name });
    }
    return value;
}

/**
 * Schema namespace selected by the `namespace` query parameter
 */
export function queryNamespace(query: RouteParams['query']): string | undefined {
    return query.namespace || undefined;
}

function routeParams(context: AppContext): RouteParams['params'] {
    const params: RouteParams['params'] = {};

    for (const name of ROUTE_PARAMS) {
        const value = context.req.param(name);
        if (value !== undefined) {
            params[name] = value;
        }
    }

    return params;
}

async function parseBody(context: AppContext): Promise<Record<string, unknown>> {
    if (context.req.method !== 'POST' && context.req.method !== 'PUT') {
        return {};
    }

    let body: unknown;
    try {
        body = await context.req.json();
    } catch (error) {
        throw HttpErrors.badRequest(
            `Invalid JSON body: ${error instanceof Error ? error.message : String(error)}`,
            ApiErrorCode.JSON_PARSE_ERROR
        );
    }

    if (!isRecord(body)) {
        throw HttpErrors.badRequest('Request body must be a JSON object', ApiErrorCode.INVALID_BODY);
    }

    return body;
}

// ===========================
// Response Helpers
// ===========================

export function createSuccessResponse<T>(c: Context, data: T, status: ContentfulStatusCode = 200) {
    const response: ApiSuccessResponse<T> = { success: true, data };
    return c.json(response, status);
}

export function createErrorResponse(
    c: Context,
    error: string,
    errorCode: string,
    status: ContentfulStatusCode = 400,
    data?: Record<string, unknown>
) {
    const response: ApiErrorResponse = {
        success: false,
        error,
        error_code: errorCode,
        ...(data && { data }),
    };
    return c.json(response, status);
}

export function createNotFoundError(c: Context) {
    return createErrorResponse(c, 'Not found', ApiErrorCode.NOT_FOUND, 404);
}

export function createInternalError(c: Context, error: unknown) {
    // Handle HttpError instances with proper status codes
    if (isHttpError(error)) {
        if (error.statusCode >= 500) {
            logger.error('Request failed', { path: c.req.path, error: error.message, code: error.errorCode });
        } else {
            logger.debug('Request rejected', { path: c.req.path, error: error.message, code: error.errorCode });
        }
        return c.json(error.toJSON(), error.statusCode);
    }

    logger.error('Unhandled error', {
        path: c.req.path,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });

    const data =
        process.env.NODE_ENV === 'development' && error instanceof Error ? { name: error.name, stack: error.stack } : undefined;

    return createErrorResponse(c, 'Internal server error', ApiErrorCode.INTERNAL_ERROR, 500, data);
}
