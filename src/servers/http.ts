/**
 * HTTP Server
 *
 * Hono-based HTTP API for the schema-driven CRUD engine, served on Node.js by
 * @hono/node-server.
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';

import { createInternalError, createNotFoundError, type AppContext, type AppEnv } from '@src/lib/api-helpers.js';
import { logger } from '@src/lib/logger.js';
import type { CrudService } from '@src/lib/crud-service.js';
import type { PermissionChecker } from '@src/lib/schema/schema-actions.js';

// Route handlers
import * as crudRoutes from '@src/routes/api/crud/routes.js';

// Public endpoints
import HealthGet from '@src/routes/health/GET.js';

export interface HttpAppOptions {
    service: CrudService;
    /** Derives the caller's permission check from the request, when authorization is wired in */
    permissionChecker?: (context: AppContext) => PermissionChecker | undefined;
}

/**
 * Create and configure the Hono HTTP app
 */
export function createHttpApp(options: HttpAppOptions): Hono<AppEnv> {
    const app = new Hono<AppEnv>();

    // Request logging middleware
    app.use('*', async (c, next) => {
        const start = Date.now();

        await next();

        logger.info('Request completed', {
            method: c.req.method,
            path: c.req.path,
            status: c.res.status,
            duration: Date.now() - start,
        });
    });

    // Service injection
    app.use('/api/*', async (c, next) => {
        c.set('crudService', options.service);
        c.set('permissionChecker', options.permissionChecker?.(c));
        await next();
    });

    // Health check endpoint (public)
    app.get('/health', HealthGet);

    // Schema routes are registered before /:id so they win the match
    app.get('/api/crud/:model/schema', crudRoutes.SchemaGet);
    app.get('/api/crud/:model/actions/:scope', crudRoutes.ActionsGet);

    // Model routes
    app.get('/api/crud/:model', crudRoutes.ModelGet);
    app.post('/api/crud/:model', crudRoutes.ModelPost);

    // Record routes
    app.get('/api/crud/:model/:id', crudRoutes.RecordGet);
    app.put('/api/crud/:model/:id', crudRoutes.RecordPut);
    app.get('/api/crud/:model/:id/:relation', crudRoutes.RelationGet);

    // Error handling
    app.onError((err, c) => createInternalError(c, err));

    // 404 handler
    app.notFound(c => createNotFoundError(c));

    return app;
}

export interface HttpServerHandle {
    app: Hono<AppEnv>;
    server: ServerType;
    stop: () => Promise<void>;
}

/**
 * Start the HTTP server
 */
export function startHttpServer(port: number, options: HttpAppOptions): HttpServerHandle {
    const app = createHttpApp(options);

    const server = serve({ fetch: app.fetch, port }, info => {
        logger.info('HTTP server running', { port: info.port, url: `http://localhost:${info.port}` });
    });

    return {
        app,
        server,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                server.close(error => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    logger.info('HTTP server stopped');
                    resolve();
                });
            }),
    };
}
