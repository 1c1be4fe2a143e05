import type { Context } from 'hono';
import { createSuccessResponse } from '@src/lib/api-helpers.js';

/**
 * GET /health - Health check endpoint
 *
 * Reports process liveness for monitoring and load balancers. Does not touch
 * the database.
 */
export default function (context: Context) {
    return createSuccessResponse(context, {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
    });
}
