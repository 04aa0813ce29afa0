import fastify from 'fastify';
import cors from '@fastify/cors';
import type { FastifyError, FastifyInstance } from 'fastify';

import { createLogger } from '../utils/Logger.ts';
import { isPipelineError } from '../model/Errors.ts';
import { registerControlsRoute } from './routes/controls.ts';
import { registerDashboardRoute } from './routes/dashboard.ts';
import { registerExportRoute } from './routes/export.ts';

import type { PipelineErrorKind } from '../model/Errors.ts';
import type { DashboardService } from '../dashboard/DashboardService.ts';

const logger = createLogger('API');

const STATUS_BY_KIND: Record<PipelineErrorKind, number> = {
    InvalidQuery: 400,
    NoDataInRange: 404,
    DataUnavailable: 503,
};

/**
 * Dashboard backend API
 *
 * Endpoints:
 *   GET /api/controls   — Locations, date span, metric options
 *   GET /api/dashboard  — Cards, series and weekly changes for one location
 *   GET /api/export     — Filtered rows as CSV
 *   GET /health
 */
export async function buildApp(service: DashboardService): Promise<FastifyInstance> {
    const app = fastify({ logger: false });

    // CORS for frontend dev
    await app.register(cors, {
        origin: '*',
        methods: ['GET', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
        // browsers may preflight without Access-Control-Request-Method
        strictPreflight: false,
    });

    app.get('/health', async () => ({ status: 'ok' }));
    registerControlsRoute(app, service);
    registerDashboardRoute(app, service);
    registerExportRoute(app, service);

    app.setNotFoundHandler((_request, reply) => {
        reply.code(404).send({ error: 'Not found' });
    });

    app.setErrorHandler((err: FastifyError, request, reply) => {
        if (isPipelineError(err)) {
            const status = STATUS_BY_KIND[err.kind];
            logger.warn({ kind: err.kind, url: request.url }, err.message);
            return reply.code(status).send({ error: err.kind, message: err.message });
        }
        if (err.validation) {
            return reply.code(400).send({ error: 'InvalidQuery', message: err.message });
        }
        if (err.statusCode !== undefined && err.statusCode < 500) {
            return reply.code(err.statusCode).send({ error: err.message });
        }
        logger.error({ err, url: request.url }, 'Request error');
        return reply.code(500).send({ error: 'Internal server error' });
    });

    return app;
}
