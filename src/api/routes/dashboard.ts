import { dashboardQuerySchema } from './querySchema.ts';

import type { FastifyInstance } from 'fastify';
import type { DashboardService, RawDashboardQuery } from '../../dashboard/DashboardService.ts';

/**
 * GET /api/dashboard?location=Finland&start=2023-01-01&end=2023-03-31&window=7&metrics=new_cases,new_deaths
 *
 * Returns metric cards from the latest row, one series per metric,
 * the last four weeks with week-over-week change and the detailed table.
 */
export function registerDashboardRoute(app: FastifyInstance, service: DashboardService): void {
    app.get<{ Querystring: RawDashboardQuery }>(
        '/api/dashboard',
        { schema: { querystring: dashboardQuerySchema } },
        async (request) => service.getDashboard(request.query)
    );
}
