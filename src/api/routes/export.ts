import { dashboardQuerySchema } from './querySchema.ts';

import type { FastifyInstance } from 'fastify';
import type { DashboardService, RawDashboardQuery } from '../../dashboard/DashboardService.ts';

/**
 * GET /api/export?location=Finland&start=2023-01-01&end=2023-03-31
 * Downloads the filtered rows as CSV.
 */
export function registerExportRoute(app: FastifyInstance, service: DashboardService): void {
    app.get<{ Querystring: RawDashboardQuery }>(
        '/api/export',
        { schema: { querystring: dashboardQuerySchema } },
        async (request, reply) => {
            const result = await service.getExport(request.query);
            return reply
                .header('Content-Type', 'text/csv; charset=utf-8')
                .header('Content-Disposition', `attachment; filename*=UTF-8''${encodeURIComponent(result.fileName)}`)
                .send(result.csv);
        }
    );
}
