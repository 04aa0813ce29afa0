import type { FastifyInstance } from 'fastify';
import type { DashboardService } from '../../dashboard/DashboardService.ts';

/**
 * GET /api/controls
 * Returns what the filter sidebar needs: locations, date span, metrics, window bounds.
 */
export function registerControlsRoute(app: FastifyInstance, service: DashboardService): void {
    app.get('/api/controls', async () => service.getControls());
}
