/**
 * Querystring shared by the dashboard and export routes.
 * Values stay strings here; DashboardService validates them against the dataset.
 */
export const dashboardQuerySchema = {
    type: 'object',
    properties: {
        location: { type: 'string' },
        start: { type: 'string' },
        end: { type: 'string' },
        window: { type: 'string' },
        metrics: { type: 'string' },
    },
    additionalProperties: false,
} as const;
