import type { GatewayFastifyInstance } from '../server/types';

export interface HealthRouteContext {
  activeCycles(): number;
  cachedSessions(): number;
}

/** Liveness endpoint with a glimpse of scheduler load. */
export async function registerHealthRoutes(
  app: GatewayFastifyInstance,
  context: HealthRouteContext,
): Promise<void> {
  app.get('/healthz', async () => ({
    status: 'ok',
    activeCycles: context.activeCycles(),
    cachedSessions: context.cachedSessions(),
  }));
}
