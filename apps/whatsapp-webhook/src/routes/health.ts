import type { RelayFastifyInstance } from '../server/types';

/** Liveness endpoints. `/` is kept for platforms that health-check the root path. */
export async function registerHealthRoutes(app: RelayFastifyInstance): Promise<void> {
  app.get('/', async () => ({ status: 'ok' }));
  app.get('/healthz', async () => ({ status: 'ok' }));
}
