// Health check route
import type { FastifyInstance } from 'fastify';
import { PARTITIONS, type SimilarityStore } from '../services/vector-store.js';

type CheckStatus = 'ok' | 'failed';

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  response_time_ms: number;
  checks: {
    config: CheckStatus;
    catalog: CheckStatus;
  };
}

export type HealthRouteOptions = {
  store: SimilarityStore;
  isConfigured: () => boolean;
};

export async function healthRoutes(server: FastifyInstance, opts: HealthRouteOptions) {
  // GET /api/health - Provider configuration and catalog index presence
  server.get('/health', async (request, reply) => {
    const startedAt = Date.now();

    const config: CheckStatus = opts.isConfigured() ? 'ok' : 'failed';

    let catalog: CheckStatus = 'ok';
    try {
      for (const partition of PARTITIONS) {
        if ((await opts.store.count(partition)) === 0) {
          catalog = 'failed';
        }
      }
    } catch (err) {
      request.log.error({ err }, 'Catalog health check failed');
      catalog = 'failed';
    }

    const healthy = config === 'ok' && catalog === 'ok';
    const body: HealthResponse = {
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      response_time_ms: Date.now() - startedAt,
      checks: { config, catalog },
    };

    return reply.code(healthy ? 200 : 503).send(body);
  });
}
