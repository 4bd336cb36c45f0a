import { FastifyInstance } from 'fastify';
import type { AppServices } from '../services/index.js';
import type { HealthCheckResponse } from '../types/index.js';

const VERSION = process.env.npm_package_version || '1.0.0';

export async function healthRoutes(
  fastify: FastifyInstance,
  opts: { services: AppServices }
): Promise<void> {
  const { services } = opts;

  /**
   * Liveness - always OK while the process is serving requests
   */
  fastify.get('/health', async () => {
    return {
      success: true,
      data: { status: 'ok' },
    };
  });

  /**
   * Detailed health check - probes the database and object storage
   */
  fastify.get('/health/detailed', async (request, reply) => {
    const [dbHealthy, storageHealthy] = await Promise.all([
      services.customers.healthCheck(),
      services.storage.healthCheck(),
    ]);

    const response: HealthCheckResponse = {
      status: dbHealthy && storageHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: VERSION,
      services: {
        database: dbHealthy ? 'up' : 'down',
        storage: storageHealthy ? 'up' : 'down',
      },
    };

    return reply.status(dbHealthy ? 200 : 503).send({
      success: dbHealthy,
      data: response,
    });
  });
}
