import { FastifyInstance } from 'fastify';
import type { RouteDependencies } from './index.js';

/**
 * Health check route
 * Used by Cloud Run, load balancers, and monitoring systems
 */
export async function healthRoute(
  app: FastifyInstance,
  { storage }: RouteDependencies,
): Promise<void> {
  app.get(
    '/health',
    {
      schema: {
        tags: ['health'],
        description: 'Service health and object storage status',
      },
    },
    async (_request, reply) => {
      if (storage.state === 'unavailable') {
        reply.status(503);
        return {
          status: 'degraded',
          timestamp: new Date().toISOString(),
          service: 'weather-archive-service',
          storage: 'unavailable',
          error: storage.reason,
        };
      }

      return {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        service: 'weather-archive-service',
        storage: 'ready',
        location: storage.gateway.location,
      };
    },
  );
}
