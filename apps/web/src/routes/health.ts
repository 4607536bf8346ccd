/**
 * Health Routes
 * 
 * Liveness and storage readiness probes.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { LogUploader } from '@flightlog/upload';

export interface HealthRoutesOptions {
  storage: LogUploader | null;
}

interface HealthStatus {
  status: 'up';
  storage: 'initialized' | 'not initialized';
}

interface ReadinessStatus {
  status: 'ready' | 'unavailable';
  bucket: string | null;
  timestamp: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { storage }) => {
  // Liveness: always 200 while the process is serving
  fastify.get('/', async (_request, reply) => {
    const body: HealthStatus = {
      status: 'up',
      storage: storage ? 'initialized' : 'not initialized',
    };
    return reply.send(body);
  });

  // Readiness: asks the object store
  fastify.get('/ready', async (_request, reply) => {
    const reachable = storage ? await storage.healthCheck() : false;
    const body: ReadinessStatus = {
      status: reachable ? 'ready' : 'unavailable',
      bucket: storage?.bucket ?? null,
      timestamp: new Date().toISOString(),
    };
    return reply.status(reachable ? 200 : 503).send(body);
  });
};
