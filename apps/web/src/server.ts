/**
 * Fastify Server Factory
 * 
 * Creates and configures the Fastify instance with all plugins.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import type { LogUploader } from '@flightlog/upload';
import { logger } from '@flightlog/utils';

import type { WebConfig } from './config/index.js';
import { errorHandler } from './plugins/errorHandler.js';
import { healthRoutes } from './routes/health.js';
import { uploadRoutes } from './routes/upload.js';

export interface CreateServerOptions {
  config: Pick<WebConfig, 'nodeEnv' | 'maxUploadBytes'>;
  /** `null` keeps the form reachable while reporting storage as down */
  storage: LogUploader | null;
}

export async function createServer({ config, storage }: CreateServerOptions): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = logger;
  const server = Fastify({
    loggerInstance,
    requestTimeout: 5 * 60 * 1000,
  });

  // ============================================
  // Security
  // ============================================

  await server.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        formAction: ["'self'"],
        // Served over plain HTTP on the field network
        upgradeInsecureRequests: null,
      },
    },
  });

  // ============================================
  // Uploads
  // ============================================

  await server.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
      fields: 10,
    },
  });

  await server.register(errorHandler, { production: config.nodeEnv === 'production' });

  // ============================================
  // Routes
  // ============================================

  await server.register(healthRoutes, { prefix: '/health', storage });
  await server.register(uploadRoutes, { storage });

  return server;
}
