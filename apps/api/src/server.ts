/**
 * Fastify Server Factory
 * 
 * Creates and configures the Fastify instance with all plugins.
 */

import Fastify from 'fastify';

import type { AppContext } from './lib/context.js';
import { errorHandler } from './plugins/errorHandler.js';

// Routes
import {
  clipRoutes,
  healthRoutes,
  labelRoutes,
  settingsRoutes,
  statsRoutes,
  videoRoutes,
} from './routes/index.js';

export async function createServer(context: AppContext) {
  const server = Fastify({
    loggerInstance: context.logger,
    requestTimeout: 0, // exports run as long as ffmpeg needs
    bodyLimit: 1024 * 1024, // 1MB
  });

  // ============================================
  // Error handling
  // ============================================

  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================

  // Root route - API info
  server.get('/', async () => ({
    name: 'clipset-api',
    version: '1.0.0',
    status: 'running',
    health: '/health',
  }));

  await server.register(healthRoutes, { prefix: '/health', context });
  await server.register(settingsRoutes, { prefix: '/api/v1/settings', context });
  await server.register(labelRoutes, { prefix: '/api/v1/labels', context });
  await server.register(videoRoutes, { prefix: '/api/v1/videos', context });
  await server.register(clipRoutes, { prefix: '/api/v1/clips', context });
  await server.register(statsRoutes, { prefix: '/api/v1/stats', context });

  return server;
}
