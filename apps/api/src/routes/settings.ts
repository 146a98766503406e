/**
 * Settings Routes
 * 
 * Read and update the export settings. Updates are partial; unknown
 * keys are rejected.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { RouteOptions } from './health.js';

export const settingsRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  fastify.get('/', async () => {
    return context.settings.get();
  });

  fastify.put('/', async (request) => {
    return context.settings.update(request.body);
  });
};
