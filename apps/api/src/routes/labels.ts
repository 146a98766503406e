/**
 * Label Routes
 */

import type { FastifyPluginAsync } from 'fastify';
import type { RouteOptions } from './health.js';

export const labelRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  fastify.get('/', async () => {
    return { labels: await context.labels.load() };
  });
};
