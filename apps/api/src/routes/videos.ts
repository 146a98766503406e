/**
 * Video Routes
 */

import type { FastifyPluginAsync } from 'fastify';
import type { RouteOptions } from './health.js';

export const videoRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  fastify.get('/', async () => {
    return { videos: await context.exporter.listVideos() };
  });
};
