/**
 * Health Routes
 * 
 * Liveness plus availability of the external toolchain.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { AppContext } from '../lib/context.js';

export interface RouteOptions {
  context: AppContext;
}

export const healthRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  fastify.get('/', async () => {
    const [ffmpeg, ffprobe] = await Promise.all([
      context.executor.isAvailable(),
      context.probe.isAvailable(),
    ]);

    return {
      status: ffmpeg && ffprobe ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      ffmpeg,
      ffprobe,
    };
  });
};
