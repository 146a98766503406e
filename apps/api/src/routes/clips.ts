/**
 * Clip Routes
 * 
 * Export a clip from the current playhead and undo the last export.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { RouteOptions } from './health.js';

const time = z.number().finite().nonnegative();

const exportClipSchema = z.object({
  videoFilename: z.string().min(1),
  currentTime: time,
  label: z.string().default(''),
  inMark: time.nullable().optional(),
  outMark: time.nullable().optional(),
});

export const clipRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  /**
   * Cut a clip into Training/<label>/
   */
  fastify.post('/', async (request, reply) => {
    const body = exportClipSchema.parse(request.body);
    const result = await context.exporter.exportClip(body);

    return reply.status(201).send({
      ok: true,
      path: result.path,
      label: result.label,
      window: result.window,
      strategy: result.strategy,
    });
  });

  /**
   * Delete the most recent export
   */
  fastify.post('/undo', async () => {
    return context.exporter.undoLast();
  });
};
