/**
 * Dataset Statistics Routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { trainingRoot } from '@clipset/core';
import { collectDatasetStats } from '@clipset/processing';
import type { RouteOptions } from './health.js';

export const statsRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  fastify.get('/', async () => {
    const settings = context.settings.get();
    return collectDatasetStats({
      root: trainingRoot(settings),
      target: settings.targetPerLabel,
      margin: settings.marginPerLabel,
      knownLabels: await context.labels.load(),
    });
  });
};
