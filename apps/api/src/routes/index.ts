/**
 * Routes Index
 * 
 * Barrel export for all API routes.
 */

export { healthRoutes, type RouteOptions } from './health.js';
export { settingsRoutes } from './settings.js';
export { labelRoutes } from './labels.js';
export { videoRoutes } from './videos.js';
export { clipRoutes } from './clips.js';
export { statsRoutes } from './stats.js';
