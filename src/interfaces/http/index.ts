export { default as healthRoutes } from './health-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
export { default as eventRoutes } from './event-routes.js';
