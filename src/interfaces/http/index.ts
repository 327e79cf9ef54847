export { default as webhookRoutes } from './webhook-routes.js';
export { default as healthRoutes } from './health-routes.js';
