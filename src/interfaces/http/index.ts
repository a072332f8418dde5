export { buildServer } from './server.js';
export type { ServerDependencies } from './server.js';
export { default as filterListRoutes } from './filter-list-routes.js';
export { default as checkRoutes } from './check-routes.js';
