export { default as collectionRoutes } from './collection-routes.js';
export { default as healthRoutes } from './health-routes.js';
