export { default as errorHandler } from './error-handler.js';
export { default as healthRoutes } from './health-routes.js';
export { default as stardateRoutes } from './stardate-routes.js';
export { default as moduleRoutes } from './module-routes.js';
export { default as dashboardRoutes } from './dashboard-routes.js';
export type { DashboardRoutesOptions } from './dashboard-routes.js';
