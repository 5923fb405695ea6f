export { default as eventRoutes } from './event-routes.js';
export type { EventRoutesOptions } from './event-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { handleError } from './error-handler.js';
