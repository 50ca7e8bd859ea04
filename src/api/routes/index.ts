/**
 * AgroCarbon - Routes Index
 * Export all route modules
 */

export { default as publicRoutes } from './public';
export type { PublicRouteDeps } from './public';
export { default as healthRoutes } from './health';
