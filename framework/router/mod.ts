/**
 * Routing
 */

export { Router, type RouteDefinition, type RouteMatch, type RouteOptions } from './router.ts';
