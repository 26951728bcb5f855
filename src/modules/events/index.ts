/**
 * EVENTS MODULE — Index
 */

export * from './events.types.js';
export * from './events.validation.js';
export * from './events.aggregator.js';
export * from './events.store.js';
export { registerEventRoutes } from './events.routes.js';
