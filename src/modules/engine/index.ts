/**
 * ENGINE MODULE — Index
 */

export * from './engine.contracts.js';
export * from './engine.params.js';
export * from './engine.workflow.js';
export * from './engine.evaluation.js';
export * from './engine.storage.js';
export * from './engine.service.js';
export * from './engine.host.js';
export { registerEngineRoutes } from './engine.routes.js';
