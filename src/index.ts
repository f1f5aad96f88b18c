export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { createEventBusServices } from './container.js';
export type { EventBusServices, EventBusServicesOptions } from './container.js';
export { buildApp } from './app.js';
export type { BuildAppOptions } from './app.js';
export { eventBusPlugin, eventBusRoutes } from './interfaces/http/index.js';
export type { EventBusPluginOptions } from './interfaces/http/index.js';
