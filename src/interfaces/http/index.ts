export { default as eventBusPlugin } from './event-bus-plugin.js';
export type { EventBusPluginOptions } from './event-bus-plugin.js';
export { default as eventBusRoutes } from './eventbus-routes.js';
