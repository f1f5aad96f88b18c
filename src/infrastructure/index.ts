export * from './bus/index.js';
export * from './config/index.js';
export * from './http/index.js';
export * from './logging/index.js';
