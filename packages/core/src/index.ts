export * from './types.js';
export * from './errors.js';
export * from './utils.js';
export * from './config.js';
export * from './logger.js';
export * from './graph.js';
export * from './render.js';
export * from './linear.js';
export * from './dependencies.js';
export * from './container.js';
