export * from './logger.js';
export * from './errors.js';
