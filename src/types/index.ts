export * from './taskTypes.js';
