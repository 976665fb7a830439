export * from './errors/index.js';
export * from './requirements/index.js';
export * from './immutable/index.js';
