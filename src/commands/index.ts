export * from './process.js';
export * from './filters.js';
