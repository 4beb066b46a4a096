// Re-export all from submodules
export * from './types/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
export * from './utils/guards.js';
export * from './errors/index.js';
