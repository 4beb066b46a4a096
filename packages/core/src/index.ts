// Re-export from submodules
export * from './config/index.js';
export * from './registry/index.js';
export * from './utils/index.js';

// Jellyfin client
export * from './jellyfin/index.js';
