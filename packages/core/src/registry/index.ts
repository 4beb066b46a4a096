export { ServerRegistry } from './serverRegistry.js';
export { FileRegistryStorage, MemoryRegistryStorage } from './storage.js';
export type { RegistryStorage } from './storage.js';
export { registryRecordSchema, serverSchema } from './schema.js';
