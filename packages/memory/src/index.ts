export type { MemoryKeySetStoreConfig } from './interfaces/memoryKeySetStoreConfig.js';
export { MemoryKeySetStore } from './memoryKeySetStore.js';
