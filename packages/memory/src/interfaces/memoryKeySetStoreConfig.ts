import type { Logger } from 'pino';

export interface MemoryKeySetStoreConfig {
  /** Maximum number of key set URLs kept (defaults to 16) */
  maxEntries?: number;

  /** Optional pino logger */
  logger?: Logger;
}
