import type { ResolverConfig } from '../config.js';
import { closeConnection, getDb } from '../db/connection.js';
import { MemoryMappingStore } from './memory-store.js';
import { PostgresMappingStore } from './postgres-store.js';
import type { MappingStore } from './types.js';

export type { MappingStore, LearnedMappingFilter } from './types.js';
export { MemoryMappingStore } from './memory-store.js';
export { PostgresMappingStore } from './postgres-store.js';

export function createMappingStore(config: ResolverConfig): MappingStore {
  if (config.store === 'memory' || !config.databaseUrl) {
    console.error('[store] Using in-memory mapping store');
    return new MemoryMappingStore();
  }
  return new PostgresMappingStore(getDb(config.databaseUrl), closeConnection);
}
