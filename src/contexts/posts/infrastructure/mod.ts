/**
 * Post store selection
 *
 * @module
 */

import type { DatabaseOptions } from '../../../../framework/config/config.ts';
import type { ManagedPostStore } from '../domain/post_store.ts';
import { MemoryPostStore } from './memory_post_store.ts';
import { SqlitePostStore } from './sqlite_post_store.ts';

export { MemoryPostStore } from './memory_post_store.ts';
export { SqlitePostStore } from './sqlite_post_store.ts';

/**
 * Open the configured store and make sure its schema exists
 */
export async function openPostStore(options: DatabaseOptions): Promise<ManagedPostStore> {
  const store = options.driver === 'memory'
    ? new MemoryPostStore()
    : await SqlitePostStore.open(options.path);
  await store.createSchema();
  return store;
}
