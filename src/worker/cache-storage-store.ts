/**
 * CacheStore backed by the browser's CacheStorage
 */

import { CacheBucket, CacheStore } from '../shared/types/cache.js';

export type CacheLike = Pick<Cache, 'match' | 'put' | 'keys'>;

/**
 * The subset of CacheStorage the store uses; `caches` satisfies it.
 */
export interface CacheStorageLike {
  open(cacheName: string): Promise<CacheLike>;
  keys(): Promise<string[]>;
  delete(cacheName: string): Promise<boolean>;
}

class CacheStorageBucket implements CacheBucket {
  constructor(readonly name: string, private readonly cache: CacheLike) {}

  async match(request: Request): Promise<Response | undefined> {
    return this.cache.match(request);
  }

  async put(request: Request, response: Response): Promise<void> {
    await this.cache.put(request, response);
  }

  async keys(): Promise<readonly Request[]> {
    return this.cache.keys();
  }
}

export class CacheStorageStore implements CacheStore {
  constructor(private readonly storage: CacheStorageLike) {}

  async open(cacheName: string): Promise<CacheBucket> {
    const cache = await this.storage.open(cacheName);
    return new CacheStorageBucket(cacheName, cache);
  }

  async names(): Promise<string[]> {
    return this.storage.keys();
  }

  async purge(keepCacheName: string): Promise<string[]> {
    const stale = (await this.storage.keys()).filter(name => name !== keepCacheName);
    await Promise.all(stale.map(name => this.storage.delete(name)));
    return stale;
  }
}
