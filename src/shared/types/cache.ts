/**
 * Offline cache interfaces shared by the service worker and the page
 */

import { OFFLINE_MESSAGES } from '../constants/index.js';

/**
 * One named generation of cached request/response pairs.
 * Entries are keyed by request method and URL.
 */
export interface CacheBucket {
  readonly name: string;
  match(request: Request): Promise<Response | undefined>;
  put(request: Request, response: Response): Promise<void>;
  keys(): Promise<readonly Request[]>;
}

export interface CacheStore {
  open(cacheName: string): Promise<CacheBucket>;
  names(): Promise<string[]>;
  /** Deletes every bucket except `keepCacheName`, returning the deleted names. */
  purge(keepCacheName: string): Promise<string[]>;
}

export type FetchFunction = (request: Request) => Promise<Response>;

export interface ServiceWorkerHost {
  skipWaiting(): Promise<void>;
  claimClients(): Promise<void>;
}

export interface ReadyNotifier {
  notifyReady(): Promise<void>;
}

export type ControllerState = 'parsed' | 'installing' | 'installed' | 'activating' | 'activated' | 'redundant';

export type RequestClass = 'navigation' | 'asset';

export type DiscoveryPhase = 'audio' | 'images';

export interface OfflineCacheConfig {
  cachePrefix: string;
  version: string;
  scope: string;
  shellFilename: string;
  staticAssets: readonly string[];
  audioManifestPath: string;
  audioDirectory: string;
  sentencesPath: string;
  notifyClientsWhenReady: boolean;
}

export interface InstallReport {
  cacheName: string;
  staticAssets: number;
  audioFiles: number;
  images: number;
  skipped: DiscoveryPhase[];
}

export interface OfflineCacheError extends Error {
  code: 'STATIC_PRECACHE_FAILED' | 'MANIFEST_UNAVAILABLE' | 'MANIFEST_INVALID' | 'BULK_ADD_FAILED';
  url?: string;
}

export interface OfflineReadyMessage {
  type: typeof OFFLINE_MESSAGES.READY;
}
