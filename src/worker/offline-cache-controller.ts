/**
 * Offline cache controller
 * Precaches the page shell, data files, audio and images into one versioned
 * bucket and answers intercepted requests from it.
 */

import { z } from 'zod';
import { CACHE_CONFIG } from '../shared/constants/index.js';
import {
  CacheBucket,
  CacheStore,
  ControllerState,
  DiscoveryPhase,
  FetchFunction,
  InstallReport,
  OfflineCacheConfig,
  ReadyNotifier,
  ServiceWorkerHost
} from '../shared/types/cache.js';
import {
  classifyRequest,
  collectAudioPaths,
  collectImagePaths,
  getCacheName,
  resolveAgainstScope
} from '../shared/utils/asset-paths.js';
import { AudioManifestSchema, SentenceImagesSchema, formatIssues } from '../shared/utils/manifest-schemas.js';
import { createCacheError, describeError } from '../shared/utils/errors.js';

export interface OfflineCacheDependencies {
  store: CacheStore;
  fetch: FetchFunction;
  host: ServiceWorkerHost;
  notifier?: ReadyNotifier;
}

export interface FetchHandlingOptions {
  /** Receives detached work (background cache writes) that should keep the worker alive. */
  waitUntil?: (task: Promise<void>) => void;
}

export const DEFAULT_CACHE_CONFIG: Omit<OfflineCacheConfig, 'scope'> = {
  cachePrefix: CACHE_CONFIG.CACHE_PREFIX,
  version: CACHE_CONFIG.VERSION,
  shellFilename: CACHE_CONFIG.SHELL_FILENAME,
  staticAssets: CACHE_CONFIG.STATIC_ASSETS,
  audioManifestPath: CACHE_CONFIG.AUDIO_MANIFEST_PATH,
  audioDirectory: CACHE_CONFIG.AUDIO_DIRECTORY,
  sentencesPath: CACHE_CONFIG.SENTENCES_PATH,
  notifyClientsWhenReady: true
};

/**
 * Only successful same-origin responses are stored. Cross-origin (`cors`),
 * opaque and network-error responses pass through uncached.
 */
export function isCacheableResponse(response: Response): boolean {
  return response.ok && (response.type === 'basic' || response.type === 'default');
}

export class OfflineCacheController {
  private readonly config: OfflineCacheConfig;
  private readonly store: CacheStore;
  private readonly fetchFn: FetchFunction;
  private readonly host: ServiceWorkerHost;
  private readonly notifier?: ReadyNotifier;
  private currentState: ControllerState = 'parsed';
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(dependencies: OfflineCacheDependencies, config: Partial<OfflineCacheConfig> & { scope: string }) {
    this.config = {
      ...DEFAULT_CACHE_CONFIG,
      ...config
    };
    this.store = dependencies.store;
    this.fetchFn = dependencies.fetch;
    this.host = dependencies.host;
    this.notifier = dependencies.notifier;
  }

  get state(): ControllerState {
    return this.currentState;
  }

  get cacheName(): string {
    return getCacheName(this.config.cachePrefix, this.config.version);
  }

  /**
   * Populate the bucket for the current version.
   * Static assets are mandatory; audio and image discovery are best effort.
   */
  async install(): Promise<InstallReport> {
    this.currentState = 'installing';
    const { bucket, staticAssets } = await this.precacheStatic();

    const skipped: DiscoveryPhase[] = [];
    const audioFiles = await this.runBestEffort('audio', skipped, () => this.precacheAudio(bucket));
    const images = await this.runBestEffort('images', skipped, () => this.precacheImages(bucket));

    if (!skipped.includes('images')) {
      await this.notifyReady();
    }

    this.currentState = 'installed';
    await this.host.skipWaiting();

    console.log(`Installed ${this.cacheName}: ${staticAssets} static, ${audioFiles} audio, ${images} images`);
    return { cacheName: this.cacheName, staticAssets, audioFiles, images, skipped };
  }

  /**
   * Drop every bucket other than the current one and take over open pages.
   */
  async activate(): Promise<string[]> {
    this.currentState = 'activating';

    const deleted = await this.store.purge(this.cacheName);
    if (deleted.length > 0) {
      console.log('Removed stale caches:', deleted.join(', '));
    }

    await this.host.claimClients();
    this.currentState = 'activated';
    return deleted;
  }

  /**
   * Answer an intercepted request. The page shell is network-first so new
   * deployments show up on the next online load; everything else is cache-first.
   */
  async handleFetch(request: Request, options: FetchHandlingOptions = {}): Promise<Response> {
    if (request.method !== 'GET') {
      return this.fetchFn(request);
    }

    if (classifyRequest(request.url, this.config.scope, this.config.shellFilename) === 'navigation') {
      return this.networkFirst(request, options);
    }
    return this.cacheFirst(request);
  }

  /**
   * Resolves once every background cache write has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all(this.pendingWrites);
    }
  }

  private async networkFirst(request: Request, options: FetchHandlingOptions): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(request);
    } catch (error) {
      const bucket = await this.store.open(this.cacheName);
      const cached = await bucket.match(request);
      if (cached) {
        return cached;
      }
      throw error;
    }

    this.storeInBackground(request, response, options);
    return response;
  }

  private async cacheFirst(request: Request): Promise<Response> {
    const bucket = await this.store.open(this.cacheName);
    const cached = await bucket.match(request);
    if (cached) {
      return cached;
    }

    const response = await this.fetchFn(request);
    if (isCacheableResponse(response)) {
      try {
        await bucket.put(request, response.clone());
      } catch (error) {
        console.error(`Failed to cache ${request.url}:`, error);
      }
    }
    return response;
  }

  private storeInBackground(request: Request, response: Response, options: FetchHandlingOptions): void {
    if (!isCacheableResponse(response)) {
      return;
    }

    const copy = response.clone();
    const task: Promise<void> = this.store.open(this.cacheName)
      .then(bucket => bucket.put(request, copy))
      .catch(error => {
        console.error(`Background cache write failed for ${request.url}:`, error);
      })
      .finally(() => {
        this.pendingWrites.delete(task);
      });

    this.pendingWrites.add(task);
    options.waitUntil?.(task);
  }

  private async runBestEffort(
    phase: DiscoveryPhase,
    skipped: DiscoveryPhase[],
    task: () => Promise<number>
  ): Promise<number> {
    try {
      return await task();
    } catch (error) {
      console.warn(`Pre-cache of ${phase} skipped:`, error);
      skipped.push(phase);
      return 0;
    }
  }

  private async precacheStatic(): Promise<{ bucket: CacheBucket; staticAssets: number }> {
    try {
      const bucket = await this.store.open(this.cacheName);
      const staticAssets = await this.addAll(bucket, this.config.staticAssets);
      return { bucket, staticAssets };
    } catch (error) {
      this.currentState = 'redundant';
      console.error('Failed to precache static assets:', error);
      throw createCacheError(
        'STATIC_PRECACHE_FAILED',
        `Static asset precache failed: ${describeError(error)}`,
        undefined,
        error
      );
    }
  }

  private async precacheAudio(bucket: CacheBucket): Promise<number> {
    const entries = await this.fetchManifest(this.config.audioManifestPath, AudioManifestSchema);
    return this.addAll(bucket, collectAudioPaths(entries, this.config.audioDirectory));
  }

  private async precacheImages(bucket: CacheBucket): Promise<number> {
    const groups = await this.fetchManifest(this.config.sentencesPath, SentenceImagesSchema);
    return this.addAll(bucket, collectImagePaths(groups));
  }

  private async notifyReady(): Promise<void> {
    if (!this.notifier || !this.config.notifyClientsWhenReady) {
      return;
    }

    try {
      await this.notifier.notifyReady();
    } catch (error) {
      console.warn('Failed to notify clients that offline assets are ready:', error);
    }
  }

  private async fetchManifest<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = resolveAgainstScope(path, this.config.scope);

    let response: Response;
    try {
      response = await this.fetchFn(new Request(url));
    } catch (error) {
      throw createCacheError('MANIFEST_UNAVAILABLE', `Failed to fetch ${url}: ${describeError(error)}`, url, error);
    }

    if (!response.ok) {
      throw createCacheError('MANIFEST_UNAVAILABLE', `Request for ${url} failed with status ${response.status}`, url);
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      throw createCacheError('MANIFEST_INVALID', `${url} is not valid JSON`, url, error);
    }

    const parseResult = schema.safeParse(raw);
    if (!parseResult.success) {
      throw createCacheError('MANIFEST_INVALID', `Invalid format in ${url}: ${formatIssues(parseResult.error)}`, url);
    }
    return parseResult.data;
  }

  /**
   * Fetch every path, then store all of them. Any failed or non-OK response
   * rejects the batch before anything is stored. A put that fails partway
   * rejects too, leaving the entries already written in place.
   */
  private async addAll(bucket: CacheBucket, paths: readonly string[]): Promise<number> {
    const urls = Array.from(new Set(paths.map(path => resolveAgainstScope(path, this.config.scope))));

    const entries = await Promise.all(urls.map(async url => {
      const request = new Request(url);
      const response = await this.fetchFn(request);
      if (!response.ok) {
        throw createCacheError('BULK_ADD_FAILED', `Request for ${url} failed with status ${response.status}`, url);
      }
      return { request, response };
    }));

    for (const { request, response } of entries) {
      await bucket.put(request, response);
    }
    return entries.length;
  }
}
