/**
 * Service worker entry point
 * Wires the worker lifecycle events to the offline cache controller
 */

import { OFFLINE_MESSAGES } from '../shared/constants/index.js';
import { OfflineCacheConfig, OfflineReadyMessage, ReadyNotifier, ServiceWorkerHost } from '../shared/types/cache.js';
import { CacheStorageLike, CacheStorageStore } from './cache-storage-store.js';
import { OfflineCacheController } from './offline-cache-controller.js';

export interface ExtendableEventLike {
  waitUntil(promise: Promise<unknown>): void;
}

export interface FetchEventLike extends ExtendableEventLike {
  readonly request: Request;
  respondWith(response: Promise<Response>): void;
}

export interface WorkerClient {
  postMessage(message: unknown): void;
}

export interface WorkerClients {
  claim(): Promise<void>;
  matchAll(options?: { type?: 'window' | 'worker' | 'sharedworker' | 'all'; includeUncontrolled?: boolean }): Promise<readonly WorkerClient[]>;
}

/**
 * The parts of the service worker global scope the controller needs.
 */
export interface WorkerScopeServices {
  readonly registration: { readonly scope: string };
  readonly clients: WorkerClients;
  readonly caches: CacheStorageLike;
  skipWaiting(): Promise<void>;
  fetch(request: Request): Promise<Response>;
}

export interface ServiceWorkerScope extends WorkerScopeServices {
  addEventListener(type: 'install' | 'activate', listener: (event: ExtendableEventLike) => void): void;
  addEventListener(type: 'fetch', listener: (event: FetchEventLike) => void): void;
}

export interface WorkerHandlers {
  onInstall(event: ExtendableEventLike): void;
  onActivate(event: ExtendableEventLike): void;
  onFetch(event: FetchEventLike): void;
}

export class ClientBroadcastNotifier implements ReadyNotifier {
  constructor(private readonly clients: WorkerClients) {}

  async notifyReady(): Promise<void> {
    const message: OfflineReadyMessage = { type: OFFLINE_MESSAGES.READY };
    const windows = await this.clients.matchAll({ type: 'window', includeUncontrolled: true });
    windows.forEach(client => client.postMessage(message));
  }
}

export function createWorkerHost(scope: WorkerScopeServices): ServiceWorkerHost {
  return {
    skipWaiting: () => scope.skipWaiting(),
    claimClients: () => scope.clients.claim()
  };
}

export function createOfflineCacheController(
  scope: WorkerScopeServices,
  config: Partial<OfflineCacheConfig> = {}
): OfflineCacheController {
  return new OfflineCacheController(
    {
      store: new CacheStorageStore(scope.caches),
      fetch: request => scope.fetch(request),
      host: createWorkerHost(scope),
      notifier: new ClientBroadcastNotifier(scope.clients)
    },
    { scope: scope.registration.scope, ...config }
  );
}

export function createWorkerHandlers(controller: OfflineCacheController): WorkerHandlers {
  return {
    onInstall: event => event.waitUntil(controller.install()),
    onActivate: event => event.waitUntil(controller.activate()),
    onFetch: event => {
      event.respondWith(controller.handleFetch(event.request, {
        waitUntil: task => event.waitUntil(task)
      }));
    }
  };
}

export function registerOfflineCache(
  scope: ServiceWorkerScope,
  config: Partial<OfflineCacheConfig> = {}
): OfflineCacheController {
  const controller = createOfflineCacheController(scope, config);
  const handlers = createWorkerHandlers(controller);

  scope.addEventListener('install', handlers.onInstall);
  scope.addEventListener('activate', handlers.onActivate);
  scope.addEventListener('fetch', handlers.onFetch);
  return controller;
}

export function isServiceWorkerScope(value: unknown): value is ServiceWorkerScope {
  return typeof value === 'object' && value !== null &&
    'skipWaiting' in value && typeof value.skipWaiting === 'function' &&
    'registration' in value && 'clients' in value && 'caches' in value &&
    'addEventListener' in value && typeof value.addEventListener === 'function';
}

const workerScope: unknown = globalThis;
if (isServiceWorkerScope(workerScope)) {
  registerOfflineCache(workerScope);
}
