/**
 * Page-side service worker registration
 */

import { CACHE_CONFIG, OFFLINE_MESSAGES } from '../../shared/constants/index.js';
import { OfflineReadyMessage } from '../../shared/types/cache.js';

export interface WorkerMessageEvent {
  readonly data: unknown;
}

export type WorkerMessageListener = (event: WorkerMessageEvent) => void;

/**
 * The subset of `navigator.serviceWorker` used here.
 */
export interface ServiceWorkerContainerLike {
  readonly controller?: unknown;
  register(scriptURL: string, options?: { scope?: string }): Promise<unknown>;
  addEventListener(type: 'message', listener: WorkerMessageListener): void;
  removeEventListener(type: 'message', listener: WorkerMessageListener): void;
}

export interface OfflineRegistrationOptions {
  scriptUrl?: string;
  scope?: string;
  onOfflineReady?: () => void;
}

export interface OfflineRegistration {
  /** True when a worker already served this page or was active before registering. */
  readonly alreadyActive: boolean;
  unsubscribe(): void;
}

export function isOfflineReadyMessage(data: unknown): data is OfflineReadyMessage {
  return typeof data === 'object' && data !== null && 'type' in data && data.type === OFFLINE_MESSAGES.READY;
}

function hasActiveWorker(registration: unknown): boolean {
  return typeof registration === 'object' && registration !== null &&
    'active' in registration && registration.active != null;
}

/**
 * Register the offline worker and listen for its readiness broadcast.
 * Resolves to null when the browser has no service worker support.
 */
export async function registerOfflineWorker(
  container: ServiceWorkerContainerLike | undefined,
  options: OfflineRegistrationOptions = {}
): Promise<OfflineRegistration | null> {
  if (!container) {
    console.warn('Service workers are not supported, offline mode is unavailable');
    return null;
  }

  // Subscribe before registering so a fast install cannot broadcast unheard
  const listener: WorkerMessageListener = event => {
    if (isOfflineReadyMessage(event.data)) {
      options.onOfflineReady?.();
    }
  };
  container.addEventListener('message', listener);
  const controlled = container.controller != null;

  let registration: unknown;
  try {
    registration = await container.register(
      options.scriptUrl ?? CACHE_CONFIG.WORKER_SCRIPT,
      options.scope ? { scope: options.scope } : undefined
    );
  } catch (error) {
    container.removeEventListener('message', listener);
    console.error('Service worker registration failed:', error);
    throw error;
  }

  return {
    alreadyActive: controlled || hasActiveWorker(registration),
    unsubscribe: () => container.removeEventListener('message', listener)
  };
}
