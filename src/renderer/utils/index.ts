/**
 * Utility exports for renderer components
 */

export { registerOfflineWorker, isOfflineReadyMessage } from './offline-registration.js';
export type {
  OfflineRegistration,
  OfflineRegistrationOptions,
  ServiceWorkerContainerLike,
  WorkerMessageEvent
} from './offline-registration.js';
