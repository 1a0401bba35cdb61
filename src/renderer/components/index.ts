/**
 * Component exports for the PWA shell
 */

export { OfflineStatus } from './offline-status.js';
export type { OfflineStatusState } from './offline-status.js';
