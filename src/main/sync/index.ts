export { PwaSyncService } from './pwa-sync.js';
