import { OfflineCacheError } from '../types/cache.js';
import { SyncError } from '../types/sync.js';

const CACHE_ERROR_CODES: ReadonlySet<string> = new Set<OfflineCacheError['code']>([
  'STATIC_PRECACHE_FAILED',
  'MANIFEST_UNAVAILABLE',
  'MANIFEST_INVALID',
  'BULK_ADD_FAILED'
]);

const SYNC_ERROR_CODES: ReadonlySet<string> = new Set<SyncError['code']>([
  'SOURCE_NOT_FOUND',
  'INVALID_DATA',
  'COPY_FAILED'
]);

export function createCacheError(
  code: OfflineCacheError['code'],
  message: string,
  url?: string,
  cause?: unknown
): OfflineCacheError {
  return Object.assign(new Error(message, { cause }), { code, url });
}

export function createSyncError(
  code: SyncError['code'],
  message: string,
  filePath?: string,
  cause?: unknown
): SyncError {
  return Object.assign(new Error(message, { cause }), { code, filePath });
}

export function isOfflineCacheError(error: unknown): error is OfflineCacheError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && CACHE_ERROR_CODES.has(error.code);
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && SYNC_ERROR_CODES.has(error.code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
