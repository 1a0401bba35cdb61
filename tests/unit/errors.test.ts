import {
  createCacheError,
  createSyncError,
  describeError,
  isOfflineCacheError,
  isSyncError
} from '../../src/shared/utils/errors';

describe('error helpers', () => {
  it('creates cache errors carrying a code, url and cause', () => {
    const cause = new TypeError('Failed to fetch');
    const error = createCacheError('MANIFEST_UNAVAILABLE', 'Manifest unreachable', 'https://trainer.test/pwa/audio/manifest.json', cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Manifest unreachable');
    expect(error.code).toBe('MANIFEST_UNAVAILABLE');
    expect(error.url).toBe('https://trainer.test/pwa/audio/manifest.json');
    expect(error.cause).toBe(cause);
  });

  it('narrows errors by their code family', () => {
    const cacheError = createCacheError('BULK_ADD_FAILED', 'batch failed');
    const syncError = createSyncError('SOURCE_NOT_FOUND', 'missing', '/tmp/data/sentences.json');

    expect(isOfflineCacheError(cacheError)).toBe(true);
    expect(isOfflineCacheError(syncError)).toBe(false);
    expect(isSyncError(syncError)).toBe(true);
    expect(isSyncError(new Error('plain'))).toBe(false);
    expect(isSyncError({ code: 'SOURCE_NOT_FOUND' })).toBe(false);
  });

  it('describes unknown thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('offline')).toBe('offline');
  });
});
