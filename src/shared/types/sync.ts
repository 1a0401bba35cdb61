/**
 * PWA sync step types
 */

export interface SyncConfig {
  sourcePath: string;
  pwaDirectory: string;
  destinationFilename: string;
}

export interface SyncError extends Error {
  code: 'SOURCE_NOT_FOUND' | 'INVALID_DATA' | 'COPY_FAILED';
  filePath?: string;
}
