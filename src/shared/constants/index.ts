/**
 * Shared constants for the Offline Sentence Trainer
 */

export const CACHE_CONFIG = {
  CACHE_PREFIX: 'wk-trainer',
  VERSION: 'v22',
  SHELL_FILENAME: 'index.html',
  AUDIO_DIRECTORY: 'audio',
  AUDIO_MANIFEST_PATH: './audio/manifest.json',
  SENTENCES_PATH: './sentences.json',
  STATIC_ASSETS: [
    './',
    './index.html',
    './app.js',
    './manifest.json',
    './sentences.json',
    './audio/manifest.json'
  ],
  WORKER_SCRIPT: './sw.js'
} as const;

export const SYNC_CONFIG = {
  SOURCE_PATH: 'data/sentences.json',
  PWA_DIRECTORY: 'pwa',
  DESTINATION_FILENAME: 'sentences.json'
} as const;

export const OFFLINE_MESSAGES = {
  READY: 'OFFLINE_READY'
} as const;
