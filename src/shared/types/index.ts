/**
 * Shared types and interfaces for the Offline Sentence Trainer
 */

export * from './core.js';
export * from './cache.js';
export * from './sync.js';
