/**
 * Path helpers for the offline cache: bucket naming, prefetch path derivation
 * and request classification.
 */

import { AudioFileReference, ImageReferenceGroup } from '../types/core.js';
import { RequestClass } from '../types/cache.js';

export function getCacheName(prefix: string, version: string): string {
  return `${prefix}-${version}`;
}

/**
 * Strip leading "./" and "/" so a path can be re-rooted at the worker scope.
 */
function toScopeRelative(path: string): string {
  return `./${path.trim().replace(/^(\.\/|\/)+/, '')}`;
}

export function toAudioPath(entry: AudioFileReference, audioDirectory: string): string {
  return toScopeRelative(`${audioDirectory}/${entry.file}`);
}

export function collectAudioPaths(entries: readonly AudioFileReference[], audioDirectory: string): string[] {
  return unique(entries.map(entry => toAudioPath(entry, audioDirectory)));
}

/**
 * Every present, non-empty image reference across all groups, in first-seen order.
 */
export function collectImagePaths(groups: readonly ImageReferenceGroup[]): string[] {
  const paths: string[] = [];
  for (const group of groups) {
    for (const sentence of group.sentences) {
      if (sentence.image && sentence.image.trim()) {
        paths.push(toScopeRelative(sentence.image));
      }
    }
  }
  return unique(paths);
}

export function resolveAgainstScope(path: string, scope: string): string {
  return new URL(path, scope).href;
}

/**
 * The page shell is requested either as the scope root, the site root, or by
 * its filename. Everything else is an asset.
 */
export function classifyRequest(url: string, scope: string, shellFilename: string): RequestClass {
  const { pathname } = new URL(url);
  const scopePath = new URL(scope).pathname;

  if (pathname === '/' || pathname === scopePath || pathname.endsWith(`/${shellFilename}`)) {
    return 'navigation';
  }
  return 'asset';
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}
