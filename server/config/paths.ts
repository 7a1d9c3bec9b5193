/**
 * Cache file and remote key layout
 */

import path from 'path';
import type { EntityKind } from '@lumen/types';

const CACHE_FILENAMES: Record<EntityKind, string> = {
  photos: 'photos_data.json',
  collections: 'collections_data.json',
};

export function cacheFilePath(dataDir: string, kind: EntityKind): string {
  return path.join(dataDir, CACHE_FILENAMES[kind]);
}

/** Key prefix every photo asset lives under */
export function photosPrefix(prefix: string): string {
  return `${prefix}photos/`;
}

/** Fixed key of the serialized collections list */
export function collectionsDocumentKey(prefix: string): string {
  return `${prefix}collections_metadata.json`;
}
