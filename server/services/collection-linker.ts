/**
 * Collection-Photo Linker
 *
 * Photos point at collections through a weak collection_id reference.
 * The two stores disagree on its type (the remote context holds strings,
 * older cache files hold "3" where newer ones hold 3), so every comparison
 * goes through canonicalId.
 */

import type {
  Collection,
  CollectionWithCount,
  Photo,
  PhotoWithCollection,
} from '@lumen/types';
import { NotFoundError } from '../utils/errors';
import { toInt } from '../utils/records';

export interface CollectionPhotos {
  collection: Collection;
  photos: Photo[];
}

/**
 * Canonical string form of a collection reference, or null for "no collection"
 */
export function canonicalId(value: unknown): string | null {
  const n = toInt(value);
  return n === null ? null : String(n);
}

export function sameCollection(a: unknown, b: unknown): boolean {
  const ca = canonicalId(a);
  return ca !== null && ca === canonicalId(b);
}

export function photoCount(photos: ReadonlyArray<Photo>, collectionId: unknown): number {
  return photos.filter(p => sameCollection(p.collection_id, collectionId)).length;
}

export function findCollection(
  collections: ReadonlyArray<Collection>,
  collectionId: unknown
): Collection | null {
  return collections.find(c => sameCollection(c.id, collectionId)) ?? null;
}

/**
 * Name of the referenced collection; null when unset or dangling
 */
export function collectionName(
  collections: ReadonlyArray<Collection>,
  collectionId: unknown
): string | null {
  if (canonicalId(collectionId) === null) return null;
  return findCollection(collections, collectionId)?.name ?? null;
}

/**
 * Newest first by upload_date (ISO-8601 compares lexicographically).
 * Array.prototype.sort is stable, so ties keep input order.
 */
export function sortByUploadDateDesc(photos: Photo[]): Photo[] {
  return photos.sort((a, b) => {
    const da = a.upload_date || '';
    const db = b.upload_date || '';
    if (da === db) return 0;
    return da < db ? 1 : -1;
  });
}

export function listPhotosByCollection(
  photos: ReadonlyArray<Photo>,
  collections: ReadonlyArray<Collection>,
  collectionId: unknown
): CollectionPhotos {
  const collection = findCollection(collections, collectionId);
  if (!collection) {
    throw new NotFoundError('Collection not found');
  }
  const matching = photos.filter(p => sameCollection(p.collection_id, collection.id));
  return { collection, photos: sortByUploadDateDesc(matching) };
}

export function withPhotoCounts(
  collections: ReadonlyArray<Collection>,
  photos: ReadonlyArray<Photo>
): CollectionWithCount[] {
  return collections.map(c => ({ ...c, photo_count: photoCount(photos, c.id) }));
}

export function withCollectionNames(
  photos: ReadonlyArray<Photo>,
  collections: ReadonlyArray<Collection>
): PhotoWithCollection[] {
  return photos.map(p => (
    canonicalId(p.collection_id) === null
      ? { ...p }
      : { ...p, collection_name: collectionName(collections, p.collection_id) }
  ));
}
