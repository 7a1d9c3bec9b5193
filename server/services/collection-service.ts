/**
 * Collection Service
 *
 * Collections are created and renamed by an admin; there is no delete.
 * Names are unique case-insensitively.
 */

import type { Collection, CollectionWithCount } from '@lumen/types';
import { nextId } from '../utils/id-allocator';
import { ConflictError, NotFoundError, UpstreamError, ValidationError } from '../utils/errors';
import type { MetadataReconciler } from './metadata-reconciler';
import {
  type CollectionPhotos,
  findCollection,
  listPhotosByCollection,
  withPhotoCounts,
} from './collection-linker';

function requireName(raw: unknown): string {
  const name = typeof raw === 'string' ? raw.trim() : '';
  if (!name) throw new ValidationError('Collection name is required');
  return name;
}

function nameTaken(collections: ReadonlyArray<Collection>, name: string, exceptId?: number): boolean {
  const lower = name.toLowerCase();
  return collections.some(c => c.name.toLowerCase() === lower && c.id !== exceptId);
}

export class CollectionService {
  constructor(
    private readonly reconciler: MetadataReconciler,
    private readonly now: () => Date = () => new Date()
  ) {}

  async list(): Promise<CollectionWithCount[]> {
    const [collections, photos] = await Promise.all([
      this.reconciler.load('collections'),
      this.reconciler.load('photos'),
    ]);
    return withPhotoCounts(collections, photos);
  }

  async create(rawName: unknown): Promise<Collection> {
    const name = requireName(rawName);

    const { result, saved } = await this.reconciler.update('collections', collections => {
      if (nameTaken(collections, name)) {
        throw new ConflictError('Collection name already exists');
      }
      const collection: Collection = {
        id: nextId(collections),
        name,
        created_date: this.now().toISOString(),
      };
      collections.push(collection);
      return collection;
    });

    if (!saved.ok) throw new UpstreamError('Failed to save collection');
    console.log(`[COLLECTIONS] Created collection ${result.id}: ${result.name}`);
    return result;
  }

  async rename(id: number, rawName: unknown): Promise<Collection> {
    const name = requireName(rawName);

    const { result, saved } = await this.reconciler.update('collections', collections => {
      const collection = findCollection(collections, id);
      if (!collection) throw new NotFoundError('Collection not found');
      if (nameTaken(collections, name, collection.id)) {
        throw new ConflictError('Collection name already exists');
      }
      collection.name = name;
      return collection;
    });

    if (!saved.ok) throw new UpstreamError('Failed to save collection');
    console.log(`[COLLECTIONS] Renamed collection ${result.id} to ${result.name}`);
    return result;
  }

  async photos(id: number): Promise<CollectionPhotos> {
    const [collections, photos] = await Promise.all([
      this.reconciler.load('collections'),
      this.reconciler.load('photos'),
    ]);
    const listing = listPhotosByCollection(photos, collections, id);
    console.log(`[COLLECTIONS] Collection ${id} (${listing.collection.name}): ${listing.photos.length} photos`);
    return listing;
  }
}
