/**
 * Photo Service
 *
 * Photo lifecycle: upload -> (collection reassigned) -> deleted.
 * - upload needs the remote store; there is no local-only upload path
 * - reassignment rewrites the asset's full context, then mirrors locally
 * - delete removes the asset best-effort and always drops the metadata
 */

import type { Photo, PhotoWithCollection } from '@lumen/types';
import { photosPrefix } from '../config/paths';
import { uniqueFilename } from '../config/multer';
import { nextId } from '../utils/id-allocator';
import { toInt } from '../utils/records';
import {
  ConfigurationError,
  NotFoundError,
  UpstreamError,
  ValidationError,
  errorMessage,
} from '../utils/errors';
import type { MetadataReconciler } from './metadata-reconciler';
import { findCollection, withCollectionNames } from './collection-linker';
import { toContext } from './photo-context';

/** The parts of a multer file the service reads */
export interface PhotoFile {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

export interface PhotoFields {
  title?: unknown;
  description?: unknown;
  collection_id?: unknown;
}

/**
 * Parse a client-supplied collection_id. Absent or empty means "no collection".
 */
export function parseCollectionId(raw: unknown): number | null {
  if (raw === undefined || raw === null || raw === '') return null;
  const id = toInt(raw);
  if (id === null) throw new ValidationError('Invalid collection ID format');
  return id;
}

function text(raw: unknown): string {
  return typeof raw === 'string' ? raw.trim() : '';
}

export class PhotoService {
  constructor(
    private readonly reconciler: MetadataReconciler,
    private readonly now: () => Date = () => new Date()
  ) {}

  async list(): Promise<PhotoWithCollection[]> {
    const [photos, collections] = await Promise.all([
      this.reconciler.load('photos'),
      this.reconciler.load('collections'),
    ]);
    return withCollectionNames(photos, collections);
  }

  async upload(file: PhotoFile | undefined, fields: PhotoFields): Promise<Photo> {
    const remote = this.reconciler.remoteStore;
    if (!remote) {
      throw new ConfigurationError('Remote storage not configured');
    }
    if (!file || !file.originalname || file.buffer.length === 0) {
      throw new ValidationError('No photo file provided');
    }

    const collectionId = parseCollectionId(fields.collection_id);
    if (collectionId !== null) {
      await this.requireCollection(collectionId);
    }

    const photos = await this.reconciler.load('photos');
    const id = nextId(photos);
    const filename = uniqueFilename(file.originalname);
    const photo: Photo = {
      id,
      filename,
      original_filename: file.originalname,
      title: text(fields.title) || 'Untitled',
      description: text(fields.description),
      collection_id: collectionId,
      remote_url: null,
      remote_asset_id: null,
      upload_date: this.now().toISOString(),
      storage_type: 'remote',
    };

    console.log(`[PHOTOS] Uploading ${file.originalname} (ID: ${id}, Collection: ${collectionId ?? 'none'})`);
    try {
      const uploaded = await remote.uploadAsset({
        key: `${photosPrefix(this.reconciler.prefixKey)}photo_${id}_${filename}`,
        body: file.buffer,
        contentType: file.mimetype || 'application/octet-stream',
        context: toContext(photo),
      });
      photo.remote_url = uploaded.url;
      photo.remote_asset_id = uploaded.assetId;
    } catch (err) {
      console.error('[PHOTOS] Remote upload failed:', errorMessage(err));
      throw new UpstreamError(`Upload failed: ${errorMessage(err)}`);
    }

    await this.reconciler.mirrorLocal('photos', [...photos, photo]);
    return photo;
  }

  async reassign(photoId: number, rawCollectionId: unknown): Promise<Photo> {
    const collectionId = parseCollectionId(rawCollectionId);
    if (collectionId !== null) {
      await this.requireCollection(collectionId);
    }

    const photos = await this.reconciler.load('photos');
    const index = photos.findIndex(p => p.id === photoId);
    if (index < 0) throw new NotFoundError('Photo not found');

    const updated: Photo = { ...photos[index], collection_id: collectionId };
    const remote = this.reconciler.remoteStore;
    if (remote && updated.remote_asset_id) {
      try {
        await remote.updateContext(updated.remote_asset_id, toContext(updated));
      } catch (err) {
        console.error(`[PHOTOS] Context update failed for photo ${photoId}:`, errorMessage(err));
        throw new UpstreamError('Failed to update photo in remote storage');
      }
    }

    photos[index] = updated;
    await this.reconciler.mirrorLocal('photos', photos);
    console.log(`[PHOTOS] Photo ${photoId} -> collection ${collectionId ?? 'none'}`);
    return updated;
  }

  async delete(photoId: number): Promise<Photo> {
    const photos = await this.reconciler.load('photos');
    const photo = photos.find(p => p.id === photoId);
    if (!photo) throw new NotFoundError('Photo not found');

    const remote = this.reconciler.remoteStore;
    if (remote && photo.remote_asset_id) {
      try {
        await remote.deleteAsset(photo.remote_asset_id);
      } catch (err) {
        console.warn(`[PHOTOS] Remote delete failed for photo ${photoId}, removing metadata anyway:`, errorMessage(err));
      }
    }

    await this.reconciler.mirrorLocal('photos', photos.filter(p => p.id !== photoId));
    console.log(`[PHOTOS] Deleted photo ${photoId}: ${photo.title}`);
    return photo;
  }

  private async requireCollection(collectionId: number): Promise<void> {
    const collections = await this.reconciler.load('collections');
    if (!findCollection(collections, collectionId)) {
      throw new NotFoundError('Collection not found');
    }
  }
}
