/**
 * Photo <-> asset context mapping
 */

import type { Photo } from '@lumen/types';
import type { AssetContext, RemoteAsset } from './remote-store';
import { canonicalId } from './collection-linker';
import { toInt } from '../utils/records';

/**
 * Full context for an asset. The remote replaces context wholesale, so every
 * update re-sends all of it.
 */
export function toContext(photo: Photo): AssetContext {
  const context: AssetContext = {
    id: String(photo.id),
    filename: photo.filename,
    title: photo.title,
    description: photo.description,
    collection_id: canonicalId(photo.collection_id) ?? '',
    upload_date: photo.upload_date,
  };
  if (photo.original_filename !== undefined) {
    context.original_filename = photo.original_filename;
  }
  return context;
}

/**
 * Rebuild a Photo from a listed asset.
 * position is the asset's index in the listing; it stands in for a missing id.
 */
export function photoFromAsset(asset: RemoteAsset, position: number): Photo {
  const ctx = asset.context;
  const photo: Photo = {
    id: toInt(ctx.id) ?? position + 1,
    filename: ctx.filename || 'photo.jpg',
    title: ctx.title || 'Untitled',
    description: ctx.description ?? '',
    collection_id: toInt(ctx.collection_id),
    remote_url: asset.url,
    remote_asset_id: asset.assetId,
    upload_date: ctx.upload_date || asset.createdAt,
    storage_type: 'remote',
  };
  if (ctx.original_filename) {
    photo.original_filename = ctx.original_filename;
  }
  return photo;
}
