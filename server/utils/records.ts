/**
 * Narrowing helpers for entity lists read back from JSON
 * (local cache files and the remote collections document).
 */

import type { Collection, CollectionRef, Photo } from '@lumen/types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse an integer from a number or a decimal string; null otherwise
 */
export function toInt(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number(value.trim());
  return null;
}

function str(rec: Record<string, unknown>, key: string, fallback: string): string {
  const v = rec[key];
  return typeof v === 'string' ? v : fallback;
}

function nullableStr(rec: Record<string, unknown>, key: string): string | null {
  const v = rec[key];
  return typeof v === 'string' && v !== '' ? v : null;
}

/**
 * Keep collection_id in whichever form it was stored (3 or "3");
 * comparisons go through canonicalId.
 */
function collectionRef(value: unknown): CollectionRef {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return value;
  return null;
}

export function toPhoto(raw: unknown): Photo | null {
  if (!isRecord(raw)) return null;
  const id = toInt(raw.id);
  if (id === null) return null;

  const photo: Photo = {
    id,
    filename: str(raw, 'filename', 'photo.jpg'),
    title: str(raw, 'title', 'Untitled'),
    description: str(raw, 'description', ''),
    collection_id: collectionRef(raw.collection_id),
    remote_url: nullableStr(raw, 'remote_url'),
    remote_asset_id: nullableStr(raw, 'remote_asset_id'),
    upload_date: str(raw, 'upload_date', ''),
    storage_type: raw.storage_type === 'remote' ? 'remote' : 'local',
  };
  if (typeof raw.original_filename === 'string') {
    photo.original_filename = raw.original_filename;
  }
  return photo;
}

export function toCollection(raw: unknown): Collection | null {
  if (!isRecord(raw)) return null;
  const id = toInt(raw.id);
  if (id === null || typeof raw.name !== 'string') return null;
  return {
    id,
    name: raw.name,
    created_date: str(raw, 'created_date', ''),
  };
}

/**
 * Parse a JSON array, dropping entries that do not narrow to T.
 * Throws on malformed JSON or a non-array document.
 */
export function parseEntityList<T>(json: string, narrow: (raw: unknown) => T | null): T[] {
  const data: unknown = JSON.parse(json);
  if (!Array.isArray(data)) {
    throw new Error('Expected a JSON array');
  }
  const out: T[] = [];
  for (const item of data) {
    const entity = narrow(item);
    if (entity) out.push(entity);
  }
  return out;
}
