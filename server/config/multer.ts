/**
 * Multer configuration module
 *
 * Photo uploads are kept in memory: the buffer goes straight to the remote
 * store and never touches local disk.
 */

import multer, { Multer } from 'multer';
import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a collision-free filename: 32 hex chars + original extension.
 * Files without an extension are stored as jpg.
 */
export function uniqueFilename(originalname: string): string {
  const dot = originalname.lastIndexOf('.');
  const ext = dot >= 0 ? originalname.slice(dot + 1).toLowerCase() : '';
  return `${uuidv4().replace(/-/g, '')}.${ext || 'jpg'}`;
}

/**
 * Single-photo upload, multipart field "photo"
 */
export function createPhotoUpload(maxBytes: number): Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
  });
}
