/**
 * Photos API Routes
 *
 * Handles photo listing, upload, collection reassignment and delete.
 * Mutations require the admin header.
 */

import express, { Request, Response, Router } from 'express';
import type { PhotoFields, PhotoService } from '../services/photo-service';
import { createPhotoUpload } from '../config/multer';
import { requireAdmin } from '../utils/admin-auth';
import { parseIdParam, sendError, sendOk } from '../utils/http';

interface CollectionAssignmentBody {
  collection_id?: unknown;
}

export interface PhotosRouterOptions {
  adminPassword: string | null;
  uploadMaxBytes: number;
}

export function createPhotosRouter(photos: PhotoService, options: PhotosRouterOptions): Router {
  const router: Router = express.Router();
  const admin = requireAdmin(options.adminPassword);
  const upload = createPhotoUpload(options.uploadMaxBytes);

  // GET /api/photos - All photos with collection_name attached
  router.get('/', async (_req: Request, res: Response) => {
    try {
      sendOk(res, { photos: await photos.list() });
    } catch (err) {
      sendError(res, 'GET /api/photos', err);
    }
  });

  // POST /api/photos - Multipart upload, field "photo" plus title/description/collection_id
  router.post('/', admin, upload.single('photo'), async (req: Request<{}, unknown, PhotoFields>, res: Response) => {
    try {
      const photo = await photos.upload(req.file, req.body ?? {});
      sendOk(res, { photo }, 201);
    } catch (err) {
      sendError(res, 'POST /api/photos', err);
    }
  });

  // PUT /api/photos/:id/collection - Move a photo to a collection, or out of one with null
  router.put(
    '/:id/collection',
    admin,
    async (req: Request<{ id: string }, unknown, CollectionAssignmentBody>, res: Response) => {
      try {
        const id = parseIdParam(req.params.id, 'photo');
        await photos.reassign(id, req.body?.collection_id);
        sendOk(res, {});
      } catch (err) {
        sendError(res, 'PUT /api/photos/:id/collection', err);
      }
    }
  );

  // DELETE /api/photos/:id
  router.delete('/:id', admin, async (req: Request<{ id: string }>, res: Response) => {
    try {
      const id = parseIdParam(req.params.id, 'photo');
      await photos.delete(id);
      sendOk(res, {});
    } catch (err) {
      sendError(res, 'DELETE /api/photos/:id', err);
    }
  });

  return router;
}
