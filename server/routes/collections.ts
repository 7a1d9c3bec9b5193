/**
 * Collections Routes
 *
 * Provides endpoints for:
 * - Listing collections with photo counts
 * - Creating and renaming collections (admin)
 * - Listing the photos of one collection
 */

import express, { Request, Response, Router } from 'express';
import type { CollectionService } from '../services/collection-service';
import { requireAdmin } from '../utils/admin-auth';
import { parseIdParam, sendError, sendOk } from '../utils/http';

// Type definitions
interface CollectionBody {
  name?: unknown;
}

export function createCollectionsRouter(collections: CollectionService, adminPassword: string | null): Router {
  const router: Router = express.Router();
  const admin = requireAdmin(adminPassword);

  /**
   * GET /api/collections
   * List all collections, each with photo_count
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      sendOk(res, { collections: await collections.list() });
    } catch (err) {
      sendError(res, 'GET /api/collections', err);
    }
  });

  /**
   * POST /api/collections
   * Create a collection. Body: { name }
   */
  router.post('/', admin, async (req: Request<{}, unknown, CollectionBody>, res: Response) => {
    try {
      const collection = await collections.create(req.body?.name);
      sendOk(res, { collection }, 201);
    } catch (err) {
      sendError(res, 'POST /api/collections', err);
    }
  });

  /**
   * GET /api/collections/:id/photos
   * Photos in one collection, newest first
   */
  router.get('/:id/photos', async (req: Request<{ id: string }>, res: Response) => {
    try {
      const id = parseIdParam(req.params.id, 'collection');
      const { collection, photos } = await collections.photos(id);
      sendOk(res, { photos, collection, total_count: photos.length });
    } catch (err) {
      sendError(res, 'GET /api/collections/:id/photos', err);
    }
  });

  /**
   * PUT /api/collections/:id
   * Rename a collection. Body: { name }
   */
  router.put('/:id', admin, async (req: Request<{ id: string }, unknown, CollectionBody>, res: Response) => {
    try {
      const id = parseIdParam(req.params.id, 'collection');
      const collection = await collections.rename(id, req.body?.name);
      sendOk(res, { collection });
    } catch (err) {
      sendError(res, 'PUT /api/collections/:id', err);
    }
  });

  return router;
}
