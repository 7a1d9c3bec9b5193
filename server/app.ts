/**
 * Express application
 *
 * Mounts the gallery API on /api and, when configured, serves the static
 * front end from STATIC_DIR.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import type { GalleryConfig } from './config/gallery-config';
import type { MetadataReconciler } from './services/metadata-reconciler';
import { CollectionService } from './services/collection-service';
import { PhotoService } from './services/photo-service';
import { createCollectionsRouter } from './routes/collections';
import { createPhotosRouter } from './routes/photos';
import { createDebugRouter } from './routes/debug';
import { GalleryError, PayloadTooLargeError, ValidationError } from './utils/errors';
import { sendError } from './utils/http';

export interface AppDeps {
  config: GalleryConfig;
  reconciler: MetadataReconciler;
  env?: Record<string, string | undefined>;
  now?: () => Date;
}

/**
 * Errors raised before a route handler runs (body parsing, multer limits)
 */
function translateMiddlewareError(err: unknown): unknown {
  if (err instanceof multer.MulterError) {
    return err.code === 'LIMIT_FILE_SIZE'
      ? new PayloadTooLargeError(err.message)
      : new ValidationError(err.message);
  }
  if (err instanceof SyntaxError) {
    return new ValidationError('Malformed JSON body');
  }
  return err;
}

export function createApp({ config, reconciler, env, now }: AppDeps): Express {
  const app = express();
  const collections = new CollectionService(reconciler, now);
  const photos = new PhotoService(reconciler, now);

  app.use(express.json());

  app.use('/api/collections', createCollectionsRouter(collections, config.adminPassword));
  app.use('/api/photos', createPhotosRouter(photos, {
    adminPassword: config.adminPassword,
    uploadMaxBytes: config.uploadMaxBytes,
  }));
  app.use('/api/debug', createDebugRouter(reconciler, env));

  app.use('/api', (_req: Request, res: Response) => {
    sendError(res, 'HTTP', new GalleryError('Not found', 404));
  });

  if (config.staticDir) {
    app.use(express.static(config.staticDir));
  }

  // Express recognizes error middleware by its four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, 'HTTP', translateMiddlewareError(err));
  });

  return app;
}
