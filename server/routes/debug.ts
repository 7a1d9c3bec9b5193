/**
 * Diagnostics Route
 *
 * Reports remote configuration status and record counts. Credential values
 * are never echoed, only whether each is set.
 */

import express, { Request, Response, Router } from 'express';
import type { DiagnosticsReport } from '@lumen/types';
import { describeRemoteEnv } from '../config/gallery-config';
import type { MetadataReconciler } from '../services/metadata-reconciler';
import { sendError, sendOk } from '../utils/http';

type Env = Record<string, string | undefined>;

export function createDebugRouter(reconciler: MetadataReconciler, env: Env = process.env): Router {
  const router: Router = express.Router();

  /**
   * GET /api/debug
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const [photos, collections] = await Promise.all([
        reconciler.load('photos'),
        reconciler.load('collections'),
      ]);
      const remote = reconciler.isRemoteAvailable();
      const report: DiagnosticsReport = {
        remote_configured: remote,
        environment_variables: describeRemoteEnv(env),
        json_file_exists: reconciler.localCache.exists('photos'),
        photos_count: photos.length,
        collections_count: collections.length,
        storage_type: remote ? 'remote' : 'local',
        empty_remote_policy: reconciler.emptyRemotePolicy,
      };
      sendOk(res, report);
    } catch (err) {
      sendError(res, 'GET /api/debug', err);
    }
  });

  return router;
}
