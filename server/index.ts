/**
 * Server entry point
 *
 * Reads configuration, checks the remote store once, and starts listening.
 * A missing or unreachable remote store is not fatal: the gallery runs
 * local-only (reads from the cache, uploads refused).
 */

import { loadConfig, describeRemoteEnv, type GalleryConfig } from './config/gallery-config';
import { LocalCacheStore } from './services/local-cache';
import { MetadataReconciler } from './services/metadata-reconciler';
import type { RemoteMetadataStore } from './services/remote-store';
import { S3MetadataStore } from './services/s3-remote-store';
import { createApp } from './app';
import { errorMessage } from './utils/errors';

async function connectRemote(config: GalleryConfig): Promise<RemoteMetadataStore | null> {
  for (const [name, status] of Object.entries(describeRemoteEnv())) {
    console.log(`[CONFIG] ${name}: ${status}`);
  }
  if (!config.remote) {
    console.warn('[CONFIG] Remote storage not configured, running on local cache only');
    return null;
  }

  const store = new S3MetadataStore(config.remote);
  try {
    await store.ping();
    console.log(`[CONFIG] Connected to bucket ${config.remote.bucket}`);
    return store;
  } catch (err) {
    console.error('[CONFIG] Remote storage check failed, running on local cache only:', errorMessage(err));
    return null;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const remote = await connectRemote(config);
  const reconciler = new MetadataReconciler({
    remote,
    cache: new LocalCacheStore(config.dataDir),
    prefix: config.prefix,
    emptyRemotePolicy: config.emptyRemotePolicy,
  });

  if (!config.adminPassword) {
    console.warn('[CONFIG] ADMIN_PASSWORD not set, all mutating requests will be rejected');
  }

  const app = createApp({ config, reconciler });
  app.listen(config.port, () => {
    console.log(`[SERVER] Listening on port ${config.port}`);
    console.log(`[SERVER] Metadata storage: ${reconciler.isRemoteAvailable() ? 'remote + local cache' : 'local cache'}`);
    console.log(`[SERVER] Cache directory: ${config.dataDir}`);
    if (config.staticDir) console.log(`[SERVER] Static folder: ${config.staticDir}`);
  });
}

main().catch((err: unknown) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
