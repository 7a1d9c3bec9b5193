/**
 * Metadata Reconciler
 *
 * Moves the photo and collection lists between the remote store and the
 * local cache:
 * - reads try the remote first; a non-empty result is authoritative and
 *   overwrites the local cache, anything else falls back to the cache
 * - writes go to the remote first, then always to the local cache, each
 *   attempt independent of the other
 *
 * Nothing here is atomic across the two stores, and every read re-fetches,
 * so concurrent writers lose updates (last write wins per list).
 */

import type { EmptyRemotePolicy, EntityKind, EntityKinds } from '@lumen/types';
import { collectionsDocumentKey, photosPrefix } from '../config/paths';
import { parseEntityList, toCollection } from '../utils/records';
import { errorMessage } from '../utils/errors';
import type { LocalCacheStore } from './local-cache';
import type { RemoteMetadataStore } from './remote-store';
import { photoFromAsset } from './photo-context';

export interface ReconcilerOptions {
  /** null when remote credentials are missing or the startup check failed */
  remote: RemoteMetadataStore | null;
  cache: LocalCacheStore;
  prefix: string;
  emptyRemotePolicy?: EmptyRemotePolicy;
}

export interface SaveResult {
  /** Remote outcome when configured, otherwise local outcome */
  ok: boolean;
  /** null when no remote write was attempted */
  remote: boolean | null;
  local: boolean;
}

export interface UpdateResult<R> {
  result: R;
  saved: SaveResult;
}

interface KindBinding<K extends EntityKind> {
  loadRemote(remote: RemoteMetadataStore, prefix: string): Promise<EntityKinds[K][]>;
  /** Whole-list remote write; absent for kinds stored per asset */
  saveRemote?(remote: RemoteMetadataStore, prefix: string, entities: ReadonlyArray<EntityKinds[K]>): Promise<void>;
}

const BINDINGS: { [K in EntityKind]: KindBinding<K> } = {
  photos: {
    async loadRemote(remote, prefix) {
      const assets = await remote.listAssets(photosPrefix(prefix));
      return assets
        .map((asset, i) => photoFromAsset(asset, i))
        .sort((a, b) => a.id - b.id);
    },
  },
  collections: {
    async loadRemote(remote, prefix) {
      const json = await remote.downloadDocument(collectionsDocumentKey(prefix));
      if (json === null) return [];
      return parseEntityList(json, toCollection);
    },
    async saveRemote(remote, prefix, entities) {
      await remote.uploadDocument(collectionsDocumentKey(prefix), JSON.stringify(entities, null, 2));
    },
  },
};

export class MetadataReconciler {
  private readonly remote: RemoteMetadataStore | null;
  private readonly cache: LocalCacheStore;
  private readonly prefix: string;
  readonly emptyRemotePolicy: EmptyRemotePolicy;

  constructor(options: ReconcilerOptions) {
    this.remote = options.remote;
    this.cache = options.cache;
    this.prefix = options.prefix;
    this.emptyRemotePolicy = options.emptyRemotePolicy ?? 'fallback';
  }

  isRemoteAvailable(): boolean {
    return this.remote !== null;
  }

  /** Remote store for per-asset operations (upload, context update, delete) */
  get remoteStore(): RemoteMetadataStore | null {
    return this.remote;
  }

  get prefixKey(): string {
    return this.prefix;
  }

  get localCache(): LocalCacheStore {
    return this.cache;
  }

  async load<K extends EntityKind>(kind: K): Promise<EntityKinds[K][]> {
    if (this.remote) {
      const binding: KindBinding<K> = BINDINGS[kind];
      try {
        const entities = await binding.loadRemote(this.remote, this.prefix);
        if (entities.length > 0 || this.emptyRemotePolicy === 'authoritative') {
          console.log(`[RECONCILER] Loaded ${entities.length} ${kind} from remote`);
          await this.cacheQuietly(kind, entities);
          return entities;
        }
        // An empty store and an unreachable one look the same under 'fallback'
        console.log(`[RECONCILER] Remote has no ${kind}, using local cache`);
      } catch (err) {
        console.warn(`[RECONCILER] Remote ${kind} load failed, using local cache:`, errorMessage(err));
      }
    }
    return this.cache.read(kind);
  }

  async save<K extends EntityKind>(kind: K, entities: ReadonlyArray<EntityKinds[K]>): Promise<SaveResult> {
    console.log(`[RECONCILER] Saving ${entities.length} ${kind}...`);
    const binding: KindBinding<K> = BINDINGS[kind];

    let remote: boolean | null = null;
    if (this.remote && binding.saveRemote) {
      try {
        await binding.saveRemote(this.remote, this.prefix, entities);
        remote = true;
      } catch (err) {
        console.error(`[RECONCILER] Remote ${kind} save failed:`, errorMessage(err));
        remote = false;
      }
    }

    const local = await this.mirrorLocal(kind, entities);
    return { ok: remote ?? local, remote, local };
  }

  /**
   * Overwrite the local snapshot only. Used after a per-asset remote write.
   */
  async mirrorLocal<K extends EntityKind>(kind: K, entities: ReadonlyArray<EntityKinds[K]>): Promise<boolean> {
    try {
      await this.cache.write(kind, entities);
      console.log(`[RECONCILER] Local ${kind} cache updated`);
      return true;
    } catch (err) {
      console.error(`[RECONCILER] Local ${kind} save failed:`, errorMessage(err));
      return false;
    }
  }

  /**
   * Read-modify-write of a whole list: load, let mutate change the array in
   * place, save the result. Not atomic; an error thrown by mutate skips the save.
   */
  async update<K extends EntityKind, R>(
    kind: K,
    mutate: (entities: EntityKinds[K][]) => R | Promise<R>
  ): Promise<UpdateResult<R>> {
    const entities = await this.load(kind);
    const result = await mutate(entities);
    const saved = await this.save(kind, entities);
    return { result, saved };
  }

  private async cacheQuietly<K extends EntityKind>(kind: K, entities: ReadonlyArray<EntityKinds[K]>): Promise<void> {
    try {
      await this.cache.write(kind, entities);
    } catch (err) {
      console.warn(`[RECONCILER] Could not refresh local ${kind} cache:`, errorMessage(err));
    }
  }
}
