/**
 * Local Cache Store
 *
 * Last-known-good snapshots of the photo and collection lists, one JSON file
 * each, always read and written whole.
 */

import fs from 'fs';
import fsPromises from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { EntityKind, EntityKinds } from '@lumen/types';
import { cacheFilePath } from '../config/paths';
import { parseEntityList, toCollection, toPhoto } from '../utils/records';
import { errorMessage } from '../utils/errors';

const NARROWERS: { [K in EntityKind]: (raw: unknown) => EntityKinds[K] | null } = {
  photos: toPhoto,
  collections: toCollection,
};

export class LocalCacheStore {
  constructor(private readonly dataDir: string) {}

  filePath(kind: EntityKind): string {
    return cacheFilePath(this.dataDir, kind);
  }

  exists(kind: EntityKind): boolean {
    return fs.existsSync(this.filePath(kind));
  }

  /**
   * Read a snapshot. A missing or unreadable file is an empty snapshot.
   */
  async read<K extends EntityKind>(kind: K): Promise<EntityKinds[K][]> {
    const file = this.filePath(kind);
    let json: string;
    try {
      json = await fsPromises.readFile(file, 'utf-8');
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') {
        console.log(`[CACHE] No local ${kind} snapshot at ${file}`);
      } else {
        console.error(`[CACHE] Could not read ${file}:`, error.message);
      }
      return [];
    }

    try {
      const narrow: (raw: unknown) => EntityKinds[K] | null = NARROWERS[kind];
      const entities = parseEntityList(json, narrow);
      console.log(`[CACHE] Loaded ${entities.length} ${kind} from local cache`);
      return entities;
    } catch (err) {
      console.error(`[CACHE] Ignoring unparseable ${file}:`, errorMessage(err));
      return [];
    }
  }

  /**
   * Overwrite a snapshot. Throws on I/O failure; callers decide whether it matters.
   *
   * The JSON goes to a temp file in the same directory and is renamed over the
   * target, so overlapping writers leave one complete snapshot, never a mix.
   */
  async write<K extends EntityKind>(kind: K, entities: ReadonlyArray<EntityKinds[K]>): Promise<void> {
    const file = this.filePath(kind);
    const tmp = path.join(this.dataDir, `.${path.basename(file)}.${uuidv4()}.tmp`);
    await fsPromises.mkdir(this.dataDir, { recursive: true });
    try {
      await fsPromises.writeFile(tmp, JSON.stringify(entities, null, 2), 'utf-8');
      await fsPromises.rename(tmp, file);
    } catch (err) {
      await fsPromises.rm(tmp, { force: true });
      throw err;
    }
  }
}
