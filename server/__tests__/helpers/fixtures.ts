import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Collection, EmptyRemotePolicy, Photo } from '@lumen/types';
import { LocalCacheStore } from '../../services/local-cache';
import { MetadataReconciler } from '../../services/metadata-reconciler';
import { InMemoryRemoteStore } from './in-memory-remote-store';

export const PREFIX = 'gallery/';
export const FIXED_NOW = new Date('2024-05-01T10:00:00.000Z');
export const fixedClock = (): Date => FIXED_NOW;

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'lumen-gallery-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Mute the services' console logging for the current test file */
export function silenceConsole(): void {
  beforeAll(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });
  afterAll(() => {
    jest.restoreAllMocks();
  });
}

export interface TestGallery {
  dir: string;
  cache: LocalCacheStore;
  remote: InMemoryRemoteStore | null;
  reconciler: MetadataReconciler;
}

export function makeGallery(options: { remote?: boolean; emptyRemotePolicy?: EmptyRemotePolicy } = {}): TestGallery {
  const dir = makeTempDir();
  const cache = new LocalCacheStore(dir);
  const remote = options.remote === false ? null : new InMemoryRemoteStore();
  const reconciler = new MetadataReconciler({
    remote,
    cache,
    prefix: PREFIX,
    emptyRemotePolicy: options.emptyRemotePolicy,
  });
  return { dir, cache, remote, reconciler };
}

export function makePhoto(overrides: Partial<Photo> = {}): Photo {
  const id = overrides.id ?? 1;
  return {
    id,
    filename: `photo-${id}.jpg`,
    title: `Photo ${id}`,
    description: '',
    collection_id: null,
    remote_url: null,
    remote_asset_id: null,
    upload_date: '2024-01-01T00:00:00.000Z',
    storage_type: 'local',
    ...overrides,
  };
}

export function makeCollection(overrides: Partial<Collection> = {}): Collection {
  const id = overrides.id ?? 1;
  return {
    id,
    name: `Collection ${id}`,
    created_date: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}
