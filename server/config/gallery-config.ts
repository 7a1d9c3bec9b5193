/**
 * Gallery Configuration
 *
 * Reads environment variables once into an explicit config object that is
 * handed to the reconciler and the routers at construction.
 */

import path from 'path';
import type { EmptyRemotePolicy } from '@lumen/types';

export interface RemoteStoreConfig {
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  endpoint: string | null;
  /** Base URL assets are delivered from; objects resolve to `${publicUrl}/${key}` */
  publicUrl: string;
}

export interface GalleryConfig {
  port: number;
  dataDir: string;
  staticDir: string | null;
  /** Shared secret for mutating requests. null rejects every mutation. */
  adminPassword: string | null;
  /** null when credentials are incomplete: the gallery runs local-only */
  remote: RemoteStoreConfig | null;
  prefix: string;
  emptyRemotePolicy: EmptyRemotePolicy;
  uploadMaxBytes: number;
}

type Env = Record<string, string | undefined>;

export const REMOTE_ENV_VARS = ['S3_BUCKET', 'S3_ACCESS_KEY_ID', 'S3_SECRET_ACCESS_KEY'] as const;

const DEFAULT_PORT = 5002;
const DEFAULT_UPLOAD_MAX_BYTES = 25 * 1024 * 1024;

export function isUsableEnvValue(v: string | undefined): v is string {
  if (!v || typeof v !== 'string') return false;
  const s = v.trim();
  if (!s) return false;
  if (s.toLowerCase() === 'undefined' || s.toLowerCase() === 'null') return false;
  return true;
}

function readEnv(env: Env, name: string): string | null {
  const v = env[name];
  return isUsableEnvValue(v) ? v.trim() : null;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readEnv(env, name);
  if (raw === null) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Normalize the key prefix so it is either empty or ends with a single slash
 */
export function normalizePrefix(raw: string): string {
  const trimmed = raw.replace(/^\/+|\/+$/g, '');
  return trimmed ? `${trimmed}/` : '';
}

function loadRemoteConfig(env: Env): RemoteStoreConfig | null {
  const bucket = readEnv(env, 'S3_BUCKET');
  const accessKeyId = readEnv(env, 'S3_ACCESS_KEY_ID');
  const secretAccessKey = readEnv(env, 'S3_SECRET_ACCESS_KEY');
  if (!bucket || !accessKeyId || !secretAccessKey) return null;

  const region = readEnv(env, 'S3_REGION') ?? 'auto';
  const endpoint = readEnv(env, 'S3_ENDPOINT');
  const fallbackPublicUrl = endpoint
    ? `${endpoint.replace(/\/+$/, '')}/${bucket}`
    : `https://${bucket}.s3.${region}.amazonaws.com`;
  const publicUrl = (readEnv(env, 'S3_PUBLIC_URL') ?? fallbackPublicUrl).replace(/\/+$/, '');

  return { bucket, accessKeyId, secretAccessKey, region, endpoint, publicUrl };
}

/**
 * Build the gallery configuration from environment variables.
 *
 * Data directory priority:
 * 1. DATA_ROOT - explicit cache folder
 * 2. process working directory
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): GalleryConfig {
  const dataRoot = readEnv(env, 'DATA_ROOT');
  const staticDir = readEnv(env, 'STATIC_DIR');
  const policy = readEnv(env, 'GALLERY_EMPTY_REMOTE_POLICY');

  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    dataDir: dataRoot ? path.resolve(cwd, dataRoot) : cwd,
    staticDir: staticDir ? path.resolve(cwd, staticDir) : null,
    adminPassword: env.ADMIN_PASSWORD ? env.ADMIN_PASSWORD : null,
    remote: loadRemoteConfig(env),
    prefix: normalizePrefix(readEnv(env, 'GALLERY_PREFIX') ?? 'gallery'),
    emptyRemotePolicy: policy === 'authoritative' ? 'authoritative' : 'fallback',
    uploadMaxBytes: readPositiveInt(env, 'UPLOAD_MAX_BYTES', DEFAULT_UPLOAD_MAX_BYTES),
  };
}

/**
 * Report which remote credentials are present without revealing their values
 */
export function describeRemoteEnv(env: Env = process.env): Record<string, 'SET' | 'MISSING'> {
  const status: Record<string, 'SET' | 'MISSING'> = {};
  for (const name of REMOTE_ENV_VARS) {
    status[name] = isUsableEnvValue(env[name]) ? 'SET' : 'MISSING';
  }
  return status;
}
