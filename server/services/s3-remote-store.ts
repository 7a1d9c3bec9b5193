/**
 * S3 Metadata Store
 *
 * RemoteMetadataStore over an S3-compatible bucket (AWS S3, Cloudflare R2, MinIO):
 * - photo context lives in each object's user metadata
 * - context updates copy the object onto itself with MetadataDirective REPLACE
 * - the collections list is a JSON object at a fixed key
 *
 * The client is built with maxAttempts 1: a failed call surfaces immediately
 * and the reconciler decides what to fall back to.
 */

import {
  S3Client,
  S3ServiceException,
  ListObjectsV2Command,
  HeadObjectCommand,
  type HeadObjectCommandOutput,
  HeadBucketCommand,
  PutObjectCommand,
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
} from '@aws-sdk/client-s3';
import type { RemoteStoreConfig } from '../config/gallery-config';
import type {
  AssetContext,
  AssetUpload,
  RemoteAsset,
  RemoteMetadataStore,
  UploadedAsset,
} from './remote-store';

/**
 * S3 user metadata only carries US-ASCII, so values are URI-encoded on the way in
 */
export function encodeContext(context: AssetContext): AssetContext {
  const out: AssetContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key.toLowerCase()] = encodeURIComponent(value);
  }
  return out;
}

export function decodeContext(metadata: Record<string, string> | undefined): AssetContext {
  const out: AssetContext = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    try {
      out[key] = decodeURIComponent(value);
    } catch {
      // written by another tool without encoding
      out[key] = value;
    }
  }
  return out;
}

function isNotFound(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) return false;
  return err.name === 'NoSuchKey' || err.name === 'NotFound' || err.$metadata.httpStatusCode === 404;
}

function copySource(bucket: string, key: string): string {
  return `${bucket}/${key.split('/').map(encodeURIComponent).join('/')}`;
}

export class S3MetadataStore implements RemoteMetadataStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly publicUrl: string;

  constructor(config: RemoteStoreConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.publicUrl = config.publicUrl;
    this.client = client ?? new S3Client({
      region: config.region,
      ...(config.endpoint ? { endpoint: config.endpoint, forcePathStyle: true } : {}),
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      maxAttempts: 1,
    });
  }

  urlFor(key: string): string {
    return `${this.publicUrl}/${key}`;
  }

  async listAssets(prefix: string): Promise<RemoteAsset[]> {
    const keys: Array<{ key: string; lastModified: Date | undefined }> = [];
    let continuationToken: string | undefined;

    do {
      const res = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const obj of res.Contents ?? []) {
        if (obj.Key && !obj.Key.endsWith('/')) {
          keys.push({ key: obj.Key, lastModified: obj.LastModified });
        }
      }
      continuationToken = res.NextContinuationToken;
    } while (continuationToken);

    // Listing does not return user metadata; one HEAD per object does
    const assets = await Promise.all(
      keys.map(async ({ key, lastModified }): Promise<RemoteAsset | null> => {
        let head: HeadObjectCommandOutput;
        try {
          head = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
        } catch (err) {
          // deleted between the listing and the HEAD
          if (isNotFound(err)) {
            console.warn(`[S3] Skipping ${key}: gone before its metadata was read`);
            return null;
          }
          throw err;
        }
        const created = head.LastModified ?? lastModified;
        return {
          assetId: key,
          url: this.urlFor(key),
          context: decodeContext(head.Metadata),
          createdAt: created ? created.toISOString() : '',
        };
      })
    );
    return assets.filter((asset): asset is RemoteAsset => asset !== null);
  }

  async uploadAsset(upload: AssetUpload): Promise<UploadedAsset> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: upload.key,
        Body: upload.body,
        ContentType: upload.contentType,
        Metadata: encodeContext(upload.context),
      })
    );
    console.log(`[S3] Uploaded ${upload.key} (${upload.body.length} bytes)`);
    return { assetId: upload.key, url: this.urlFor(upload.key) };
  }

  async updateContext(assetId: string, context: AssetContext): Promise<void> {
    // REPLACE drops every header not re-supplied, so carry the content type over
    const head = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: assetId }));
    await this.client.send(
      new CopyObjectCommand({
        Bucket: this.bucket,
        Key: assetId,
        CopySource: copySource(this.bucket, assetId),
        MetadataDirective: 'REPLACE',
        ContentType: head.ContentType,
        Metadata: encodeContext(context),
      })
    );
  }

  async deleteAsset(assetId: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: assetId }));
  }

  async uploadDocument(key: string, json: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: json,
        ContentType: 'application/json',
      })
    );
    console.log(`[S3] Stored document ${key} (${json.length} chars)`);
  }

  async downloadDocument(key: string): Promise<string | null> {
    try {
      const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!res.Body) return null;
      return await res.Body.transformToString('utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async ping(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }
}
