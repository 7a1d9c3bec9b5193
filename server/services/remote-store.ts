/**
 * Remote Metadata Store contract
 *
 * The gallery keeps photo attributes as key/value context on each uploaded
 * asset and the collection list as one JSON document at a fixed key.
 * S3MetadataStore implements this against an S3-compatible bucket; tests use
 * an in-memory implementation.
 */

/** Key/value metadata attached to an asset. Every write replaces it whole. */
export type AssetContext = Record<string, string>;

export interface RemoteAsset {
  assetId: string;
  url: string;
  context: AssetContext;
  /** ISO-8601 time the asset was stored */
  createdAt: string;
}

export interface AssetUpload {
  key: string;
  body: Buffer;
  contentType: string;
  context: AssetContext;
}

export interface UploadedAsset {
  assetId: string;
  url: string;
}

export interface RemoteMetadataStore {
  /** All assets under a key prefix, with their context */
  listAssets(prefix: string): Promise<RemoteAsset[]>;
  uploadAsset(upload: AssetUpload): Promise<UploadedAsset>;
  /** Replace an asset's context in place */
  updateContext(assetId: string, context: AssetContext): Promise<void>;
  deleteAsset(assetId: string): Promise<void>;
  uploadDocument(key: string, json: string): Promise<void>;
  /** null when nothing is stored at key */
  downloadDocument(key: string): Promise<string | null>;
  /** Throws when the store cannot be reached with the configured credentials */
  ping(): Promise<void>;
}
