import {
  NoSuchKey,
  NotFound,
  S3Client,
  type ServiceInputTypes,
  type ServiceOutputTypes,
} from '@aws-sdk/client-s3';
import type { RemoteStoreConfig } from '../config/gallery-config';
import { S3MetadataStore, decodeContext, encodeContext } from '../services/s3-remote-store';
import { silenceConsole } from './helpers/fixtures';

silenceConsole();

interface SentCommand {
  command: string;
  input: ServiceInputTypes;
}

type Responder = (command: string, input: ServiceInputTypes) => ServiceOutputTypes;

/**
 * S3Client whose requests stop at the first middleware and are answered in process
 */
function fakeClient(respond: Responder): { client: S3Client; calls: SentCommand[] } {
  const client = new S3Client({
    region: 'auto',
    credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
  });
  const calls: SentCommand[] = [];
  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const command = context.commandName ?? '';
      calls.push({ command, input: args.input });
      return { output: respond(command, args.input), response: {} };
    },
    { step: 'initialize', priority: 'high', name: 'inProcessResponder' }
  );
  return { client, calls };
}

const CONFIG: RemoteStoreConfig = {
  bucket: 'photos',
  accessKeyId: 'test-key',
  secretAccessKey: 'test-secret',
  region: 'auto',
  endpoint: null,
  publicUrl: 'https://cdn.test',
};

describe('encodeContext / decodeContext', () => {
  it('URI-encodes values and lowercases keys', () => {
    expect(encodeContext({ title: 'Café été', Collection_ID: '3' })).toEqual({
      title: 'Caf%C3%A9%20%C3%A9t%C3%A9',
      collection_id: '3',
    });
  });

  it('decodes what it encoded', () => {
    const context = { title: 'Sunset / 日没', description: 'a&b=c' };
    expect(decodeContext(encodeContext(context))).toEqual(context);
  });

  it('keeps values that are not valid escapes as they are', () => {
    expect(decodeContext({ title: '100%' })).toEqual({ title: '100%' });
  });

  it('treats missing metadata as an empty context', () => {
    expect(decodeContext(undefined)).toEqual({});
  });
});

describe('S3MetadataStore', () => {
  it('lists every page and reads each object\'s metadata', async () => {
    let page = 0;
    const { client, calls } = fakeClient((command) => {
      if (command === 'ListObjectsV2Command') {
        page += 1;
        return page === 1
          ? { $metadata: {}, Contents: [{ Key: 'gallery/photos/photo_1_a.jpg' }, { Key: 'gallery/photos/' }], NextContinuationToken: 'next' }
          : { $metadata: {}, Contents: [{ Key: 'gallery/photos/photo_2_b.jpg', LastModified: new Date('2024-02-01T00:00:00.000Z') }] };
      }
      return { $metadata: {}, Metadata: { title: 'Caf%C3%A9' } };
    });
    const store = new S3MetadataStore(CONFIG, client);

    const assets = await store.listAssets('gallery/photos/');

    expect(calls.map(c => c.command)).toEqual([
      'ListObjectsV2Command',
      'ListObjectsV2Command',
      'HeadObjectCommand',
      'HeadObjectCommand',
    ]);
    expect(calls[1].input).toMatchObject({ Bucket: 'photos', Prefix: 'gallery/photos/', ContinuationToken: 'next' });
    expect(assets.map(a => [a.assetId, a.url, a.context.title, a.createdAt])).toEqual([
      ['gallery/photos/photo_1_a.jpg', 'https://cdn.test/gallery/photos/photo_1_a.jpg', 'Café', ''],
      ['gallery/photos/photo_2_b.jpg', 'https://cdn.test/gallery/photos/photo_2_b.jpg', 'Café', '2024-02-01T00:00:00.000Z'],
    ]);
  });

  it('skips an object deleted between the listing and its HEAD', async () => {
    const { client } = fakeClient((command, input) => {
      if (command === 'ListObjectsV2Command') {
        return {
          $metadata: {},
          Contents: [{ Key: 'gallery/photos/photo_1_a.jpg' }, { Key: 'gallery/photos/photo_2_b.jpg' }],
        };
      }
      if ('Key' in input && input.Key === 'gallery/photos/photo_1_a.jpg') {
        throw new NotFound({ message: 'Not Found', $metadata: { httpStatusCode: 404 } });
      }
      return { $metadata: {}, Metadata: { id: '2' } };
    });
    const store = new S3MetadataStore(CONFIG, client);

    const assets = await store.listAssets('gallery/photos/');

    expect(assets.map(a => [a.assetId, a.context.id])).toEqual([['gallery/photos/photo_2_b.jpg', '2']]);
  });

  it('fails the listing on other HEAD errors', async () => {
    const { client } = fakeClient((command) => {
      if (command === 'ListObjectsV2Command') {
        return { $metadata: {}, Contents: [{ Key: 'gallery/photos/photo_1_a.jpg' }] };
      }
      throw new Error('socket hang up');
    });
    const store = new S3MetadataStore(CONFIG, client);

    await expect(store.listAssets('gallery/photos/')).rejects.toThrow('socket hang up');
  });

  it('uploads with encoded metadata', async () => {
    const { client, calls } = fakeClient(() => ({ $metadata: {} }));
    const store = new S3MetadataStore(CONFIG, client);

    const uploaded = await store.uploadAsset({
      key: 'gallery/photos/photo_1_a.jpg',
      body: Buffer.from('jpeg'),
      contentType: 'image/jpeg',
      context: { title: 'Café' },
    });

    expect(uploaded).toEqual({
      assetId: 'gallery/photos/photo_1_a.jpg',
      url: 'https://cdn.test/gallery/photos/photo_1_a.jpg',
    });
    expect(calls[0].command).toBe('PutObjectCommand');
    expect(calls[0].input).toMatchObject({
      Bucket: 'photos',
      Key: 'gallery/photos/photo_1_a.jpg',
      ContentType: 'image/jpeg',
      Metadata: { title: 'Caf%C3%A9' },
    });
  });

  it('replaces context by copying the object onto itself', async () => {
    const { client, calls } = fakeClient((command) =>
      command === 'HeadObjectCommand'
        ? { $metadata: {}, ContentType: 'image/png', Metadata: { title: 'Old' } }
        : { $metadata: {} }
    );
    const store = new S3MetadataStore(CONFIG, client);

    await store.updateContext('gallery/photos/photo 1.png', { title: 'New', collection_id: '2' });

    expect(calls.map(c => c.command)).toEqual(['HeadObjectCommand', 'CopyObjectCommand']);
    expect(calls[1].input).toMatchObject({
      Bucket: 'photos',
      Key: 'gallery/photos/photo 1.png',
      CopySource: 'photos/gallery/photos/photo%201.png',
      MetadataDirective: 'REPLACE',
      ContentType: 'image/png',
      Metadata: { title: 'New', collection_id: '2' },
    });
  });

  it('returns null for a missing document', async () => {
    const { client } = fakeClient(() => {
      throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: { httpStatusCode: 404 } });
    });
    const store = new S3MetadataStore(CONFIG, client);

    expect(await store.downloadDocument('gallery/collections_metadata.json')).toBeNull();
  });

  it('propagates other download failures', async () => {
    const { client } = fakeClient(() => {
      throw new Error('socket hang up');
    });
    const store = new S3MetadataStore(CONFIG, client);

    await expect(store.downloadDocument('gallery/collections_metadata.json')).rejects.toThrow('socket hang up');
  });

  it('stores documents as JSON', async () => {
    const { client, calls } = fakeClient(() => ({ $metadata: {} }));
    const store = new S3MetadataStore(CONFIG, client);

    await store.uploadDocument('gallery/collections_metadata.json', '[]');

    expect(calls[0].input).toMatchObject({
      Key: 'gallery/collections_metadata.json',
      Body: '[]',
      ContentType: 'application/json',
    });
  });
});
