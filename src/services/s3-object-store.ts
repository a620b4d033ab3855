import {
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import path from 'node:path';
import type { ObjectStoreClient, StoreCallOptions } from '../types/object-store.js';
import { ObjectStoreError } from '../types/object-store.js';
import { errorMessage } from '../types/errors.js';

export interface S3ObjectStoreConfig {
  bucket: string;
  region: string;
  /** Custom endpoint for S3-compatible services such as Backblaze B2. */
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.json': 'application/json',
  '.map': 'application/json',
  '.xml': 'application/xml',
  '.txt': 'text/plain; charset=utf-8',
  '.md': 'text/markdown; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.avif': 'image/avif',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
  '.otf': 'font/otf',
  '.pdf': 'application/pdf',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mp3': 'audio/mpeg',
  '.wasm': 'application/wasm',
  '.webmanifest': 'application/manifest+json',
};

export function contentTypeFor(key: string): string {
  return CONTENT_TYPES[path.posix.extname(key).toLowerCase()] ?? 'application/octet-stream';
}

const NOT_FOUND_NAMES = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);
const AUTH_NAMES = new Set(['AccessDenied', 'InvalidAccessKeyId', 'SignatureDoesNotMatch', 'Forbidden', 'Unauthorized']);

/** Maps SDK failures onto the capability's error taxonomy; anything unrecognized is transient. */
export function toObjectStoreError(error: unknown, key: string | null): ObjectStoreError {
  if (error instanceof ObjectStoreError) {
    return error;
  }
  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    if (NOT_FOUND_NAMES.has(error.name) || status === 404) {
      return new ObjectStoreError('not_found', `${error.name}: ${error.message}`, key);
    }
    if (AUTH_NAMES.has(error.name) || status === 401 || status === 403) {
      return new ObjectStoreError('auth', `${error.name}: ${error.message}`, key);
    }
    return new ObjectStoreError('transient', `${error.name}: ${error.message}`, key);
  }
  return new ObjectStoreError('transient', errorMessage(error), key);
}

/** {@link ObjectStoreClient} over any S3-compatible endpoint. */
export class S3ObjectStore implements ObjectStoreClient {
  readonly #client: S3Client;
  readonly #bucket: string;

  constructor(config: S3ObjectStoreConfig, client?: S3Client) {
    this.#bucket = config.bucket;
    this.#client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint || undefined,
        forcePathStyle: Boolean(config.endpoint),
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
      });
  }

  async put(key: string, body: Buffer, options: StoreCallOptions = {}): Promise<void> {
    try {
      await this.#client.send(new PutObjectCommand({
        Bucket: this.#bucket,
        Key: key,
        Body: body,
        ContentType: contentTypeFor(key),
      }), { abortSignal: options.signal });
    } catch (error) {
      throw toObjectStoreError(error, key);
    }
  }

  async list(prefix: string, options: StoreCallOptions = {}): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    try {
      do {
        const response = await this.#client.send(new ListObjectsV2Command({
          Bucket: this.#bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        }), { abortSignal: options.signal });
        for (const object of response.Contents ?? []) {
          if (object.Key) {
            keys.push(object.Key);
          }
        }
        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw toObjectStoreError(error, prefix);
    }
    return keys;
  }

  async get(key: string, options: StoreCallOptions = {}): Promise<Buffer> {
    try {
      const response = await this.#client.send(new GetObjectCommand({
        Bucket: this.#bucket,
        Key: key,
      }), { abortSignal: options.signal });
      if (!response.Body) {
        throw new ObjectStoreError('transient', `Empty response body for ${key}.`, key);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      throw toObjectStoreError(error, key);
    }
  }

  async bucketExists(options: StoreCallOptions = {}): Promise<boolean> {
    try {
      await this.#client.send(new HeadBucketCommand({ Bucket: this.#bucket }), { abortSignal: options.signal });
      return true;
    } catch (error) {
      const mapped = toObjectStoreError(error, null);
      if (mapped.kind === 'not_found') {
        return false;
      }
      throw mapped;
    }
  }
}
