import { S3ServiceException } from '@aws-sdk/client-s3';
import { describe, expect, it } from 'vitest';
import { contentTypeFor, toObjectStoreError } from '../../src/services/s3-object-store.js';
import { ObjectStoreError } from '../../src/types/object-store.js';

function serviceException(name: string, httpStatusCode: number): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: httpStatusCode >= 500 ? 'server' : 'client',
    $metadata: { httpStatusCode },
    message: `${name} happened`,
  });
}

describe('toObjectStoreError', () => {
  it('maps missing keys and buckets to not_found', () => {
    const mapped = toObjectStoreError(serviceException('NoSuchKey', 404), 'site/index.html');

    expect(mapped.kind).toBe('not_found');
    expect(mapped.key).toBe('site/index.html');
    expect(mapped.message).toBe('NoSuchKey: NoSuchKey happened');
    expect(toObjectStoreError(serviceException('NotFound', 404), null).kind).toBe('not_found');
  });

  it('maps credential and permission failures to auth', () => {
    expect(toObjectStoreError(serviceException('AccessDenied', 403), null).kind).toBe('auth');
    expect(toObjectStoreError(serviceException('InvalidAccessKeyId', 403), null).kind).toBe('auth');
    expect(toObjectStoreError(serviceException('SomethingElse', 401), null).kind).toBe('auth');
  });

  it('treats throttling, server errors and unknown failures as transient', () => {
    expect(toObjectStoreError(serviceException('SlowDown', 503), null).kind).toBe('transient');
    expect(toObjectStoreError(serviceException('InternalError', 500), null).kind).toBe('transient');
    expect(toObjectStoreError(new Error('socket hang up'), 'k').message).toBe('socket hang up');
    expect(toObjectStoreError(new Error('socket hang up'), 'k').kind).toBe('transient');
  });

  it('passes an existing ObjectStoreError through', () => {
    const original = new ObjectStoreError('auth', 'denied', 'k');

    expect(toObjectStoreError(original, 'other')).toBe(original);
  });
});

describe('contentTypeFor', () => {
  it('derives the content type from the extension', () => {
    expect(contentTypeFor('site/index.html')).toBe('text/html; charset=utf-8');
    expect(contentTypeFor('site/css/SITE.CSS')).toBe('text/css; charset=utf-8');
    expect(contentTypeFor('site/img/logo.svg')).toBe('image/svg+xml');
    expect(contentTypeFor('site/CNAME')).toBe('application/octet-stream');
  });
});
