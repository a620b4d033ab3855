/**
 * Capability the orchestrators need from remote storage.
 *
 * Implementations must surface failures as {@link ObjectStoreError} so the
 * retry policy can tell transient faults from permanent ones.
 */
export interface ObjectStoreClient {
  put(key: string, body: Buffer, options?: StoreCallOptions): Promise<void>;
  /** Every key starting with `prefix`, in no particular order. */
  list(prefix: string, options?: StoreCallOptions): Promise<string[]>;
  get(key: string, options?: StoreCallOptions): Promise<Buffer>;
  bucketExists(options?: StoreCallOptions): Promise<boolean>;
}

export interface StoreCallOptions {
  /** Abandons the request in flight when aborted. */
  signal?: AbortSignal;
}

export type ObjectStoreErrorKind = 'not_found' | 'transient' | 'auth';

export class ObjectStoreError extends Error {
  readonly kind: ObjectStoreErrorKind;
  readonly key: string | null;

  constructor(kind: ObjectStoreErrorKind, message: string, key: string | null = null) {
    super(message);
    this.name = 'ObjectStoreError';
    this.kind = kind;
    this.key = key;
  }
}

/** Transient and unclassified failures are retried; auth and not-found failures are not. */
export function isRetryableStoreError(error: unknown): boolean {
  if (error instanceof ObjectStoreError) {
    return error.kind === 'transient';
  }
  return true;
}
