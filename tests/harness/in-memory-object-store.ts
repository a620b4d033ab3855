import {
  ObjectStoreError,
  type ObjectStoreClient,
  type ObjectStoreErrorKind,
  type StoreCallOptions,
} from '../../src/types/object-store.js';

export type StoreOp = 'put' | 'get' | 'list' | 'bucketExists';

interface ScheduledFault {
  op: StoreOp;
  key: string | null;
  kind: ObjectStoreErrorKind | 'plain';
  remaining: number;
}

/**
 * In-process stand-in for an S3 bucket with scriptable faults. A call's
 * signal cuts its latency short and fails it.
 * Objects are kept as copies so callers cannot mutate stored bodies.
 */
export class InMemoryObjectStore implements ObjectStoreClient {
  readonly objects = new Map<string, Buffer>();
  readonly calls: Array<{ op: StoreOp; key: string | null }> = [];
  bucketPresent = true;
  /** Artificial latency per call, in ms. */
  delayMs = 0;

  #faults: ScheduledFault[] = [];
  #inFlight = 0;
  maxInFlight = 0;

  /**
   * Make the next `times` calls of `op` (optionally for one key) fail.
   * `plain` throws an untyped Error.
   */
  failNext(op: StoreOp, options: { key?: string; kind?: ObjectStoreErrorKind | 'plain'; times?: number } = {}): void {
    this.#faults.push({
      op,
      key: options.key ?? null,
      kind: options.kind ?? 'transient',
      remaining: options.times ?? 1,
    });
  }

  callCount(op: StoreOp, key?: string): number {
    return this.calls.filter((call) => call.op === op && (key === undefined || call.key === key)).length;
  }

  seed(entries: Record<string, string | Buffer>): void {
    for (const [key, body] of Object.entries(entries)) {
      this.objects.set(key, Buffer.from(body));
    }
  }

  async put(key: string, body: Buffer, options: StoreCallOptions = {}): Promise<void> {
    await this.#enter('put', key, options.signal);
    try {
      this.objects.set(key, Buffer.from(body));
    } finally {
      this.#inFlight--;
    }
  }

  async list(prefix: string, options: StoreCallOptions = {}): Promise<string[]> {
    await this.#enter('list', prefix, options.signal);
    this.#inFlight--;
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix));
  }

  async get(key: string, options: StoreCallOptions = {}): Promise<Buffer> {
    await this.#enter('get', key, options.signal);
    this.#inFlight--;
    const body = this.objects.get(key);
    if (!body) {
      throw new ObjectStoreError('not_found', `No such key: ${key}`, key);
    }
    return Buffer.from(body);
  }

  async bucketExists(options: StoreCallOptions = {}): Promise<boolean> {
    await this.#enter('bucketExists', null, options.signal);
    this.#inFlight--;
    return this.bucketPresent;
  }

  async #enter(op: StoreOp, key: string | null, signal?: AbortSignal): Promise<void> {
    this.calls.push({ op, key });
    this.#inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.#inFlight);

    if (this.delayMs > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(done, this.delayMs);
        function done(): void {
          clearTimeout(timer);
          signal?.removeEventListener('abort', done);
          resolve();
        }
        signal?.addEventListener('abort', done, { once: true });
      });
    }
    if (signal?.aborted) {
      this.#inFlight--;
      throw new ObjectStoreError('transient', `Aborted ${op}`, key);
    }

    const fault = this.#faults.find(
      (candidate) => candidate.op === op && candidate.remaining > 0 && (candidate.key === null || candidate.key === key),
    );
    if (fault) {
      fault.remaining--;
      this.#inFlight--;
      if (fault.kind === 'plain') {
        throw new Error(`Simulated ${op} failure`);
      }
      throw new ObjectStoreError(fault.kind, `Simulated ${fault.kind} ${op} failure`, key);
    }
  }
}
