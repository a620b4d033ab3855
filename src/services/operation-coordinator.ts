import { randomUUID } from 'node:crypto';
import type {
  OperationContext,
  OperationKind,
  OperationOutcome,
  OperationRecord,
} from '../types/backup.js';
import { SiteBackupError, errorMessage, type SiteBackupErrorCode } from '../types/errors.js';
import type { MetricsStore } from './metrics-store.js';
import type { OperationLock } from './operation-lock.js';
import { logError, logInfo, scrubSensitiveText } from '../utils/logger.js';

export interface OperationRequest {
  kind: OperationKind;
  targetDir: string;
  remotePrefix: string | null;
  /** 0 or undefined runs without a deadline. */
  timeoutMs?: number;
}

export type OperationBody = (context: OperationContext) => Promise<OperationOutcome>;

export interface OperationCoordinatorOptions {
  lock: OperationLock;
  metrics: MetricsStore;
}

function classify(error: unknown): { code: SiteBackupErrorCode; message: string } {
  if (error instanceof SiteBackupError) {
    return { code: error.code, message: scrubSensitiveText(error.message) };
  }
  return { code: 'internal', message: scrubSensitiveText(errorMessage(error)) };
}

/**
 * Wraps every operation in the same lifecycle: acquire the target lock,
 * append a record, run the body under the deadline, finalize the record
 * and release the lock.
 */
export class OperationCoordinator {
  readonly #lock: OperationLock;
  readonly #metrics: MetricsStore;

  constructor(options: OperationCoordinatorOptions) {
    this.#lock = options.lock;
    this.#metrics = options.metrics;
  }

  /**
   * Resolves with the finalized record whether the body succeeded or failed.
   * Throws `operation_in_progress` (leaving no record) when the target is busy.
   *
   * A body that outlives its deadline is finalized as `timeout` at once, but
   * keeps the lock until it has settled.
   */
  async run(request: OperationRequest, body: OperationBody): Promise<OperationRecord> {
    const operationId = randomUUID();
    const lease = this.#lock.acquire(request.targetDir, request.kind, operationId);
    let bodySettled: Promise<void> | null = null;
    let bodyDone = false;

    try {
      this.#metrics.begin({
        id: operationId,
        kind: request.kind,
        targetDir: lease.target,
        remotePrefix: request.remotePrefix,
      });
      this.#metrics.markRunning(operationId);
      void logInfo(`[Coordinator] ${request.kind} ${operationId} started on ${lease.target}.`);

      const controller = new AbortController();
      const context = this.#context(operationId, lease.target, controller.signal);
      const work = body(context);
      bodySettled = work.then(
        () => {
          bodyDone = true;
        },
        (error: unknown) => {
          bodyDone = true;
          if (controller.signal.aborted) {
            void logInfo(`[Coordinator] ${request.kind} ${operationId} stopped after its deadline: ${errorMessage(error)}`);
          }
        },
      );
      return await this.#execute(operationId, request.kind, work, controller, request.timeoutMs ?? 0);
    } finally {
      if (bodySettled === null || bodyDone) {
        lease.release();
      } else {
        void logInfo(`[Coordinator] ${request.kind} ${operationId} holds ${lease.target} until its body stops.`);
        void bodySettled.then(() => {
          lease.release();
          void logInfo(`[Coordinator] ${request.kind} ${operationId} released ${lease.target}.`);
        });
      }
    }
  }

  #context(operationId: string, targetDir: string, signal: AbortSignal): OperationContext {
    return {
      operationId,
      signal,
      runNested: async (kind, remotePrefix, nestedBody) => {
        const nestedId = randomUUID();
        this.#metrics.begin({ id: nestedId, kind, targetDir, remotePrefix });
        this.#metrics.markRunning(nestedId);
        void logInfo(`[Coordinator] ${kind} ${nestedId} started inside ${operationId}.`);
        const nestedContext = this.#context(nestedId, targetDir, signal);
        return this.#settle(nestedId, kind, nestedBody(nestedContext));
      },
    };
  }

  async #execute(
    operationId: string,
    kind: OperationKind,
    work: Promise<OperationOutcome>,
    controller: AbortController,
    timeoutMs: number,
  ): Promise<OperationRecord> {
    if (timeoutMs <= 0) {
      return this.#settle(operationId, kind, work);
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first so the record carries the deadline, not the body's reaction to the abort.
        reject(new SiteBackupError('timeout', `${kind} exceeded its ${timeoutMs}ms deadline.`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await this.#settle(operationId, kind, Promise.race([work, deadline]));
    } finally {
      clearTimeout(timer);
    }
  }

  async #settle(
    operationId: string,
    kind: OperationKind,
    work: Promise<OperationOutcome>,
  ): Promise<OperationRecord> {
    let finalized: OperationRecord | null;
    try {
      const outcome = await work;
      finalized = this.#metrics.finalize(operationId, {
        status: 'succeeded',
        bytesTransferred: outcome.bytesTransferred,
        fileCount: outcome.fileCount,
        publishStatus: outcome.publishStatus ?? null,
        detail: outcome.detail ?? null,
      });
      void logInfo(
        `[Coordinator] ${kind} ${operationId} succeeded: ${outcome.fileCount} files, ${outcome.bytesTransferred} bytes.`,
      );
    } catch (error) {
      const { code, message } = classify(error);
      finalized = this.#metrics.finalize(operationId, {
        status: 'failed',
        errorCode: code,
        errorMessage: message,
      });
      void logError(`[Coordinator] ${kind} ${operationId} failed (${code}): ${message}`);
    }

    const record = finalized ?? this.#metrics.get(operationId);
    if (!record) {
      throw new Error(`Operation record ${operationId} is missing after finalize.`);
    }
    return record;
  }
}
