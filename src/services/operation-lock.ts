import path from 'node:path';
import type { LockState, OperationKind } from '../types/backup.js';
import { SiteBackupError } from '../types/errors.js';
import { logWarn } from '../utils/logger.js';

interface HeldLock {
  kind: OperationKind;
  operationId: string;
  since: string;
}

export interface LockLease {
  readonly target: string;
  readonly kind: OperationKind;
  readonly operationId: string;
  /** Returns to `idle`; a second call is a no-op. */
  release(): void;
}

export interface OperationLockOptions {
  now?: () => Date;
}

/**
 * In-process state machine `idle -> running(kind) -> idle`, one per resolved
 * target directory. Not shared across processes.
 */
export class OperationLock {
  readonly #held = new Map<string, HeldLock>();
  readonly #now: () => Date;

  constructor(options: OperationLockOptions = {}) {
    this.#now = options.now ?? (() => new Date());
  }

  /** Throws `operation_in_progress` and leaves the state unchanged when the target is busy. */
  acquire(target: string, kind: OperationKind, operationId: string): LockLease {
    const key = path.resolve(target);
    const current = this.#held.get(key);

    if (current) {
      void logWarn(
        `[Lock] Rejected ${kind} on ${key}: ${current.kind} ${current.operationId} running since ${current.since}.`,
      );
      throw new SiteBackupError(
        'operation_in_progress',
        `A ${current.kind} operation is already running on ${key} (since ${current.since}).`,
        key,
      );
    }

    this.#held.set(key, { kind, operationId, since: this.#now().toISOString() });

    let released = false;
    return {
      target: key,
      kind,
      operationId,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        if (this.#held.get(key)?.operationId === operationId) {
          this.#held.delete(key);
        }
      },
    };
  }

  getState(target: string): LockState {
    const current = this.#held.get(path.resolve(target));
    if (!current) {
      return { state: 'idle' };
    }
    return {
      state: 'running',
      kind: current.kind,
      operationId: current.operationId,
      since: current.since,
    };
  }
}
