import { describe, expect, it } from 'vitest';
import { OperationLock } from '../../src/services/operation-lock.js';

describe('OperationLock', () => {
  const now = () => new Date('2026-03-01T10:00:00.000Z');

  it('starts idle and reports the running operation while held', () => {
    const lock = new OperationLock({ now });
    expect(lock.getState('/srv/docs')).toEqual({ state: 'idle' });

    const lease = lock.acquire('/srv/docs', 'backup', 'op-1');

    expect(lease.target).toBe('/srv/docs');
    expect(lock.getState('/srv/docs/')).toEqual({
      state: 'running',
      kind: 'backup',
      operationId: 'op-1',
      since: '2026-03-01T10:00:00.000Z',
    });
  });

  it('rejects a second acquire on the same target and keeps the holder', () => {
    const lock = new OperationLock({ now });
    lock.acquire('/srv/docs', 'backup', 'op-1');

    expect(() => lock.acquire('/srv/docs', 'restore', 'op-2')).toThrowError(
      'A backup operation is already running on /srv/docs (since 2026-03-01T10:00:00.000Z).',
    );
    expect(lock.getState('/srv/docs')).toMatchObject({ operationId: 'op-1' });
  });

  it('returns to idle on release and ignores a second release', () => {
    const lock = new OperationLock({ now });
    const first = lock.acquire('/srv/docs', 'backup', 'op-1');
    first.release();
    const second = lock.acquire('/srv/docs', 'restore', 'op-2');

    first.release();

    expect(lock.getState('/srv/docs')).toMatchObject({ kind: 'restore', operationId: 'op-2' });
    second.release();
    expect(lock.getState('/srv/docs')).toEqual({ state: 'idle' });
  });

  it('keeps separate targets independent', () => {
    const lock = new OperationLock({ now });
    lock.acquire('/srv/docs', 'backup', 'op-1');

    expect(() => lock.acquire('/srv/other', 'backup', 'op-2')).not.toThrow();
  });
});
