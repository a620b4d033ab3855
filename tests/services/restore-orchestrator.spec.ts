import { mkdir, readdir, rm, symlink } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RestoreOrchestrator } from '../../src/services/restore-orchestrator.js';
import type { PublishHook, TransferSettings } from '../../src/types/backup.js';
import type { ObjectStoreClient } from '../../src/types/object-store.js';
import { InMemoryObjectStore } from '../harness/in-memory-object-store.js';
import { directContext, makeTempDir, readTree, writeTree } from '../harness/site-fixtures.js';

const transfer: TransferSettings = { concurrency: 1, maxAttempts: 3, baseDelayMs: 0 };

describe('RestoreOrchestrator', () => {
  let target: string;
  let store: InMemoryObjectStore;

  beforeEach(async () => {
    target = await makeTempDir('restore');
    store = new InMemoryObjectStore();
    store.seed({ 'site/index.html': 'hello', 'site/css/a.css': 'x', 'site/blog/': '' });
  });

  afterEach(async () => {
    await rm(target, { recursive: true, force: true });
  });

  it('writes every snapshot file into the target', async () => {
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    const outcome = await orchestrator.run(target, 'site', {}, directContext());

    expect(outcome).toEqual({
      bytesTransferred: 6,
      fileCount: 2,
      publishStatus: 'not_configured',
      detail: 'Restored 2 files from site/. Verified 2 files on disk.',
    });
    expect(await readTree(target)).toEqual({ 'css/a.css': 'x', 'index.html': 'hello' });
  });

  it('leaves local files absent from the snapshot in place by default', async () => {
    await writeTree(target, { 'old.html': 'old', 'index.html': 'stale' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    await orchestrator.run(target, 'site', {}, directContext());

    expect(await readTree(target)).toEqual({ 'css/a.css': 'x', 'index.html': 'hello', 'old.html': 'old' });
  });

  it('removes extraneous files and empty directories with clean', async () => {
    await writeTree(target, { 'old.html': 'old', 'stale/page.html': 'gone' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    const outcome = await orchestrator.run(target, 'site', { clean: true }, directContext());

    expect(outcome.detail).toBe('Restored 2 files from site/. Verified 2 files on disk. Removed 3 local paths absent from the snapshot.');
    expect(await readTree(target)).toEqual({ 'css/a.css': 'x', 'index.html': 'hello' });
    expect((await readdir(target)).sort()).toEqual(['css', 'index.html']);
  });

  it('rejects a traversal key before writing anything', async () => {
    store.seed({ 'site/../evil.txt': 'pwned' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    await expect(orchestrator.run(target, 'site', {}, directContext())).rejects.toMatchObject({
      code: 'traversal_rejected',
      path: 'site/../evil.txt',
    });
    expect(store.callCount('get')).toBe(0);
    expect(await readdir(target)).toEqual([]);
  });

  it.skipIf(process.platform === 'win32')('refuses to write through a directory link that leaves the target', async () => {
    const outside = await makeTempDir('restore-outside');
    await symlink(outside, path.join(target, 'assets'));
    store.seed({ 'site/assets/evil.txt': 'pwned' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    await expect(orchestrator.run(target, 'site', {}, directContext())).rejects.toMatchObject({
      code: 'traversal_rejected',
      message: 'Refusing to restore assets/evil.txt: assets is a symbolic link in the target.',
      path: 'site/assets/evil.txt',
    });
    expect(await readdir(outside)).toEqual([]);
    expect(store.callCount('get')).toBe(0);
    await rm(outside, { recursive: true, force: true });
  });

  it.skipIf(process.platform === 'win32')('refuses a link nested below a real directory', async () => {
    const outside = await makeTempDir('restore-outside');
    await mkdir(path.join(target, 'css'));
    await symlink(outside, path.join(target, 'css', 'vendor'));
    store.seed({ 'site/css/vendor/lib.css': 'y' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    await expect(orchestrator.run(target, 'site', {}, directContext())).rejects.toMatchObject({
      code: 'traversal_rejected',
      message: 'Refusing to restore css/vendor/lib.css: css/vendor is a symbolic link in the target.',
    });
    expect(await readdir(outside)).toEqual([]);
    await rm(outside, { recursive: true, force: true });
  });

  it('stops before writing when the deadline passes during a download', async () => {
    await writeTree(target, { 'old.html': 'old' });
    const controller = new AbortController();
    const aborting: ObjectStoreClient = {
      put: (key, body) => store.put(key, body),
      list: (prefix) => store.list(prefix),
      bucketExists: () => store.bucketExists(),
      get: async (key) => {
        const body = await store.get(key);
        if (key === 'site/index.html') controller.abort();
        return body;
      },
    };
    const orchestrator = new RestoreOrchestrator({ store: aborting, transfer });

    await expect(orchestrator.run(target, 'site', { clean: true }, directContext(controller.signal))).rejects.toMatchObject({
      code: 'timeout',
      message: 'Restore deadline passed during the download of site/index.html.',
    });
    expect(await readTree(target)).toEqual({ 'css/a.css': 'x', 'old.html': 'old' });
  });

  it('fails verification when a restored file disappears before the check', async () => {
    const vanishing: ObjectStoreClient = {
      put: (key, body) => store.put(key, body),
      list: (prefix) => store.list(prefix),
      bucketExists: () => store.bucketExists(),
      get: async (key) => {
        if (key === 'site/index.html') await rm(path.join(target, 'css', 'a.css'));
        return store.get(key);
      },
    };
    const orchestrator = new RestoreOrchestrator({ store: vanishing, transfer });

    await expect(orchestrator.run(target, 'site', {}, directContext())).rejects.toMatchObject({
      code: 'partial_download',
      message: 'Verification failed for 1 of 2 files: css/a.css (missing).',
    });
  });

  it('fails with no_snapshot_found when the prefix holds only folder markers', async () => {
    const empty = new InMemoryObjectStore();
    empty.seed({ 'site/': '' });
    await writeTree(target, { 'index.html': 'keep' });
    const orchestrator = new RestoreOrchestrator({ store: empty, transfer });

    await expect(orchestrator.run(target, 'site', { clean: true }, directContext())).rejects.toMatchObject({
      code: 'no_snapshot_found',
    });
    expect(await readTree(target)).toEqual({ 'index.html': 'keep' });
  });

  it('fails with target_missing when the target directory does not exist', async () => {
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    await expect(orchestrator.run(path.join(target, 'missing'), 'site', {}, directContext())).rejects.toMatchObject({
      code: 'target_missing',
    });
    expect(store.callCount('list')).toBe(0);
  });

  it('reports partial_download and keeps files already written', async () => {
    store.failNext('get', { key: 'site/index.html', kind: 'auth' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    await expect(orchestrator.run(target, 'site', {}, directContext())).rejects.toMatchObject({
      code: 'partial_download',
      message:
        'Download of site/index.html failed after 1 attempts: Simulated auth get failure. 1 files were already restored.',
      path: 'site/index.html',
    });
    expect(await readTree(target)).toEqual({ 'css/a.css': 'x' });
  });

  it('retries a transient download failure', async () => {
    store.failNext('get', { key: 'site/index.html', kind: 'transient' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    const outcome = await orchestrator.run(target, 'site', {}, directContext());

    expect(outcome.fileCount).toBe(2);
    expect(store.callCount('get', 'site/index.html')).toBe(2);
  });

  it('maps rejected credentials on listing to configuration', async () => {
    store.failNext('list', { kind: 'auth' });
    const orchestrator = new RestoreOrchestrator({ store, transfer });

    await expect(orchestrator.run(target, 'site', {}, directContext())).rejects.toMatchObject({
      code: 'configuration',
    });
  });

  it('runs the publish hook once after a successful restore', async () => {
    const publish = vi.fn(async () => undefined);
    const hook: PublishHook = { publish };
    const orchestrator = new RestoreOrchestrator({ store, transfer, publishHook: hook });

    const outcome = await orchestrator.run(target, 'site', {}, directContext());

    expect(outcome.publishStatus).toBe('published');
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it('keeps the restore successful when publishing fails', async () => {
    const hook: PublishHook = {
      publish: async () => {
        throw new Error('push rejected');
      },
    };
    const orchestrator = new RestoreOrchestrator({ store, transfer, publishHook: hook });

    const outcome = await orchestrator.run(target, 'site', {}, directContext());

    expect(outcome.publishStatus).toBe('failed');
    expect(outcome.detail).toBe('Restored 2 files from site/. Verified 2 files on disk. Publishing failed; see the log.');
    expect(await readTree(target)).toEqual({ 'css/a.css': 'x', 'index.html': 'hello' });
  });

  it('does not run the publish hook when the restore fails', async () => {
    const publish = vi.fn(async () => undefined);
    store.failNext('get', { key: 'site/css/a.css', kind: 'not_found' });
    const orchestrator = new RestoreOrchestrator({ store, transfer, publishHook: { publish } });

    await expect(orchestrator.run(target, 'site', {}, directContext())).rejects.toMatchObject({
      code: 'partial_download',
    });
    expect(publish).not.toHaveBeenCalled();
  });
});
