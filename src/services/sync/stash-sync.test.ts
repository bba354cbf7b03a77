import { beforeEach, describe, expect, test } from 'vitest';
import { PreconditionError } from '../../errors.js';
import { FakeCatalog, FakeClock, FakeMediaManager, catalogEntry, silenceConsole } from '../../testing/fakes.js';
import { syncStash, type StashSyncOptions } from './stash-sync.js';

function options(overrides: Partial<StashSyncOptions> = {}): StashSyncOptions {
  return {
    dryRun: false,
    batchSize: 50,
    batchDelayMs: 0,
    requestDelayMs: 0,
    qualityProfileId: 1,
    tagIds: [],
    clock: new FakeClock(),
    ...overrides,
  };
}

describe('syncStash', () => {
  let manager: FakeMediaManager;

  beforeEach(() => {
    silenceConsole();
    manager = new FakeMediaManager();
  });

  test('adds only linked scenes Whisparr does not have', async () => {
    manager.records = [{ id: 1, title: 'Scene B', stashId: 'b' }];
    const catalog = new FakeCatalog([catalogEntry('1', 'a'), catalogEntry('2', 'b'), catalogEntry('3')]);

    const result = await syncStash(catalog, manager, options());

    expect(result.entries).toEqual({
      considered: 3,
      added: 1,
      skipped: 2,
      skippedFiltered: 1,
      skippedPresent: 1,
      failed: 0,
    });
    expect(result.dryRun).toBe(false);
    expect(manager.addRequests).toEqual([
      { title: 'Scene 1', stashId: 'a', qualityProfileId: 1, rootFolderPath: '/data/scenes', tagIds: [] },
    ]);
  });

  test('a second run adds nothing', async () => {
    const catalog = new FakeCatalog([catalogEntry('1', 'a'), catalogEntry('2', 'b')]);
    await syncStash(catalog, manager, options());

    const again = await syncStash(catalog, manager, options());

    expect(again.entries.added).toBe(0);
    expect(again.entries.skippedPresent).toBe(2);
    expect(manager.addRequests).toHaveLength(2);
  });

  test('dry run reports the same counts without adding anything', async () => {
    manager.records = [{ id: 1, title: 'Scene B', stashId: 'b' }];
    const entries = [catalogEntry('1', 'a'), catalogEntry('2', 'b'), catalogEntry('3'), catalogEntry('4', 'a')];

    const dry = await syncStash(new FakeCatalog(entries), manager, options({ dryRun: true }));
    expect(manager.addRequests).toEqual([]);
    expect(manager.records).toHaveLength(1);

    const live = await syncStash(new FakeCatalog(entries), manager, options());

    expect(dry.dryRun).toBe(true);
    expect(dry.entries).toEqual(live.entries);
    expect(live.entries).toEqual({
      considered: 4,
      added: 1,
      skipped: 3,
      skippedFiltered: 1,
      skippedPresent: 2,
      failed: 0,
    });
  });

  test('a failed add does not stop the run', async () => {
    manager.failingStashIds.add('b');
    const catalog = new FakeCatalog([catalogEntry('1', 'a'), catalogEntry('2', 'b'), catalogEntry('3', 'c')]);

    const result = await syncStash(catalog, manager, options());

    expect(result.entries.added).toBe(2);
    expect(result.entries.failed).toBe(1);
    expect(manager.addRequests.map((request) => request.stashId)).toEqual(['a', 'b', 'c']);
  });

  test('counts an "already exists" reply as present', async () => {
    const catalog = new FakeCatalog([catalogEntry('1', 'a')]);
    const stale = new FakeMediaManager();
    await syncStash(catalog, stale, options());
    // Whisparr now has the scene but the next run's listing misses it
    stale.listRecords = async () => [];

    const result = await syncStash(catalog, stale, options());

    expect(result.entries.skippedPresent).toBe(1);
    expect(result.entries.added).toBe(0);
  });

  test('paces requests and batches', async () => {
    manager.records = [{ id: 1, title: 'Scene B', stashId: 'b' }];
    const clock = new FakeClock();
    const catalog = new FakeCatalog([catalogEntry('1', 'a'), catalogEntry('2', 'b'), catalogEntry('3', 'c')]);

    await syncStash(catalog, manager, options({ batchSize: 2, requestDelayMs: 500, batchDelayMs: 5000, clock }));

    expect(clock.sleeps).toEqual([500, 5000, 500]);
  });

  test('dry run only waits between batches', async () => {
    const clock = new FakeClock();
    const catalog = new FakeCatalog([catalogEntry('1', 'a'), catalogEntry('2', 'b'), catalogEntry('3', 'c')]);

    await syncStash(catalog, manager, options({ dryRun: true, batchSize: 2, requestDelayMs: 500, batchDelayMs: 5000, clock }));

    expect(clock.sleeps).toEqual([5000]);
  });

  test('uses the configured root folder and tags', async () => {
    manager.rootFolders = [];
    const catalog = new FakeCatalog([catalogEntry('1', 'a')]);

    await syncStash(catalog, manager, options({ rootFolderPath: '/custom', tagIds: [4, 5], qualityProfileId: 3 }));

    expect(manager.addRequests).toEqual([
      { title: 'Scene 1', stashId: 'a', qualityProfileId: 3, rootFolderPath: '/custom', tagIds: [4, 5] },
    ]);
  });

  test('fails before reading Stash when Whisparr has no root folder', async () => {
    manager.rootFolders = [];
    const catalog = new FakeCatalog([catalogEntry('1', 'a')]);

    await expect(syncStash(catalog, manager, options())).rejects.toThrow(PreconditionError);
    expect(catalog.calls).toBe(0);
  });

  test('fails when existing scenes cannot be listed', async () => {
    manager.failListRecords = true;
    const catalog = new FakeCatalog([catalogEntry('1', 'a')]);

    await expect(syncStash(catalog, manager, options())).rejects.toThrow('whisparr listRecords failed: HTTP 503');
    expect(manager.addRequests).toEqual([]);
  });
});
