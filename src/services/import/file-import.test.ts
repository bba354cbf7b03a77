import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { PreconditionError, TransportError } from '../../errors.js';
import { FakeClock, FakeMediaManager, matchedCandidate, silenceConsole, unmatchedCandidate } from '../../testing/fakes.js';
import { importFiles, type FileImportOptions } from './file-import.js';

async function touch(path: string, content = 'video'): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

function options(overrides: Partial<FileImportOptions> = {}): FileImportOptions {
  return {
    dryRun: false,
    importMode: 'move',
    batchSize: 50,
    batchDelayMs: 0,
    subfolderDelayMs: 0,
    processRootFiles: false,
    maxDepth: 10,
    clock: new FakeClock(),
    ...overrides,
  };
}

describe('importFiles', () => {
  let dir: string;
  let root: string;
  let library: string;
  let manager: FakeMediaManager;

  // root/
  //   loose.mp4
  //   sceneA/a.mp4         matched to movie 1
  //   sceneA/notes.nfo     rejected
  //   sceneA/extras/x.mp4  matched to movie 2
  const paths = () => ({
    loose: join(root, 'loose.mp4'),
    sceneA: join(root, 'sceneA'),
    a: join(root, 'sceneA', 'a.mp4'),
    notes: join(root, 'sceneA', 'notes.nfo'),
    extras: join(root, 'sceneA', 'extras'),
    x: join(root, 'sceneA', 'extras', 'x.mp4'),
    destA: join(library, 'Scene A', 'a.mp4'),
    destX: join(library, 'Scene X', 'x.mp4'),
  });

  beforeEach(async () => {
    silenceConsole();
    dir = await mkdtemp(join(tmpdir(), 'importarr-import-'));
    root = join(dir, 'import');
    library = join(dir, 'library');
    const p = paths();

    await touch(p.loose, 'loose');
    await touch(p.a, 'a');
    await touch(p.notes, 'notes');
    await touch(p.x, 'x');

    manager = new FakeMediaManager();
    manager.scans.set(p.extras, [matchedCandidate(p.x, 2, join(library, 'Scene X'))]);
    // Whisparr scans recursively, so the parent scan also reports the nested file
    manager.scans.set(p.sceneA, [
      matchedCandidate(p.a, 1, join(library, 'Scene A')),
      unmatchedCandidate(p.notes, ['Not a video file']),
      matchedCandidate(p.x, 2, join(library, 'Scene X')),
    ]);
    manager.scans.set(root, [matchedCandidate(p.loose, 3, join(library, 'Loose'))]);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('moves matched files deepest folder first and leaves the rest', async () => {
    const p = paths();

    const result = await importFiles(manager, root, options());

    expect(result.files).toEqual({ folders: 2, scanned: 3, matched: 2, unmatched: 1, imported: 2, failed: 0 });
    expect(manager.scannedFolders).toEqual([p.extras, p.sceneA]);
    expect(manager.confirmed.map((call) => call.map((file) => [file.source, file.destination]))).toEqual([
      [[p.x, p.destX]],
      [[p.a, p.destA]],
    ]);
    expect(await readFile(p.destX, 'utf8')).toBe('x');
    expect(await readFile(p.destA, 'utf8')).toBe('a');
    expect(existsSync(p.x)).toBe(false);
    expect(existsSync(p.a)).toBe(false);
    expect(existsSync(p.notes)).toBe(true);
    expect(existsSync(p.loose)).toBe(true);
  });

  test('copy mode keeps the sources', async () => {
    const p = paths();

    const result = await importFiles(manager, root, options({ importMode: 'copy' }));

    expect(result.files.imported).toBe(2);
    expect(existsSync(p.destA)).toBe(true);
    expect(existsSync(p.destX)).toBe(true);
    expect(existsSync(p.a)).toBe(true);
    expect(existsSync(p.x)).toBe(true);
  });

  test('dry run touches nothing and reports the same counts', async () => {
    const p = paths();

    const dry = await importFiles(manager, root, options({ dryRun: true }));

    expect(dry.dryRun).toBe(true);
    expect(dry.files).toEqual({ folders: 2, scanned: 3, matched: 2, unmatched: 1, imported: 2, failed: 0 });
    expect(manager.confirmed).toEqual([]);
    expect(existsSync(p.a)).toBe(true);
    expect(existsSync(p.x)).toBe(true);
    expect(existsSync(library)).toBe(false);
  });

  test('dry run fails an occupied destination just like a live run', async () => {
    const p = paths();
    await touch(p.destA, 'existing');

    const dry = await importFiles(manager, root, options({ dryRun: true }));
    expect(existsSync(p.destX)).toBe(false);
    const live = await importFiles(manager, root, options());

    expect(dry.files).toEqual({ folders: 2, scanned: 3, matched: 2, unmatched: 1, imported: 1, failed: 1 });
    expect(live.files).toEqual(dry.files);
    expect(await readFile(p.destA, 'utf8')).toBe('existing');
  });

  test('root files are imported only when enabled', async () => {
    const p = paths();

    const result = await importFiles(manager, root, options({ processRootFiles: true }));

    expect(result.files.folders).toBe(3);
    expect(result.files.imported).toBe(3);
    expect(manager.scannedFolders).toEqual([p.extras, p.sceneA, root]);
    expect(existsSync(join(library, 'Loose', 'loose.mp4'))).toBe(true);
  });

  test('waits between folders but not before the first', async () => {
    const clock = new FakeClock();

    await importFiles(manager, root, options({ subfolderDelayMs: 5000, clock }));

    expect(clock.sleeps).toEqual([5000]);
  });

  test('submits matched files in batches', async () => {
    const p = paths();
    const second = join(p.sceneA, 'b.mp4');
    const third = join(p.sceneA, 'c.mp4');
    await touch(second);
    await touch(third);
    manager.scans.set(p.sceneA, [
      matchedCandidate(p.a, 1, join(library, 'Scene A')),
      matchedCandidate(second, 4, join(library, 'Scene B')),
      matchedCandidate(third, 5, join(library, 'Scene C')),
    ]);
    const clock = new FakeClock();

    const result = await importFiles(manager, root, options({ batchSize: 2, batchDelayMs: 1000, clock }));

    expect(result.files.imported).toBe(4);
    expect(manager.confirmed.map((call) => call.length)).toEqual([1, 2, 1]);
    expect(clock.sleeps).toEqual([1000]);
  });

  test('a failed scan fails that folder only', async () => {
    const p = paths();
    manager.scans.set(p.sceneA, new TransportError('whisparr', 'scanFolder', 'HTTP 500', { status: 500 }));

    const result = await importFiles(manager, root, options());

    expect(result.files).toEqual({ folders: 2, scanned: 3, matched: 1, unmatched: 0, imported: 1, failed: 2 });
    expect(existsSync(p.a)).toBe(true);
    expect(existsSync(p.destX)).toBe(true);
  });

  test('a rejected import command fails the batch', async () => {
    manager.failConfirm = true;

    const result = await importFiles(manager, root, options({ importMode: 'copy' }));

    expect(result.files).toEqual({ folders: 2, scanned: 3, matched: 2, unmatched: 1, imported: 0, failed: 2 });
  });

  test('an occupied destination fails that file and keeps its source', async () => {
    const p = paths();
    await touch(p.destA, 'existing');

    const result = await importFiles(manager, root, options());

    expect(result.files.imported).toBe(1);
    expect(result.files.failed).toBe(1);
    expect(existsSync(p.a)).toBe(true);
    expect(await readFile(p.destA, 'utf8')).toBe('existing');
    expect(manager.confirmed.flat().map((file) => file.source)).toEqual([p.x]);
  });

  test('a match without a scene folder fails that file', async () => {
    const p = paths();
    manager.scans.set(p.extras, [matchedCandidate(p.x, 2)]);

    const result = await importFiles(manager, root, options());

    expect(result.files.failed).toBe(1);
    expect(result.files.imported).toBe(1);
    expect(existsSync(p.x)).toBe(true);
  });

  test('files the scan does not mention are unmatched', async () => {
    const p = paths();
    manager.scans.set(p.extras, []);

    const result = await importFiles(manager, root, options());

    expect(result.files.unmatched).toBe(2);
    expect(existsSync(p.x)).toBe(true);
  });

  test('stops when the import folder is missing', async () => {
    await expect(importFiles(manager, join(dir, 'nowhere'), options())).rejects.toThrow(PreconditionError);
    expect(manager.scannedFolders).toEqual([]);
  });

  describe.each(['move', 'copy'] as const)('deep file with a loose root file (%s)', (importMode) => {
    test('imports only the nested match', async () => {
      const tree = join(dir, 'root');
      const rootFile = join(tree, 'file.mkv');
      const deepFolder = join(tree, 'sub', 'deep');
      const deepFile = join(deepFolder, 'file2.mkv');
      const destination = join(library, 'Deep Scene', 'file2.mkv');
      await touch(rootFile, 'root');
      await touch(deepFile, 'deep');
      const scenes = new FakeMediaManager();
      scenes.scans.set(deepFolder, [matchedCandidate(deepFile, 8, join(library, 'Deep Scene'))]);

      const result = await importFiles(scenes, tree, options({ importMode }));

      expect(result.files).toEqual({ folders: 1, scanned: 1, matched: 1, unmatched: 0, imported: 1, failed: 0 });
      expect(scenes.scannedFolders).toEqual([deepFolder]);
      expect(await readFile(rootFile, 'utf8')).toBe('root');
      expect(await readFile(destination, 'utf8')).toBe('deep');
      expect(existsSync(deepFile)).toBe(importMode === 'copy');
    });
  });
});
