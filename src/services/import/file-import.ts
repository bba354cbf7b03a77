import { stat } from 'fs/promises';
import { basename, join, resolve } from 'path';
import pc from 'picocolors';
import type { ImportMode } from '../../config/index.js';
import { FilesystemOperationError, PreconditionError, errorMessage } from '../../errors.js';
import { logImportComplete, logger } from '../../logger.js';
import { emptyRunResult, tallyFiles, type FileOutcome, type RunResult } from '../../results.js';
import { batches, systemClock, type Clock } from '../../utils/index.js';
import type { CandidateMatch, ImportCandidate, MediaManager, TransferredFile } from '../whisparr/types.js';
import { walkDeepestFirst, type FolderNode } from './folder-walker.js';
import { DESTINATION_EXISTS, exists, transferFile } from './transfer.js';

export interface FileImportOptions {
  dryRun: boolean;
  importMode: ImportMode;
  batchSize: number;
  batchDelayMs: number;
  subfolderDelayMs: number;
  processRootFiles: boolean;
  maxDepth: number;
  maxSubfolders?: number;
  clock?: Clock;
}

interface MatchedFile {
  file: string;
  candidate: ImportCandidate;
  match: CandidateMatch;
}

async function assertDirectory(path: string): Promise<void> {
  const info = await stat(path).catch(() => null);
  if (!info?.isDirectory()) {
    throw new PreconditionError(`Import folder does not exist: ${path}`);
  }
}

function logPotentialMatches(candidates: ImportCandidate[]): void {
  if (candidates.length === 0) return;

  logger.info('  Potential matches (no valid ID, cannot import):');
  for (const candidate of candidates.slice(0, 3)) {
    logger.info(`    - ${basename(candidate.path)}`);
    logger.info(`      Scene: ${candidate.potentialTitle}`);
    if (candidate.rejections.length > 0) {
      logger.info(`      Reasons: ${candidate.rejections.join(', ')}`);
    }
  }
  if (candidates.length > 3) {
    logger.info(`    ... and ${candidates.length - 3} more`);
  }
}

async function importBatch(
  items: MatchedFile[],
  manager: MediaManager,
  options: FileImportOptions
): Promise<FileOutcome[]> {
  const outcomes: FileOutcome[] = [];
  const transferred: TransferredFile[] = [];

  for (const { file, candidate, match } of items) {
    if (!match.folderPath) {
      const error = `Whisparr reported no folder for "${match.title}"`;
      logger.error(`    ✗ ${basename(file)}: ${error}`);
      outcomes.push({ kind: 'failed', path: file, matched: true, error });
      continue;
    }

    const destination = join(match.folderPath, basename(file));
    if (options.dryRun) {
      if (await exists(destination)) {
        const { message } = new FilesystemOperationError(file, destination, DESTINATION_EXISTS);
        logger.error(`    ✗ ${message}`);
        outcomes.push({ kind: 'failed', path: file, matched: true, error: message });
        continue;
      }
      logger.debug(`    [DRY RUN] Would ${options.importMode} ${file} -> ${destination}`);
      outcomes.push({ kind: 'imported', path: file, movieId: match.movieId });
      continue;
    }

    try {
      await transferFile(file, destination, options.importMode);
      transferred.push({ source: file, candidate, match, destination });
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`    ✗ ${message}`, error);
      outcomes.push({ kind: 'failed', path: file, matched: true, error: message });
    }
  }

  if (transferred.length === 0) {
    return outcomes;
  }

  try {
    const commandId = await manager.confirmImport(transferred);
    logger.info(`    Import command queued (ID: ${commandId})`);
    for (const { source, match } of transferred) {
      outcomes.push({ kind: 'imported', path: source, movieId: match.movieId });
    }
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`    ✗ Failed to import batch: ${message}`, error);
    for (const { source } of transferred) {
      outcomes.push({ kind: 'failed', path: source, matched: true, error: message });
    }
  }

  return outcomes;
}

async function processFolder(
  node: FolderNode,
  position: number,
  manager: MediaManager,
  options: FileImportOptions,
  clock: Clock
): Promise<FileOutcome[]> {
  const indent = '  '.repeat(Math.max(node.depth - 1, 0));
  logger.info('');
  logger.info(
    pc.bold(`[${position}] ${indent}Processing (depth ${node.depth}, ${node.files.length} files): ${basename(node.path) || node.path}`)
  );

  let candidates: ImportCandidate[];
  try {
    candidates = await manager.scanFolder(node.path);
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`  ✗ Failed to scan folder: ${message}`, error);
    return node.files.map((file): FileOutcome => ({ kind: 'failed', path: file, matched: false, error: message }));
  }

  // Whisparr scans recursively; only this folder's own files are decided here
  const byPath = new Map(candidates.map((candidate) => [resolve(candidate.path), candidate]));
  const outcomes: FileOutcome[] = [];
  const matched: MatchedFile[] = [];
  const potential: ImportCandidate[] = [];

  for (const file of node.files) {
    const candidate = byPath.get(file);
    if (!candidate) {
      outcomes.push({ kind: 'unmatched', path: file, reasons: ['Not offered for import by Whisparr'] });
    } else if (candidate.match) {
      matched.push({ file, candidate, match: candidate.match });
    } else {
      if (candidate.potentialTitle !== undefined) potential.push(candidate);
      outcomes.push({ kind: 'unmatched', path: file, reasons: candidate.rejections });
    }
  }

  const unmatchedCount = outcomes.length - potential.length;
  logger.info(`  ✓ Matched: ${matched.length} | ? Potential: ${potential.length} | ✗ Unmatched: ${unmatchedCount}`);
  logPotentialMatches(potential);

  if (matched.length === 0) {
    logger.info('  Nothing to import from this folder');
    return outcomes;
  }

  const status = options.dryRun ? ' [DRY RUN]' : '';
  for (const batch of batches(matched, options.batchSize)) {
    logger.info(`    Batch ${batch.index + 1}/${batch.total} (${batch.items.length} files)${status}`);
    outcomes.push(...(await importBatch(batch.items, manager, options)));

    if (batch.index < batch.total - 1 && options.batchDelayMs > 0) {
      await clock.sleep(options.batchDelayMs);
    }
  }

  return outcomes;
}

/**
 * Import files under `rootPath` that Whisparr can match to a scene. Folders
 * are handled deepest first; files directly in the root only when
 * `processRootFiles` is set. Unmatched files are never touched.
 */
export async function importFiles(
  manager: MediaManager,
  rootPath: string,
  options: FileImportOptions
): Promise<RunResult> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  const root = resolve(rootPath);

  await assertDirectory(root);

  logger.info('Discovering subfolders recursively (deepest first)...');
  const outcomes: FileOutcome[] = [];
  let folders = 0;

  for await (const node of walkDeepestFirst(root, { maxDepth: options.maxDepth, maxSubfolders: options.maxSubfolders })) {
    if (node.depth === 0 && !options.processRootFiles) {
      if (node.files.length > 0) {
        logger.info(`Skipping ${node.files.length} root-level files (PROCESS_ROOT_FILES is off)`);
      }
      continue;
    }
    if (node.files.length === 0) {
      continue;
    }

    if (folders > 0 && options.subfolderDelayMs > 0) {
      await clock.sleep(options.subfolderDelayMs);
    }
    folders++;
    outcomes.push(...(await processFolder(node, folders, manager, options, clock)));
  }

  if (folders === 0) {
    logger.info('No folders with files to process');
  }

  const result: RunResult = {
    ...emptyRunResult(options.dryRun),
    files: tallyFiles(outcomes, folders),
  };
  logImportComplete(result, clock.now() - startedAt);
  return result;
}
