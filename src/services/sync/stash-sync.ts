import pc from 'picocolors';
import { PreconditionError, errorMessage } from '../../errors.js';
import { logStashSyncComplete, logger } from '../../logger.js';
import { emptyRunResult, tallyEntries, type EntryOutcome, type RunResult } from '../../results.js';
import { batches, systemClock, truncate, type Clock } from '../../utils/index.js';
import type { CatalogEntry, CatalogIndex } from '../stash/types.js';
import type { MediaManager } from '../whisparr/types.js';

export interface StashSyncOptions {
  dryRun: boolean;
  batchSize: number;
  batchDelayMs: number;
  requestDelayMs: number;
  qualityProfileId: number;
  rootFolderPath?: string;
  tagIds: readonly number[];
  clock?: Clock;
}

interface EntryContext {
  manager: MediaManager;
  options: StashSyncOptions;
  rootFolderPath: string;
  knownStashIds: Set<string>;
}

async function resolveRootFolder(manager: MediaManager, configured?: string): Promise<string> {
  if (configured) {
    return configured;
  }

  const folders = await manager.listRootFolders();
  const first = folders.find((folder) => folder.path);
  if (!first) {
    throw new PreconditionError('No root folders found in Whisparr');
  }
  return first.path;
}

function describeEntry(entry: CatalogEntry): void {
  logger.info(`  ${truncate(entry.title)}`);
  if (entry.studio) logger.debug(`    Studio: ${entry.studio}`);
  if (entry.date) logger.debug(`    Date: ${entry.date}`);
  logger.debug(`    StashDB ID: ${entry.stashId ?? '-'}`);
}

/**
 * Decide and, outside dry-run, perform the add for one entry. `requested` is
 * true when a request actually went to Whisparr.
 */
async function syncEntry(
  entry: CatalogEntry,
  context: EntryContext
): Promise<{ outcome: EntryOutcome; requested: boolean }> {
  const { manager, options, knownStashIds } = context;
  const stashId = entry.stashId;

  if (!stashId) {
    return { outcome: { kind: 'skipped-filtered', entry }, requested: false };
  }

  describeEntry(entry);

  if (knownStashIds.has(stashId)) {
    logger.info('    Already exists (skipping)');
    return { outcome: { kind: 'skipped-present', entry }, requested: false };
  }

  if (options.dryRun) {
    logger.info(pc.cyan('    [DRY RUN] Would add scene'));
    knownStashIds.add(stashId);
    return { outcome: { kind: 'added', entry }, requested: false };
  }

  try {
    const result = await manager.addEntry({
      title: entry.title,
      stashId,
      qualityProfileId: options.qualityProfileId,
      rootFolderPath: context.rootFolderPath,
      tagIds: options.tagIds,
    });
    knownStashIds.add(stashId);

    if (result.status === 'exists') {
      logger.info('    Already exists in Whisparr');
      return { outcome: { kind: 'skipped-present', entry }, requested: true };
    }

    logger.success(`    ✓ Added: ${result.record.title}`);
    return { outcome: { kind: 'added', entry }, requested: true };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`    ✗ ${message}`, error);
    return { outcome: { kind: 'failed', entry, error: message }, requested: true };
  }
}

/**
 * Mirror StashDB-linked scenes from Stash into Whisparr. Whisparr's existing
 * scenes are fetched once; anything already there is skipped.
 */
export async function syncStash(
  index: CatalogIndex,
  manager: MediaManager,
  options: StashSyncOptions
): Promise<RunResult> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();

  const rootFolderPath = await resolveRootFolder(manager, options.rootFolderPath);
  logger.info(`Using root folder: ${rootFolderPath}`);

  logger.info('Fetching existing scenes from Whisparr...');
  const records = await manager.listRecords();
  const knownStashIds = new Set(records.flatMap((record) => (record.stashId ? [record.stashId] : [])));
  logger.success(`✓ Found ${records.length} existing scenes in Whisparr (${knownStashIds.size} with StashDB IDs)`);

  logger.info('Fetching scenes from Stash...');
  const entries = await index.listEntries();
  logger.success(`✓ Found ${entries.length} scenes in Stash`);

  const outcomes: EntryOutcome[] = [];
  const eligible: CatalogEntry[] = [];
  for (const entry of entries) {
    if (entry.stashId) {
      eligible.push(entry);
    } else {
      outcomes.push({ kind: 'skipped-filtered', entry });
    }
  }
  logger.info(`  ${eligible.length} with StashDB IDs, ${entries.length - eligible.length} without (ignored)`);

  const context: EntryContext = { manager, options, rootFolderPath, knownStashIds };
  const status = options.dryRun ? ' [DRY RUN]' : '';

  for (const batch of batches(eligible, options.batchSize)) {
    logger.info('');
    logger.info(pc.bold(`[Batch ${batch.index + 1}/${batch.total}] Processing ${batch.items.length} scenes${status}`));

    for (const entry of batch.items) {
      const { outcome, requested } = await syncEntry(entry, context);
      outcomes.push(outcome);

      if (requested && options.requestDelayMs > 0) {
        await clock.sleep(options.requestDelayMs);
      }
    }

    if (batch.index < batch.total - 1 && options.batchDelayMs > 0) {
      logger.info(`Waiting ${options.batchDelayMs / 1000} seconds before next batch...`);
      await clock.sleep(options.batchDelayMs);
    }
  }

  const result: RunResult = {
    ...emptyRunResult(options.dryRun),
    entries: tallyEntries(outcomes),
  };
  logStashSyncComplete(result, clock.now() - startedAt);
  return result;
}
