import type { Config } from './config/index.js';
import { errorMessage } from './errors.js';
import { logImportStart, logRunFinish, logRunStart, logStashSyncStart, logger } from './logger.js';
import { mergeRunResults, type RunResult } from './results.js';
import { importFiles } from './services/import/file-import.js';
import type { CatalogIndex } from './services/stash/types.js';
import { syncStash } from './services/sync/stash-sync.js';
import type { MediaManager } from './services/whisparr/types.js';
import { secondsToMs, systemClock, type Clock } from './utils/index.js';

export interface RunnerDeps {
  manager: MediaManager;
  index?: CatalogIndex;
  clock?: Clock;
}

export type CycleStep = 'stash' | 'files';

export interface CycleReport {
  ok: boolean;
  result: RunResult;
  failures: Array<{ step: CycleStep; error: string }>;
}

function runsStep(config: Config, step: CycleStep): boolean {
  return config.mode === 'both' || config.mode === step;
}

/**
 * One pass: stash sync, then file import, as the mode allows. A step that
 * throws is logged and recorded; the other step still runs.
 */
export async function runCycle(config: Config, deps: RunnerDeps): Promise<CycleReport> {
  const clock = deps.clock ?? systemClock;
  const results: RunResult[] = [];
  const failures: CycleReport['failures'] = [];

  logRunStart({
    timestamp: new Date(clock.now()),
    mode: config.mode,
    runMode: config.runMode,
    intervalHours: config.intervalHours,
  });

  if (runsStep(config, 'stash')) {
    try {
      if (!deps.index) {
        throw new Error('Stash client is not configured');
      }
      logStashSyncStart({
        stashUrl: config.stash.url,
        whisparrUrl: config.whisparr.url,
        batchSize: config.stash.batchSize,
        dryRun: config.dryRun,
        tagIds: config.whisparr.tagIds,
      });
      results.push(
        await syncStash(deps.index, deps.manager, {
          dryRun: config.dryRun,
          batchSize: config.stash.batchSize,
          batchDelayMs: secondsToMs(config.stash.batchDelaySeconds),
          requestDelayMs: secondsToMs(config.stash.requestDelaySeconds),
          qualityProfileId: config.whisparr.qualityProfileId,
          rootFolderPath: config.whisparr.rootFolderPath,
          tagIds: config.whisparr.tagIds,
          clock,
        })
      );
    } catch (error) {
      logger.error(`ERROR in stash sync: ${errorMessage(error)}`, error);
      failures.push({ step: 'stash', error: errorMessage(error) });
    }
  }

  if (runsStep(config, 'files')) {
    try {
      logImportStart({
        whisparrUrl: config.whisparr.url,
        importFolder: config.files.importFolder,
        importMode: config.files.importMode,
        batchSize: config.files.batchSize,
        dryRun: config.dryRun,
        maxDepth: config.files.maxDepth,
        maxSubfolders: config.files.maxSubfolders,
      });
      results.push(
        await importFiles(deps.manager, config.files.importFolder, {
          dryRun: config.dryRun,
          importMode: config.files.importMode,
          batchSize: config.files.batchSize,
          batchDelayMs: secondsToMs(config.files.batchDelaySeconds),
          subfolderDelayMs: secondsToMs(config.files.subfolderDelaySeconds),
          processRootFiles: config.files.processRootFiles,
          maxDepth: config.files.maxDepth,
          maxSubfolders: config.files.maxSubfolders,
          clock,
        })
      );
    } catch (error) {
      logger.error(`ERROR in file import: ${errorMessage(error)}`, error);
      failures.push({ step: 'files', error: errorMessage(error) });
    }
  }

  const ok = failures.length === 0;
  logRunFinish(new Date(clock.now()), ok);

  return {
    ok,
    result: mergeRunResults(results, config.dryRun),
    failures,
  };
}

/**
 * Run according to `config.runMode`. `once` resolves with exit status 0 after
 * a single cycle, failed or not. `interval` repeats forever, sleeping
 * `intervalHours` between cycles; only a process signal ends it.
 */
export async function run(config: Config, deps: RunnerDeps): Promise<number> {
  const clock = deps.clock ?? systemClock;

  if (config.runMode === 'once') {
    const report = await runCycle(config, deps);
    if (!report.ok) {
      logger.warn(`Run finished with ${report.failures.length} failed step(s)`);
    }
    return 0;
  }

  logger.info(`Scheduling import to run every ${config.intervalHours} hours; first run starts now`);
  const intervalMs = secondsToMs(config.intervalHours * 3600);

  while (true) {
    try {
      await runCycle(config, deps);
    } catch (error) {
      logger.error(`Cycle failed: ${errorMessage(error)}`, error);
    }

    logger.info(`Next run in ${config.intervalHours} hours`);
    await clock.sleep(intervalMs);
  }
}
