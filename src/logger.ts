import pc from 'picocolors';
import type { LogLevel } from './config/index.js';
import type { RunResult } from './results.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const RULE = '═'.repeat(60);

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export const logger = {
  debug(message: string): void {
    if (shouldLog('debug')) console.log(pc.dim(message));
  },
  info(message: string): void {
    if (shouldLog('info')) console.log(message);
  },
  success(message: string): void {
    if (shouldLog('info')) console.log(pc.green(message));
  },
  warn(message: string): void {
    if (shouldLog('warn')) console.warn(pc.yellow(message));
  },
  error(message: string, error?: unknown): void {
    if (!shouldLog('error')) return;
    console.error(pc.red(message));
    if (error instanceof Error && error.stack && minLevel === 'debug') {
      console.error(pc.dim(error.stack));
    }
  },
};

function banner(title: string, lines: string[] = []): void {
  logger.info('');
  logger.info(RULE);
  logger.info(`  ${title}`);
  logger.info(RULE);
  for (const line of lines) {
    logger.info(`  ${line}`);
  }
  if (lines.length > 0) {
    logger.info(RULE);
  }
}

function formatElapsed(ms: number): string {
  const seconds = ms / 1000;
  return `${seconds.toFixed(1)}s (${(seconds / 60).toFixed(1)}min)`;
}

export function logRunStart(options: { timestamp: Date; mode: string; runMode: string; intervalHours: number }): void {
  const lines = [`Mode: ${options.mode}`, `Run Mode: ${options.runMode}`];
  if (options.runMode === 'interval') {
    lines.push(`Interval: every ${options.intervalHours} hours`);
  }
  banner(`Importarr starting - ${options.timestamp.toISOString()}`, lines);
}

export function logRunFinish(timestamp: Date, ok: boolean): void {
  const status = ok ? pc.green('completed') : pc.red('completed with errors');
  banner(`Importarr finished - ${timestamp.toISOString()} (${status})`);
}

export function logStashSyncStart(options: {
  stashUrl: string;
  whisparrUrl: string;
  batchSize: number;
  dryRun: boolean;
  tagIds: readonly number[];
}): void {
  const lines = [
    `Stash URL: ${options.stashUrl}`,
    `Whisparr URL: ${options.whisparrUrl}`,
    `Batch Size: ${options.batchSize}`,
    `Dry Run: ${options.dryRun}`,
  ];
  if (options.tagIds.length > 0) {
    lines.push(`Tags to apply: ${options.tagIds.join(', ')}`);
  }
  banner('Stash Sync', lines);
  if (options.dryRun) {
    logger.warn('  DRY RUN - no scenes will be added to Whisparr');
  }
}

export function logStashSyncComplete(result: RunResult, elapsedMs: number): void {
  const { entries } = result;
  const lines = [
    `Duration: ${formatElapsed(elapsedMs)}`,
    `Scenes considered: ${entries.considered}`,
    `Scenes ${result.dryRun ? 'that would be added' : 'added'}: ${entries.added}`,
    `Already in Whisparr: ${entries.skippedPresent}`,
    `Without StashDB ID: ${entries.skippedFiltered}`,
  ];
  if (entries.failed > 0) {
    lines.push(pc.red(`Failed: ${entries.failed}`));
  }
  banner('Stash Sync Complete', lines);
}

export function logImportStart(options: {
  whisparrUrl: string;
  importFolder: string;
  importMode: string;
  batchSize: number;
  dryRun: boolean;
  maxDepth: number;
  maxSubfolders?: number;
}): void {
  const lines = [
    `Whisparr URL: ${options.whisparrUrl}`,
    `Import Folder: ${options.importFolder}`,
    `Import Mode: ${options.importMode}`,
    `Batch Size: ${options.batchSize}`,
    `Dry Run: ${options.dryRun}`,
    `Max Depth: ${options.maxDepth}`,
  ];
  if (options.maxSubfolders !== undefined) {
    lines.push(`Max Subfolders: ${options.maxSubfolders}`);
  }
  banner('File Import', lines);
  if (options.dryRun) {
    logger.warn('  DRY RUN - no files will be moved or copied');
  }
}

export function logImportComplete(result: RunResult, elapsedMs: number): void {
  const { files } = result;
  const lines = [
    `Duration: ${formatElapsed(elapsedMs)}`,
    `Folders processed: ${files.folders}`,
    `Files scanned: ${files.scanned}`,
    `Files matched: ${files.matched}`,
    `Files ${result.dryRun ? 'that would be imported' : 'imported'}: ${files.imported}`,
    `Files left behind (unmatched): ${files.unmatched}`,
  ];
  if (files.failed > 0) {
    lines.push(pc.red(`Failed: ${files.failed}`));
  }
  banner('File Import Complete', lines);
}
