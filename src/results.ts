import type { CatalogEntry } from './services/stash/types.js';

export type EntryOutcome =
  | { kind: 'added'; entry: CatalogEntry }
  | { kind: 'skipped-present'; entry: CatalogEntry }
  | { kind: 'skipped-filtered'; entry: CatalogEntry }
  | { kind: 'failed'; entry: CatalogEntry; error: string };

export type FileOutcome =
  | { kind: 'imported'; path: string; movieId: number }
  | { kind: 'unmatched'; path: string; reasons: string[] }
  | { kind: 'failed'; path: string; matched: boolean; error: string };

export interface EntryCounts {
  considered: number;
  added: number;
  skipped: number;
  skippedFiltered: number;
  skippedPresent: number;
  failed: number;
}

export interface FileCounts {
  folders: number;
  scanned: number;
  matched: number;
  unmatched: number;
  imported: number;
  failed: number;
}

export interface RunResult {
  dryRun: boolean;
  entries: EntryCounts;
  files: FileCounts;
}

export function emptyRunResult(dryRun: boolean): RunResult {
  return {
    dryRun,
    entries: { considered: 0, added: 0, skipped: 0, skippedFiltered: 0, skippedPresent: 0, failed: 0 },
    files: { folders: 0, scanned: 0, matched: 0, unmatched: 0, imported: 0, failed: 0 },
  };
}

export function tallyEntries(outcomes: readonly EntryOutcome[]): EntryCounts {
  const counts: EntryCounts = {
    considered: outcomes.length,
    added: 0,
    skipped: 0,
    skippedFiltered: 0,
    skippedPresent: 0,
    failed: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'added':
        counts.added++;
        break;
      case 'skipped-present':
        counts.skippedPresent++;
        counts.skipped++;
        break;
      case 'skipped-filtered':
        counts.skippedFiltered++;
        counts.skipped++;
        break;
      case 'failed':
        counts.failed++;
        break;
    }
  }

  return counts;
}

export function tallyFiles(outcomes: readonly FileOutcome[], folders: number): FileCounts {
  const counts: FileCounts = {
    folders,
    scanned: outcomes.length,
    matched: 0,
    unmatched: 0,
    imported: 0,
    failed: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'imported':
        counts.matched++;
        counts.imported++;
        break;
      case 'unmatched':
        counts.unmatched++;
        break;
      case 'failed':
        if (outcome.matched) counts.matched++;
        counts.failed++;
        break;
    }
  }

  return counts;
}

const ENTRY_KEYS = [
  'considered',
  'added',
  'skipped',
  'skippedFiltered',
  'skippedPresent',
  'failed',
] as const satisfies ReadonlyArray<keyof EntryCounts>;

const FILE_KEYS = [
  'folders',
  'scanned',
  'matched',
  'unmatched',
  'imported',
  'failed',
] as const satisfies ReadonlyArray<keyof FileCounts>;

export function mergeRunResults(results: readonly RunResult[], dryRun: boolean): RunResult {
  const merged = emptyRunResult(dryRun);
  for (const result of results) {
    for (const key of ENTRY_KEYS) {
      merged.entries[key] += result.entries[key];
    }
    for (const key of FILE_KEYS) {
      merged.files[key] += result.files[key];
    }
  }
  return merged;
}
