import { Command, Option } from 'commander';
import { logLevels } from './config/index.js';

export type CliOptions = {
  mode?: string;
  once?: boolean;
  interval?: string;
  dryRun?: boolean;
  importFolder?: string;
  logLevel?: string;
};

export function buildProgram(): Command {
  return new Command()
    .name('importarr')
    .description('Sync Stash scenes into Whisparr and import matching files from a local folder')
    .version('1.0.0')
    .addOption(
      new Option('--mode <mode>', 'which engines run each cycle').choices(['both', 'stash', 'files'])
    )
    .addOption(new Option('--once', 'run a single pass and exit').conflicts('interval'))
    .option('--interval <hours>', 'run every N hours until stopped')
    .option('--dry-run', 'log what would happen without adding scenes or touching files')
    .option('--import-folder <path>', 'root folder to scan for files')
    .addOption(new Option('--log-level <level>', 'minimum log level').choices([...logLevels]));
}

/**
 * Fold command-line flags into an environment map; flags win over the
 * environment and `.env`.
 */
export function applyCliOverrides(env: NodeJS.ProcessEnv, options: CliOptions): NodeJS.ProcessEnv {
  const merged: NodeJS.ProcessEnv = { ...env };

  if (options.mode) merged.IMPORTARR_MODE = options.mode;
  if (options.once) merged.IMPORTARR_RUN_MODE = 'once';
  if (options.interval !== undefined) {
    merged.IMPORTARR_RUN_MODE = 'interval';
    merged.IMPORTARR_INTERVAL_HOURS = options.interval;
  }
  if (options.dryRun) merged.IMPORTARR_DRY_RUN = 'true';
  if (options.importFolder) merged.IMPORT_FOLDER = options.importFolder;
  if (options.logLevel) merged.IMPORTARR_LOG_LEVEL = options.logLevel;

  return merged;
}
