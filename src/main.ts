#!/usr/bin/env node

import pc from 'picocolors';
import { applyCliOverrides, buildProgram, type CliOptions } from './cli.js';
import { loadConfig } from './config/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { logger, setLogLevel } from './logger.js';
import { run } from './runner.js';
import { StashClient } from './services/stash/index.js';
import { WhisparrClient } from './services/whisparr/index.js';

async function main(): Promise<number> {
  const program = buildProgram().parse(process.argv);
  const config = loadConfig(applyCliOverrides(process.env, program.opts<CliOptions>()));
  setLogLevel(config.logLevel);

  const manager = new WhisparrClient({
    url: config.whisparr.url,
    apiKey: config.whisparr.apiKey,
  });
  const index =
    config.mode === 'files'
      ? undefined
      : new StashClient({
          url: config.stash.url,
          apiKey: config.stash.apiKey,
          stashIdEndpoint: config.stash.stashIdEndpoint,
        });

  return run(config, { manager, index });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    logger.info(`\n${signal} received, Importarr stopped`);
    process.exit(0);
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(pc.red(`ERROR: ${error.message}`));
    } else {
      console.error(pc.red('Fatal error:'), errorMessage(error));
    }
    process.exit(1);
  });
