import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';

dotenv.config();

const logLevels = ['debug', 'info', 'warn', 'error'] as const;

const configSchema = z
  .object({
    mode: z.enum(['both', 'stash', 'files']).default('both'),
    runMode: z.enum(['once', 'interval']).default('once'),
    intervalHours: z.number().positive().default(24),
    dryRun: z.boolean().default(false),
    logLevel: z.enum(logLevels).default('info'),
    whisparr: z.object({
      url: z.string().url(),
      apiKey: z.string().min(1, 'WHISPARR_API_KEY is required'),
      qualityProfileId: z.number().int().positive().default(1),
      rootFolderPath: z.string().optional(),
      tagIds: z.array(z.number().int().nonnegative()).default([]),
    }),
    stash: z.object({
      url: z.string().url(),
      apiKey: z.string(),
      stashIdEndpoint: z.string().min(1).default('stashdb.org'),
      batchSize: z.number().int().positive().default(50),
      batchDelaySeconds: z.number().nonnegative().default(5),
      requestDelaySeconds: z.number().nonnegative().default(0.5),
    }),
    files: z.object({
      importFolder: z.string().min(1),
      importMode: z.enum(['copy', 'move']).default('copy'),
      batchSize: z.number().int().positive().default(50),
      batchDelaySeconds: z.number().nonnegative().default(5),
      subfolderDelaySeconds: z.number().nonnegative().default(5),
      processRootFiles: z.boolean().default(false),
      maxSubfolders: z
        .number()
        .int()
        .nonnegative()
        .optional()
        .transform((value) => (value === 0 ? undefined : value)),
      maxDepth: z.number().int().nonnegative().default(10),
    }),
  })
  .superRefine((value, ctx) => {
    if (value.mode !== 'files' && value.stash.apiKey.trim() === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stash', 'apiKey'],
        message: `STASH_API_KEY is required when IMPORTARR_MODE is "${value.mode}"`,
      });
    }
  });

type Config = z.infer<typeof configSchema>;
type LogLevel = Config['logLevel'];
type ImportMode = Config['files']['importMode'];

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value.trim());
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim().toLowerCase() === 'true';
}

function parseIdList(value: string | undefined): number[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number(part));
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Build the run configuration from environment variables. Validation happens
 * once here; engines only ever see the frozen result.
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    mode: emptyToUndefined(env.IMPORTARR_MODE)?.toLowerCase(),
    runMode: emptyToUndefined(env.IMPORTARR_RUN_MODE)?.toLowerCase(),
    intervalHours: parseNumber(env.IMPORTARR_INTERVAL_HOURS),
    dryRun: parseBoolean(env.IMPORTARR_DRY_RUN),
    logLevel: emptyToUndefined(env.IMPORTARR_LOG_LEVEL)?.toLowerCase(),
    whisparr: {
      url: env.WHISPARR_URL || 'http://whisparr:9090',
      apiKey: env.WHISPARR_API_KEY?.trim() || '',
      qualityProfileId: parseNumber(env.WHISPARR_QUALITY_PROFILE_ID),
      rootFolderPath: emptyToUndefined(env.WHISPARR_ROOT_FOLDER_PATH),
      tagIds: parseIdList(env.WHISPARR_TAG_IDS),
    },
    stash: {
      url: env.STASH_URL || 'http://stash:9999',
      apiKey: env.STASH_API_KEY?.trim() || '',
      stashIdEndpoint: emptyToUndefined(env.STASH_ID_ENDPOINT),
      batchSize: parseNumber(env.STASH_BATCH_SIZE),
      batchDelaySeconds: parseNumber(env.STASH_DELAY_BETWEEN_BATCHES),
      requestDelaySeconds: parseNumber(env.STASH_DELAY_BETWEEN_REQUESTS),
    },
    files: {
      importFolder: env.IMPORT_FOLDER || '/import',
      importMode: emptyToUndefined(env.IMPORT_MODE)?.toLowerCase(),
      batchSize: parseNumber(env.FILE_BATCH_SIZE),
      batchDelaySeconds: parseNumber(env.FILE_DELAY_BETWEEN_BATCHES),
      subfolderDelaySeconds: parseNumber(env.FILE_DELAY_BETWEEN_SUBFOLDERS),
      processRootFiles: parseBoolean(env.PROCESS_ROOT_FILES),
      maxSubfolders: parseNumber(env.MAX_SUBFOLDERS),
      maxDepth: parseNumber(env.MAX_DEPTH),
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const config = parsed.data;
  Object.freeze(config.whisparr.tagIds);
  Object.freeze(config.whisparr);
  Object.freeze(config.stash);
  Object.freeze(config.files);
  return Object.freeze(config);
}

export { configSchema, loadConfig, logLevels };
export type { Config, LogLevel, ImportMode };
