import dotenv from 'dotenv';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

dotenv.config();

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): ValidatedAppConfig {
  const rawConfig = {
    paths: {
      inputDir: env.PLAYLIST_INPUT_DIR || 'playlists',
      outputDir: env.MIX_OUTPUT_DIR || 'mixed_playlists',
    },
    mix: {
      maxPerArtist: optionalInt(env.MAX_PER_ARTIST),
      maxOutputLength: optionalInt(env.MAX_OUTPUT_LENGTH),
      suppressDuplicates: env.SUPPRESS_DUPLICATES !== 'false',
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    dryRun: env.DRY_RUN === 'true',
  };

  const parsed = AppConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${parsed.error.message}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export const config = createConfig();

export function printConfigSummary(): void {
  console.log('Configuration Summary:');
  console.log(`- Dry Run: ${config.dryRun ? 'YES' : 'NO'}`);
  console.log(`- Input Folder: ${config.paths.inputDir}`);
  console.log(`- Output Folder: ${config.paths.outputDir}`);
  console.log(`- Max Per Artist: ${config.mix.maxPerArtist ?? 'unlimited'}`);
  console.log(`- Max Output Length: ${config.mix.maxOutputLength ?? 'unlimited'}`);
  console.log(`- Suppress Duplicates: ${config.mix.suppressDuplicates ? 'YES' : 'NO'}`);
  console.log(`- Log Level: ${config.logging.level}`);
}
