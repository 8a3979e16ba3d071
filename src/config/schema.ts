import { z } from 'zod';

export const PathsConfigSchema = z.object({
  inputDir: z.string().min(1, 'Playlist input directory is required'),
  outputDir: z.string().min(1, 'Mix output directory is required'),
});

export const MixDefaultsSchema = z.object({
  maxPerArtist: z.number().int().positive('Max tracks per artist must be a positive integer').optional(),
  maxOutputLength: z.number().int().positive('Max output length must be a positive integer').optional(),
  suppressDuplicates: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const AppConfigSchema = z.object({
  paths: PathsConfigSchema,
  mix: MixDefaultsSchema,
  logging: LoggingConfigSchema,
  dryRun: z.boolean(),
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
