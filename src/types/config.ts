export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface CLIOptions {
  input?: string;
  output?: string;
  weight?: string[];
  maxPerArtist?: number;
  allowDuplicates?: boolean;
  excludeShared?: boolean;
  randomize?: boolean;
  seed?: number;
  maxLength?: number;
  slice?: string;
  maxTracks?: number;
  name?: string;
  timestamp?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}
