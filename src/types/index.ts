export type { RawTrack, Track } from './track.js';
export type { Playlist, ReadOptions, PlaylistReadResult } from './playlist.js';
export type {
  ConstraintPolicyOptions,
  MixOptions,
  RejectionReason,
  RejectionCounts,
  MixStatus,
  SourceWarningCode,
  SourceWarning,
  PlaylistOutcome,
  PlaylistMixSummary,
  MixResult,
} from './mix.js';
export type { LogLevel, CLIOptions } from './config.js';
