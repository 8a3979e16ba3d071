import type { Track } from './track.js';

export interface ConstraintPolicyOptions {
  maxPerArtist?: number;
  suppressDuplicates?: boolean;
}

export interface MixOptions {
  randomize?: boolean;
  seed?: number;
  maxOutputLength?: number;
}

export type RejectionReason = 'duplicate' | 'artist_cap';

export type RejectionCounts = Record<RejectionReason, number>;

export type MixStatus = 'exhausted' | 'limit_reached' | 'blocked';

export type SourceWarningCode = 'non_positive_weight' | 'empty_playlist';

export interface SourceWarning {
  code: SourceWarningCode;
  playlistId: string;
  message: string;
}

/**
 * `drained`: every track was emitted or disqualified while the playlist still made progress.
 * `blocked`: retired because all of its remaining tracks failed the policy.
 * `open`: still had tracks when the length limit stopped the run.
 * `excluded`: never took part (see warnings).
 */
export type PlaylistOutcome = 'drained' | 'blocked' | 'open' | 'excluded';

export interface PlaylistMixSummary {
  playlistId: string;
  weight: number;
  emitted: number;
  rejected: RejectionCounts;
  outcome: PlaylistOutcome;
}

export interface MixResult {
  tracks: readonly Track[];
  status: MixStatus;
  warnings: SourceWarning[];
  rejections: RejectionCounts;
  playlists: PlaylistMixSummary[];
  /** Seed used by a randomized run, so it can be replayed. */
  seed?: number;
}
