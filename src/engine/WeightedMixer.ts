import { MixOptionsSchema } from './schema.js';
import { MixRunState } from './MixRunState.js';
import { ConstraintPolicy } from './ConstraintPolicy.js';
import { ConfigurationError } from '../types/errors.js';
import { createSeededRng, generateSeed, randomIndex, type RandomSource } from '../utils/random.js';
import type {
  MixOptions,
  MixResult,
  MixStatus,
  Playlist,
  PlaylistOutcome,
  RejectionCounts,
  RejectionReason,
  SourceWarning,
  Track,
} from '../types/index.js';

/** Credits closer than this fraction of the total active share count as a tie. */
const TIE_TOLERANCE = 1e-9;

interface Lane {
  playlist: Playlist;
  /** Weight divided by the largest active weight, so credits stay small and finite. */
  share: number;
  credit: number;
  /** Candidates not yet emitted or disqualified; randomized runs shuffle this in place. */
  pool: Track[];
  remaining: number;
  emitted: number;
  rejected: RejectionCounts;
  outcome: PlaylistOutcome;
}

function emptyRejections(): RejectionCounts {
  return { duplicate: 0, artist_cap: 0 };
}

/**
 * Interleaves playlists by smooth weighted round-robin.
 *
 * Every round each active playlist earns its weight, scaled by the largest
 * active weight, in credit; the richest one (first declared on ties) emits its
 * next acceptable track and pays back the total it was earned against. A playlist with nothing acceptable left is retired and
 * the round is re-run among the others without earning new credit.
 */
export class WeightedMixer {
  mix(playlists: readonly Playlist[], policy: ConstraintPolicy = new ConstraintPolicy(), options: MixOptions = {}): MixResult {
    const parsed = MixOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message).join('; '), {
        options,
      });
    }
    const { randomize, maxOutputLength } = parsed.data;
    this.validatePlaylists(playlists);

    const seed = randomize ? parsed.data.seed ?? generateSeed() : undefined;
    const rng = seed !== undefined ? createSeededRng(seed) : undefined;

    const warnings: SourceWarning[] = [];
    const lanes = playlists.map((playlist) => this.createLane(playlist, warnings));
    const active = lanes.filter((lane) => lane.outcome !== 'excluded');
    const largestWeight = Math.max(...active.map((lane) => lane.playlist.weight));
    for (const lane of active) {
      lane.share = lane.playlist.weight / largestWeight;
    }

    const state = new MixRunState();
    const output: Track[] = [];
    let status: MixStatus = 'exhausted';

    while (active.length > 0) {
      if (maxOutputLength !== undefined && output.length >= maxOutputLength) {
        status = 'limit_reached';
        active.forEach((lane) => (lane.outcome = 'open'));
        break;
      }

      for (const lane of active) {
        lane.credit += lane.share;
      }

      let emitted = false;
      while (active.length > 0 && !emitted) {
        const lane = this.selectLane(active);
        const track = this.takeCandidate(lane, policy, state, rng);

        if (!track) {
          lane.outcome = 'blocked';
          active.splice(active.indexOf(lane), 1);
          continue;
        }

        lane.credit -= this.totalShare(active);
        lane.emitted++;
        state.record(track);
        output.push(track);
        emitted = true;

        if (lane.remaining === 0) {
          lane.outcome = 'drained';
          active.splice(active.indexOf(lane), 1);
        }
      }

      if (!emitted) {
        status = 'blocked';
      }
    }

    const rejections = emptyRejections();
    for (const lane of lanes) {
      rejections.duplicate += lane.rejected.duplicate;
      rejections.artist_cap += lane.rejected.artist_cap;
    }

    return {
      tracks: Object.freeze(output),
      status,
      warnings,
      rejections,
      playlists: lanes.map((lane) => ({
        playlistId: lane.playlist.id,
        weight: lane.playlist.weight,
        emitted: lane.emitted,
        rejected: lane.rejected,
        outcome: lane.outcome,
      })),
      ...(seed !== undefined ? { seed } : {}),
    };
  }

  private validatePlaylists(playlists: readonly Playlist[]): void {
    if (playlists.length === 0) {
      throw new ConfigurationError('At least one playlist is required');
    }

    const seen = new Set<string>();
    for (const playlist of playlists) {
      if (seen.has(playlist.id)) {
        throw new ConfigurationError(`Duplicate playlist id "${playlist.id}"`, { playlistId: playlist.id });
      }
      seen.add(playlist.id);

      if (!Number.isFinite(playlist.weight)) {
        throw new ConfigurationError(`Weight of playlist "${playlist.id}" must be a finite number`, {
          playlistId: playlist.id,
          weight: playlist.weight,
        });
      }
    }
  }

  private createLane(playlist: Playlist, warnings: SourceWarning[]): Lane {
    const lane: Lane = {
      playlist,
      share: 0,
      credit: 0,
      pool: [...playlist.tracks],
      remaining: playlist.tracks.length,
      emitted: 0,
      rejected: emptyRejections(),
      outcome: 'drained',
    };

    if (playlist.weight <= 0) {
      lane.outcome = 'excluded';
      warnings.push({
        code: 'non_positive_weight',
        playlistId: playlist.id,
        message: `Playlist "${playlist.id}" has weight ${playlist.weight} and is excluded from the mix`,
      });
    } else if (playlist.tracks.length === 0) {
      lane.outcome = 'excluded';
      warnings.push({
        code: 'empty_playlist',
        playlistId: playlist.id,
        message: `Playlist "${playlist.id}" has no tracks and is excluded from the mix`,
      });
    }

    return lane;
  }

  /** Highest credit wins; within the tie tolerance the first-declared playlist keeps it. */
  private selectLane(active: readonly Lane[]): Lane {
    const tolerance = TIE_TOLERANCE * this.totalShare(active);
    let best = active[0];
    for (const lane of active) {
      if (lane.credit - best.credit > tolerance) {
        best = lane;
      }
    }
    return best;
  }

  private totalShare(active: readonly Lane[]): number {
    return active.reduce((sum, lane) => sum + lane.share, 0);
  }

  /**
   * Pulls candidates until one is accepted. Rejected tracks are dropped for good:
   * the emitted set and artist counts only grow, so a rejection never reverses.
   */
  private takeCandidate(
    lane: Lane,
    policy: ConstraintPolicy,
    state: MixRunState,
    rng: RandomSource | undefined
  ): Track | undefined {
    while (lane.remaining > 0) {
      const index = rng ? randomIndex(rng, lane.remaining) : lane.pool.length - lane.remaining;
      const track = lane.pool[index];
      if (rng) {
        lane.pool[index] = lane.pool[lane.remaining - 1];
      }
      lane.remaining--;

      const reason: RejectionReason | null = policy.evaluate(track, state);
      if (reason === null) {
        return track;
      }
      lane.rejected[reason]++;
    }

    return undefined;
  }
}

export function mixPlaylists(
  playlists: readonly Playlist[],
  policy?: ConstraintPolicy,
  options?: MixOptions
): MixResult {
  return new WeightedMixer().mix(playlists, policy, options);
}
