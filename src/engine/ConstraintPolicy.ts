import { ConstraintPolicySchema } from './schema.js';
import { ConfigurationError } from '../types/errors.js';
import type { RunStateView } from './MixRunState.js';
import type { ConstraintPolicyOptions, RejectionReason, Track } from '../types/index.js';

export class ConstraintPolicy {
  readonly maxPerArtist?: number;
  readonly suppressDuplicates: boolean;

  constructor(options: ConstraintPolicyOptions = {}) {
    const parsed = ConstraintPolicySchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message).join('; '), {
        maxPerArtist: options.maxPerArtist,
      });
    }

    this.maxPerArtist = parsed.data.maxPerArtist;
    this.suppressDuplicates = parsed.data.suppressDuplicates;
  }

  /**
   * First reason the candidate may not be emitted, or null when it may.
   * Duplicates are checked before the artist cap.
   */
  evaluate(candidate: Track, state: RunStateView): RejectionReason | null {
    if (this.suppressDuplicates && state.hasEmitted(candidate.dedupKey)) {
      return 'duplicate';
    }

    if (this.maxPerArtist !== undefined && state.artistCount(candidate.artistKey) >= this.maxPerArtist) {
      return 'artist_cap';
    }

    return null;
  }

  accepts(candidate: Track, state: RunStateView): boolean {
    return this.evaluate(candidate, state) === null;
  }

  describe(): string {
    const cap = this.maxPerArtist !== undefined ? `max ${this.maxPerArtist} per artist` : 'no artist cap';
    return `${cap}, duplicates ${this.suppressDuplicates ? 'suppressed' : 'allowed'}`;
  }
}
