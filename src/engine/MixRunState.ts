import type { Track } from '../types/index.js';

/** Read side of a run's bookkeeping, as seen by the constraint policy. */
export interface RunStateView {
  hasEmitted(dedupKey: string): boolean;
  artistCount(artistKey: string): number;
}

export class MixRunState implements RunStateView {
  private readonly emittedKeys = new Set<string>();
  private readonly artistCounts = new Map<string, number>();

  hasEmitted(dedupKey: string): boolean {
    return this.emittedKeys.has(dedupKey);
  }

  artistCount(artistKey: string): number {
    return this.artistCounts.get(artistKey) ?? 0;
  }

  record(track: Track): void {
    this.emittedKeys.add(track.dedupKey);
    this.artistCounts.set(track.artistKey, this.artistCount(track.artistKey) + 1);
  }
}
