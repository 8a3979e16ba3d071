import { describe, it, expect } from 'vitest';
import { excludeSharedTracks } from '../sharedTracks.js';
import { TrackNormalizer } from '../../utils/normalization.js';
import type { Playlist } from '../../types/index.js';

function makePlaylist(id: string, titles: string[]): Playlist {
  return {
    id,
    weight: 1,
    tracks: TrackNormalizer.toTracks(
      titles.map((title) => ({ title, artist: 'Band' })),
      id
    ),
  };
}

describe('excludeSharedTracks', () => {
  it('removes songs found in more than one playlist', () => {
    const { playlists, shared } = excludeSharedTracks([
      makePlaylist('A', ['One', 'Two', 'Three']),
      makePlaylist('B', ['two', 'Four']),
      makePlaylist('C', ['Five', 'Three']),
    ]);

    expect(playlists.map((p) => p.tracks.map((t) => t.title))).toEqual([['One'], ['Four'], ['Five']]);
    expect(shared.size).toBe(2);
  });

  it('keeps repeats inside a single playlist', () => {
    const { playlists, shared } = excludeSharedTracks([makePlaylist('A', ['One', 'One']), makePlaylist('B', ['Two'])]);

    expect(playlists[0].tracks).toHaveLength(2);
    expect(shared.size).toBe(0);
  });

  it('leaves the input untouched', () => {
    const input = [makePlaylist('A', ['One']), makePlaylist('B', ['One'])];
    excludeSharedTracks(input);

    expect(input[0].tracks).toHaveLength(1);
  });
});
