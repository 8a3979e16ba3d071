import type { Playlist } from '../types/index.js';

export interface SharedTrackExclusion {
  playlists: Playlist[];
  /** dedup keys found in more than one playlist */
  shared: Set<string>;
}

/** Drops every track that appears in two or more playlists, keeping order otherwise. */
export function excludeSharedTracks(playlists: readonly Playlist[]): SharedTrackExclusion {
  const owners = new Map<string, Set<string>>();
  for (const playlist of playlists) {
    for (const track of playlist.tracks) {
      const ids = owners.get(track.dedupKey) ?? new Set<string>();
      ids.add(playlist.id);
      owners.set(track.dedupKey, ids);
    }
  }

  const shared = new Set<string>();
  for (const [key, ids] of owners) {
    if (ids.size > 1) {
      shared.add(key);
    }
  }

  return {
    playlists: playlists.map((playlist) => ({
      ...playlist,
      tracks: playlist.tracks.filter((track) => !shared.has(track.dedupKey)),
    })),
    shared,
  };
}
