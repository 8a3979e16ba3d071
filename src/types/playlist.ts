import type { Track } from './track.js';

export interface Playlist {
  id: string;
  tracks: readonly Track[];
  weight: number;
  /** Header of the source file, in column order. */
  columns?: string[];
}

export interface ReadOptions {
  slice?: string;
  maxTracks?: number;
}

export interface PlaylistReadResult {
  playlist: Playlist;
  skippedRows: number;
  /** Rows dropped because an earlier row had the same title and artist. */
  duplicateRows: number;
  encoding: string;
}
