/** A row as handed over by the playlist reader, before normalization. */
export interface RawTrack {
  title: string;
  artist: string;
  album?: string;
  fields?: Record<string, string>;
}

export interface Track {
  readonly title: string;
  readonly artist: string;
  readonly album?: string;
  readonly sourcePlaylistId: string;
  /** Normalized title + artist; equal keys mean the same song. */
  readonly dedupKey: string;
  readonly artistKey: string;
  /** Zero-based index of the data row in its source file, counted before any slicing. */
  readonly position: number;
  readonly fields: Readonly<Record<string, string>>;
}
