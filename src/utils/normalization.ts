import { ValidationError } from '../types/errors.js';
import type { RawTrack, Track } from '../types/index.js';

const KEY_SEPARATOR = '␟';

export class TextNormalizer {
  /** Trim and collapse inner whitespace; casing is kept for display. */
  static cleanDisplay(text: string | undefined): string {
    return (text ?? '').normalize('NFC').replace(/\s+/g, ' ').trim();
  }

  static normalizeForKey(text: string | undefined): string {
    return TextNormalizer.cleanDisplay(text).toLowerCase();
  }

  static artistKey(artist: string): string {
    return TextNormalizer.normalizeForKey(artist);
  }

  static dedupKey(title: string, artist: string): string {
    return `${TextNormalizer.normalizeForKey(title)}${KEY_SEPARATOR}${TextNormalizer.normalizeForKey(artist)}`;
  }
}

export class TrackNormalizer {
  static toTrack(raw: RawTrack, sourcePlaylistId: string, position: number): Track {
    const title = TextNormalizer.cleanDisplay(raw.title);
    const artist = TextNormalizer.cleanDisplay(raw.artist);
    const album = TextNormalizer.cleanDisplay(raw.album);

    if (!title || !artist) {
      throw new ValidationError('Track needs both a title and an artist', {
        sourcePlaylistId,
        position,
      });
    }

    const fields = raw.fields ?? {
      Name: title,
      Artist: artist,
      ...(album ? { Album: album } : {}),
    };

    return Object.freeze({
      title,
      artist,
      ...(album ? { album } : {}),
      sourcePlaylistId,
      dedupKey: TextNormalizer.dedupKey(title, artist),
      artistKey: TextNormalizer.artistKey(artist),
      position,
      fields: Object.freeze({ ...fields }),
    });
  }

  static toTracks(rows: readonly RawTrack[], sourcePlaylistId: string): Track[] {
    return rows.map((row, index) => TrackNormalizer.toTrack(row, sourcePlaylistId, index));
  }
}
