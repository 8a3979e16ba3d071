import { readFile, readdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import * as chardet from 'chardet';
import iconv from 'iconv-lite';
import { parse } from 'csv-parse/sync';
import { Logger } from '../utils/logger.js';
import { TrackNormalizer } from '../utils/normalization.js';
import { PlaylistReadError, ValidationError } from '../types/errors.js';
import type { PlaylistReadResult, ReadOptions, Track } from '../types/index.js';

const REQUIRED_COLUMNS = ['Name', 'Artist'] as const;
const PLAYLIST_EXTENSION = '.txt';

export interface ParsedPlaylistText {
  columns: string[];
  rows: Record<string, string>[];
}

function isRow(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === 'string')
  );
}

export class PlaylistReaderService {
  async listPlaylistFiles(dir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      throw new PlaylistReadError(`Cannot list playlist folder ${dir}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    return entries
      .filter((entry) => extname(entry).toLowerCase() === PLAYLIST_EXTENSION)
      .sort((a, b) => a.localeCompare(b))
      .map((entry) => join(dir, entry));
  }

  async readPlaylist(filePath: string, options: ReadOptions = {}): Promise<PlaylistReadResult> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new PlaylistReadError(`Cannot read ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    const encoding = this.detectEncoding(buffer);
    const text = iconv.decode(buffer, encoding);
    const id = PlaylistReaderService.playlistIdFromPath(filePath);

    let parsed: ParsedPlaylistText;
    try {
      parsed = this.parseText(text);
    } catch (error) {
      if (error instanceof PlaylistReadError) {
        throw new PlaylistReadError(error.message, { ...error.context, file: filePath });
      }
      throw new PlaylistReadError(`Cannot parse ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    const rows = this.applyReadOptions(
      parsed.rows.map((row, index) => ({ row, index })),
      options
    );
    const tracks: Track[] = [];
    const seen = new Set<string>();
    let skippedRows = 0;
    let duplicateRows = 0;

    for (const { row, index } of rows) {
      let track: Track;
      try {
        track = TrackNormalizer.toTrack(
          { title: row.Name ?? '', artist: row.Artist ?? '', album: row.Album, fields: row },
          id,
          index
        );
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        skippedRows++;
        continue;
      }

      // a playlist lists each song once; the first row wins
      if (seen.has(track.dedupKey)) {
        duplicateRows++;
        continue;
      }
      seen.add(track.dedupKey);
      tracks.push(track);
    }

    if (skippedRows > 0) {
      Logger.warn(`Skipped ${skippedRows} rows without a title or artist`, { playlist: id });
    }
    if (duplicateRows > 0) {
      Logger.info(`Dropped ${duplicateRows} repeated rows`, { playlist: id });
    }
    Logger.debug(`Read ${tracks.length} tracks from ${filePath}`, { encoding });

    return {
      playlist: { id, tracks, weight: 1, columns: parsed.columns },
      skippedRows,
      duplicateRows,
      encoding,
    };
  }

  /** Tab-separated text with a header row; quoting is not used by playlist exports. */
  parseText(text: string): ParsedPlaylistText {
    let columns: string[] = [];
    const records: unknown[] = parse(text, {
      bom: true,
      delimiter: '\t',
      quote: false,
      relax_column_count: true,
      skip_empty_lines: true,
      columns: (header: string[]) => {
        columns = header.map((column) => column.trim());
        return columns;
      },
    });
    const rows = records.filter(isRow);

    const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
      throw new PlaylistReadError(`Missing required columns: ${missing.join(', ')}`, {
        columns,
      });
    }

    return { columns, rows };
  }

  /** `T<n>` keeps the first n rows, `B<n>` the last n; `maxTracks` then caps the rest. */
  applyReadOptions<T>(rows: T[], options: ReadOptions): T[] {
    let selected = rows;

    if (options.slice) {
      const match = options.slice.trim().match(/^([TtBb])(\d+)$/);
      if (!match) {
        throw new ValidationError(`Invalid slice "${options.slice}", expected T<n> or B<n>`);
      }
      const count = parseInt(match[2], 10);
      if (count === 0) {
        selected = [];
      } else {
        selected = match[1].toUpperCase() === 'T' ? selected.slice(0, count) : selected.slice(-count);
      }
    }

    if (options.maxTracks !== undefined) {
      selected = selected.slice(0, options.maxTracks);
    }

    return selected;
  }

  private detectEncoding(buffer: Buffer): string {
    const detected = chardet.detect(buffer);
    if (detected && iconv.encodingExists(detected)) {
      return detected;
    }
    return 'utf8';
  }

  static playlistIdFromPath(filePath: string): string {
    return basename(filePath, extname(filePath));
  }
}
