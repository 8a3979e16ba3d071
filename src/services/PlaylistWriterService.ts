import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import dayjs from 'dayjs';
import { stringify } from 'csv-stringify/sync';
import { Logger } from '../utils/logger.js';
import { ExportError } from '../types/errors.js';
import type { Track } from '../types/index.js';

export const DEFAULT_APPLE_COLUMNS = ['Name', 'Artist', 'Album'];

export interface WriteOptions {
  outputDir: string;
  baseName?: string;
  /** Header of the Apple export; defaults to Name, Artist, Album. */
  columns?: string[];
  timestamp?: boolean;
  now?: Date;
}

export interface WrittenFiles {
  csv: string;
  text: string;
  apple: string;
}

export class PlaylistWriterService {
  async writeMix(tracks: readonly Track[], options: WriteOptions): Promise<WrittenFiles> {
    const base = this.resolveBaseName(options);
    const files: WrittenFiles = {
      csv: join(options.outputDir, `${base}.csv`),
      text: join(options.outputDir, `${base}.txt`),
      apple: join(options.outputDir, `${base}_apple.txt`),
    };

    try {
      await mkdir(options.outputDir, { recursive: true });
      await writeFile(files.csv, this.formatCsv(tracks), 'utf8');
      await writeFile(files.text, this.formatText(tracks), 'utf8');
      await writeFile(files.apple, this.formatAppleTsv(tracks, options.columns), 'utf8');
    } catch (error) {
      throw new ExportError(`Failed to write mix to ${options.outputDir}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    Logger.debug('Wrote mix files', { ...files });
    return files;
  }

  resolveBaseName(options: Pick<WriteOptions, 'baseName' | 'timestamp' | 'now'>): string {
    const base = options.baseName || 'mixed_playlist';
    if (!options.timestamp) {
      return base;
    }
    return `${base}-${dayjs(options.now).format('YYYYMMDD-HHmmss')}`;
  }

  formatCsv(tracks: readonly Track[]): string {
    return stringify(
      tracks.map((track) => ({ artist: track.artist, title: track.title })),
      {
        header: true,
        columns: [
          { key: 'artist', header: 'artist' },
          { key: 'title', header: 'track title' },
        ],
      }
    );
  }

  formatText(tracks: readonly Track[]): string {
    return tracks.map((track) => `${track.artist} - ${track.title}\n`).join('');
  }

  /** One row per track in mix order, keeping every source column the header names. */
  formatAppleTsv(tracks: readonly Track[], columns: string[] = DEFAULT_APPLE_COLUMNS): string {
    const header = columns.length > 0 ? columns : DEFAULT_APPLE_COLUMNS;
    const lines = [header.map(sanitizeCell).join('\t')];

    for (const track of tracks) {
      const fallback: Record<string, string> = {
        Name: track.title,
        Artist: track.artist,
        Album: track.album ?? '',
      };
      lines.push(header.map((column) => sanitizeCell(track.fields[column] ?? fallback[column] ?? '')).join('\t'));
    }

    return `${lines.join('\n')}\n`;
  }
}

function sanitizeCell(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}
