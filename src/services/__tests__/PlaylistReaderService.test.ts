import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PlaylistReaderService } from '../PlaylistReaderService.js';
import { PlaylistReadError, ValidationError } from '../../types/errors.js';

const EXPORT = [
  'Name\tArtist\tAlbum\tGenre',
  'Blue in Green\tMiles Davis\tKind of Blue\tJazz',
  'So What\tMiles Davis\tKind of Blue\tJazz',
  '\tNo Title\t\t',
  'Naima\tJohn Coltrane\tGiant Steps\tJazz',
].join('\r');

describe('PlaylistReaderService', () => {
  const reader = new PlaylistReaderService();

  describe('parseText', () => {
    it('reads the header and rows of a tab-separated export', () => {
      const { columns, rows } = reader.parseText('Name\tArtist\tAlbum\nSong\tBand\tRecord\n');

      expect(columns).toEqual(['Name', 'Artist', 'Album']);
      expect(rows).toEqual([{ Name: 'Song', Artist: 'Band', Album: 'Record' }]);
    });

    it('accepts carriage-return line endings and literal quotes', () => {
      const { rows } = reader.parseText('Name\tArtist\r"Heroes"\tDavid Bowie\r');

      expect(rows).toEqual([{ Name: '"Heroes"', Artist: 'David Bowie' }]);
    });

    it('requires the Name and Artist columns', () => {
      expect(() => reader.parseText('Title\tAlbum\nSong\tRecord\n')).toThrow(PlaylistReadError);
      expect(() => reader.parseText('Title\tAlbum\nSong\tRecord\n')).toThrow('Missing required columns: Name, Artist');
    });
  });

  describe('applyReadOptions', () => {
    const rows = [1, 2, 3, 4, 5];

    it('keeps the first or last n rows', () => {
      expect(reader.applyReadOptions(rows, { slice: 'T2' })).toEqual([1, 2]);
      expect(reader.applyReadOptions(rows, { slice: 'b2' })).toEqual([4, 5]);
      expect(reader.applyReadOptions(rows, { slice: 'B0' })).toEqual([]);
    });

    it('caps the number of rows after slicing', () => {
      expect(reader.applyReadOptions(rows, { slice: 'B4', maxTracks: 2 })).toEqual([2, 3]);
      expect(reader.applyReadOptions(rows, { maxTracks: 10 })).toEqual(rows);
    });

    it('rejects a malformed slice', () => {
      expect(() => reader.applyReadOptions(rows, { slice: 'X10' })).toThrow(ValidationError);
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'playlist-reader-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads a UTF-16 export and skips rows without a title', async () => {
      const path = join(dir, 'Jazz Night.txt');
      await writeFile(path, Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(EXPORT, 'utf16le')]));

      const { playlist, skippedRows } = await reader.readPlaylist(path);

      expect(playlist.id).toBe('Jazz Night');
      expect(playlist.weight).toBe(1);
      expect(playlist.columns).toEqual(['Name', 'Artist', 'Album', 'Genre']);
      expect(playlist.tracks.map((t) => t.title)).toEqual(['Blue in Green', 'So What', 'Naima']);
      expect(playlist.tracks[2]).toMatchObject({
        artist: 'John Coltrane',
        album: 'Giant Steps',
        sourcePlaylistId: 'Jazz Night',
        position: 3,
        fields: { Genre: 'Jazz' },
      });
      expect(skippedRows).toBe(1);
    });

    it('applies the slice before building tracks', async () => {
      const path = join(dir, 'plain.txt');
      await writeFile(path, 'Name\tArtist\nOne\tA\nTwo\tB\nThree\tC\n', 'utf8');

      const { playlist } = await reader.readPlaylist(path, { slice: 'B2' });

      expect(playlist.tracks.map((t) => t.title)).toEqual(['Two', 'Three']);
      expect(playlist.tracks.map((t) => t.position)).toEqual([1, 2]);
    });

    it('keeps the first of repeated rows within a playlist', async () => {
      const path = join(dir, 'repeats.txt');
      await writeFile(path, 'Name\tArtist\nOne\tA\nTwo\tB\none \ta\nTwo\tB\nThree\tC\n', 'utf8');

      const { playlist, duplicateRows, skippedRows } = await reader.readPlaylist(path);

      expect(playlist.tracks.map((t) => t.title)).toEqual(['One', 'Two', 'Three']);
      expect(playlist.tracks.map((t) => t.position)).toEqual([0, 1, 4]);
      expect(duplicateRows).toBe(2);
      expect(skippedRows).toBe(0);
    });

    it('drops repeats only among the rows the slice keeps', async () => {
      const path = join(dir, 'sliced.txt');
      await writeFile(path, 'Name\tArtist\nOne\tA\nTwo\tB\nOne\tA\n', 'utf8');

      const { playlist, duplicateRows } = await reader.readPlaylist(path, { slice: 'B2' });

      expect(playlist.tracks.map((t) => t.position)).toEqual([1, 2]);
      expect(duplicateRows).toBe(0);
    });

    it('fails on a missing file', async () => {
      await expect(reader.readPlaylist(join(dir, 'missing.txt'))).rejects.toThrow(PlaylistReadError);
    });

    it('lists only .txt playlists, sorted', async () => {
      await writeFile(join(dir, 'b.txt'), '');
      await writeFile(join(dir, 'a.TXT'), '');
      await writeFile(join(dir, 'notes.md'), '');

      expect(await reader.listPlaylistFiles(dir)).toEqual([join(dir, 'a.TXT'), join(dir, 'b.txt')]);
    });
  });
});
