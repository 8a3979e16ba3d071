import { describe, it, expect } from 'vitest';
import { TextNormalizer, TrackNormalizer } from '../normalization.js';
import { ValidationError } from '../../types/errors.js';

describe('TextNormalizer', () => {
  it('collapses whitespace and keeps casing for display', () => {
    expect(TextNormalizer.cleanDisplay('  The   Long\tRoad ')).toBe('The Long Road');
  });

  it('builds the same key for casing and spacing variants', () => {
    expect(TextNormalizer.dedupKey('Hey  Jude', 'The Beatles')).toBe(TextNormalizer.dedupKey(' hey jude', 'THE BEATLES '));
  });

  it('builds different keys when title and artist differ', () => {
    expect(TextNormalizer.dedupKey('Hey Jude', 'The Beatles')).not.toBe(TextNormalizer.dedupKey('Hey Jude', 'Beatles'));
  });

  it('treats composed and decomposed accents alike', () => {
    expect(TextNormalizer.artistKey('Beyonce\u0301')).toBe(TextNormalizer.artistKey('Beyonc\u00e9'));
  });
});

describe('TrackNormalizer', () => {
  it('creates a track with keys and its source playlist', () => {
    const track = TrackNormalizer.toTrack({ title: ' Hey Jude ', artist: 'The  Beatles', album: '' }, 'oldies', 4);

    expect(track).toEqual({
      title: 'Hey Jude',
      artist: 'The Beatles',
      sourcePlaylistId: 'oldies',
      dedupKey: TextNormalizer.dedupKey('hey jude', 'the beatles'),
      artistKey: 'the beatles',
      position: 4,
      fields: { Name: 'Hey Jude', Artist: 'The Beatles' },
    });
    expect(Object.isFrozen(track)).toBe(true);
  });

  it('keeps the raw fields when given', () => {
    const fields = { Name: 'Song', Artist: 'Band', Genre: 'Jazz' };
    const track = TrackNormalizer.toTrack({ title: 'Song', artist: 'Band', album: 'Record', fields }, 'p', 0);

    expect(track.album).toBe('Record');
    expect(track.fields).toEqual(fields);
  });

  it('numbers tracks by position', () => {
    const tracks = TrackNormalizer.toTracks(
      [
        { title: 'A', artist: 'X' },
        { title: 'B', artist: 'Y' },
      ],
      'p'
    );

    expect(tracks.map((t) => t.position)).toEqual([0, 1]);
  });

  it('rejects rows without a title or artist', () => {
    expect(() => TrackNormalizer.toTrack({ title: '  ', artist: 'Band' }, 'p', 0)).toThrow(ValidationError);
    expect(() => TrackNormalizer.toTrack({ title: 'Song', artist: '' }, 'p', 0)).toThrow(ValidationError);
  });
});
