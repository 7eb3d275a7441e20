import { describe, expect, it } from 'vitest';

import { ParseError } from '../PlaylistError';
import { createTrack, formatTrack, parseDuration, trackKey, tracksEqual } from '../Track';

describe('parseDuration', () => {
  it('converts M:SS to seconds', () => {
    expect(parseDuration('3:45')).toBe(225);
    expect(parseDuration('0:05')).toBe(5);
    expect(parseDuration('12:00')).toBe(720);
  });

  it('passes whole seconds through', () => {
    expect(parseDuration(200)).toBe(200);
  });

  it('rejects non-numeric segments', () => {
    expect(() => parseDuration('a:bc')).toThrow(ParseError);
    expect(() => parseDuration('3:4x')).toThrow(/non-numeric segment/);
  });

  it('rejects text that is not M:SS', () => {
    expect(() => parseDuration('345')).toThrow(/not in M:SS form/);
    expect(() => parseDuration('1:02:03')).toThrow(ParseError);
  });

  it('rejects seconds of 60 or more', () => {
    expect(() => parseDuration('3:60')).toThrow(/out of range/);
  });

  it('rejects negative or fractional numbers', () => {
    expect(() => parseDuration(-1)).toThrow(ParseError);
    expect(() => parseDuration(1.5)).toThrow(ParseError);
  });
});

describe('createTrack', () => {
  it('trims fields and freezes the result', () => {
    const track = createTrack({ title: ' Song A ', artist: 'Artist1 ', album: ' Album1', duration: '3:45' });

    expect(track).toEqual({ title: 'Song A', artist: 'Artist1', album: 'Album1', durationSeconds: 225 });
    expect(Object.isFrozen(track)).toBe(true);
  });

  it('requires a title and an artist', () => {
    expect(() => createTrack({ title: '', artist: 'Artist1', album: '', duration: 10 })).toThrow(ParseError);
    expect(() => createTrack({ title: 'Song', artist: '  ', album: '', duration: 10 })).toThrow(ParseError);
  });
});

describe('track identity', () => {
  it('ignores case and surrounding or repeated whitespace', () => {
    const a = createTrack({ title: 'Hey  Jude', artist: 'The Beatles', album: 'x', duration: 1 });
    const b = createTrack({ title: 'hey jude', artist: 'THE BEATLES', album: 'y', duration: 2 });

    expect(trackKey(a)).toBe(trackKey(b));
    expect(tracksEqual(a, b)).toBe(true);
  });

  it('distinguishes different artists', () => {
    const a = createTrack({ title: 'Intro', artist: 'Band A', album: '', duration: 1 });
    const b = createTrack({ title: 'Intro', artist: 'Band B', album: '', duration: 1 });

    expect(tracksEqual(a, b)).toBe(false);
  });
});

describe('formatTrack', () => {
  it('renders fixed-width columns', () => {
    const row = formatTrack(createTrack({ title: 'Song A', artist: 'Artist1', album: 'Album1', duration: 225 }));

    expect(row).toBe(`${'Song A'.padEnd(40)} | ${'Artist1'.padEnd(20)} | ${'Album1'.padEnd(25)} |   225s`);
  });

  it('truncates long values', () => {
    const row = formatTrack(createTrack({ title: 'x'.repeat(50), artist: 'y', album: 'z', duration: 5 }));

    expect(row.startsWith(`${'x'.repeat(40)} | `)).toBe(true);
  });
});
