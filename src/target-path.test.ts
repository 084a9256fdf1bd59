import { describe, expect, it } from 'vitest';
import { isMusicFile, roundUpTo, sanitize, targetPath } from './target-path.js';
import { makeTrack } from './test-helpers.js';

describe('isMusicFile', () => {
  it('accepts known extensions in any case', () => {
    expect(isMusicFile('song.mp3')).toBe(true);
    expect(isMusicFile('SONG.MP3')).toBe(true);
    expect(isMusicFile('/music/a/b/track.m4a')).toBe(true);
  });

  it('rejects hidden files and other extensions', () => {
    expect(isMusicFile('._song.mp3')).toBe(false);
    expect(isMusicFile('cover.jpg')).toBe(false);
    expect(isMusicFile('notes')).toBe(false);
  });

  it('uses the given extension list', () => {
    expect(isMusicFile('track.flac', ['.flac'])).toBe(true);
    expect(isMusicFile('track.mp3', ['.flac'])).toBe(false);
  });
});

describe('sanitize', () => {
  it('replaces characters devices reject', () => {
    expect(sanitize('AC/DC')).toBe('AC_DC');
    expect(sanitize('What?: "Live"')).toBe('What?_ _Live_');
    expect(sanitize('Vol. 2: Live')).toBe('Vol. 2_ Live');
  });

  it('leaves ordinary names alone', () => {
    expect(sanitize('Back in Black')).toBe('Back in Black');
  });
});

describe('targetPath', () => {
  it('files a track under artist and album', () => {
    const track = makeTrack(1, {
      artist: 'AC/DC',
      album: 'Back in Black',
      location: '/library/AC_DC/Back in Black/01 Hells Bells.mp3',
    });

    expect(targetPath(track, '/mnt/phone')).toBe('/mnt/phone/AC_DC/Back in Black/01 Hells Bells.mp3');
  });

  it('files compilations together', () => {
    const track = makeTrack(2, {
      artist: 'Someone',
      album: 'Now 1',
      compilation: true,
      location: '/library/Compilations/Now 1/x.mp3',
    });

    expect(targetPath(track, '/mnt/phone/')).toBe('/mnt/phone/Compilations/Now 1/x.mp3');
  });

  it('falls back to unknown artist and album', () => {
    const track = makeTrack(3, { artist: null, album: null, location: '/library/loose.mp3' });

    expect(targetPath(track, '/mnt/phone')).toBe('/mnt/phone/Unknown Artist/Unknown Album/loose.mp3');
  });
});

describe('roundUpTo', () => {
  it('rounds up to whole blocks', () => {
    expect(roundUpTo(1, 2048)).toBe(2048);
    expect(roundUpTo(2048, 2048)).toBe(2048);
    expect(roundUpTo(2049, 2048)).toBe(4096);
    expect(roundUpTo(0, 2048)).toBe(0);
  });

  it('leaves sizes alone without a block size', () => {
    expect(roundUpTo(100, 0)).toBe(100);
  });
});
