import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import plist from 'plist';
import { ParseError, UnknownPlaylistError } from './errors.js';
import {
  candidateTracks,
  getPlaylistTracks,
  listPlaylists,
  loadLibrary,
  parseLibrary,
  resolveLocation,
} from './library.js';
import { buildLibraryXml, catchError, makeTempDir } from './test-helpers.js';

let dir: string;
let xml: string;

beforeAll(async () => {
  dir = await makeTempDir('library');
  await writeFile(join(dir, 'a.mp3'), 'aaaa');
  await writeFile(join(dir, 'b.mp3'), 'bb');
  await writeFile(join(dir, 'c.m4a'), 'c');

  xml = buildLibraryXml(
    [
      { id: 1, name: 'Alpha', artist: 'Artist One', album: 'First', size: 1000, path: join(dir, 'a.mp3') },
      { id: 2, name: 'Beta', artist: 'Artist One', compilation: true, size: 2000, path: join(dir, 'b.mp3') },
      { id: 3, name: 'Gamma', path: join(dir, 'gone.mp3') },
      { id: 4, name: 'Stream', location: 'http://example.com/stream.mp3' },
      { id: 5, name: 'No Location' },
      { id: 6, name: 'Charlie', path: join(dir, 'c.m4a') },
    ],
    [
      { name: 'Music', id: 100, persistentId: 'AAA', trackIds: [1, 2, 3, 6] },
      { name: 'Road Trip', id: 200, trackIds: [6, 1, 99] },
      { name: 'Empty', id: 300 },
    ]
  );
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('resolveLocation', () => {
  it('explains why a location cannot be used', () => {
    expect(resolveLocation(undefined)).toEqual({ reason: 'no-location' });
    expect(resolveLocation('http://example.com/a.mp3')).toEqual({ reason: 'unsupported-url' });
    expect(resolveLocation('not a url')).toEqual({ reason: 'unsupported-url' });
    expect(resolveLocation('file:///nowhere/at/all.mp3')).toEqual({ reason: 'file-not-found' });
  });

  it('decodes file URLs', () => {
    expect(resolveLocation('file:///music/My%20Song.mp3', false)).toEqual({ path: '/music/My Song.mp3' });
  });
});

describe('parseLibrary', () => {
  it('keeps tracks whose files exist', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(Array.from(catalog.tracks.keys()).sort((a, b) => a - b)).toEqual([1, 2, 6]);

    const alpha = catalog.tracks.get(1);
    expect(alpha).toMatchObject({
      title: 'Alpha',
      artist: 'Artist One',
      album: 'First',
      size: 1000,
      compilation: false,
      location: join(dir, 'a.mp3'),
    });
    expect(catalog.tracks.get(2)?.compilation).toBe(true);
  });

  it('reports missing tracks with a reason', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(catalog.missing.map((m) => [m.id, m.reason])).toEqual([
      [3, 'file-not-found'],
      [4, 'unsupported-url'],
      [5, 'no-location'],
    ]);
  });

  it('keeps playlist order and drops tracks it cannot use', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(catalog.playlists.get('Music')?.trackIds).toEqual([1, 2, 6]);
    expect(catalog.playlists.get('Road Trip')?.trackIds).toEqual([6, 1]);
    expect(catalog.playlists.get('Empty')?.trackIds).toEqual([]);
  });

  it('records playlist membership on each track', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(Array.from(catalog.tracks.get(1)?.playlists ?? []).sort()).toEqual(['200', 'AAA']);
    expect(Array.from(catalog.tracks.get(2)?.playlists ?? [])).toEqual(['AAA']);
  });

  it('can skip the file check', () => {
    const catalog = parseLibrary(xml, 'lib.xml', { checkFiles: false });

    expect(catalog.tracks.has(3)).toBe(true);
    expect(catalog.missing.map((m) => m.id)).toEqual([4, 5]);
  });

  it('returns a frozen catalog', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.tracks.get(1))).toBe(true);
  });

  it('rejects a document that is not a plist', () => {
    const error = catchError(() => parseLibrary('<?xml version="1.0"?><notplist/>', 'lib.xml'));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ file: 'lib.xml', location: 'XML' });
  });

  it('points at the field with the wrong shape', () => {
    const bad = plist.build({ Tracks: { '1': { 'Track ID': 'one' } } });
    const error = catchError(() => parseLibrary(bad, 'lib.xml'));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ location: 'Tracks › 1 › Track ID' });
  });

  it('requires a Tracks dictionary', () => {
    const error = catchError(() => parseLibrary(plist.build({ Playlists: [] }), 'lib.xml'));

    expect(error).toMatchObject({ location: 'Tracks' });
  });
});

describe('loadLibrary', () => {
  it('reads the library from disk', async () => {
    const file = join(dir, 'Library.xml');
    await writeFile(file, xml);

    const catalog = await loadLibrary(file);

    expect(catalog.source).toBe(file);
    expect(catalog.tracks.size).toBe(3);
  });

  it('fails with a ParseError when the file is missing', async () => {
    await expect(loadLibrary(join(dir, 'missing.xml'))).rejects.toBeInstanceOf(ParseError);
    await expect(loadLibrary(join(dir, 'missing.xml'))).rejects.toMatchObject({ location: 'file' });
  });
});

describe('playlists', () => {
  it('lists playlists by name', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(listPlaylists(catalog)).toEqual([
      { id: '300', name: 'Empty', trackCount: 0 },
      { id: 'AAA', name: 'Music', trackCount: 3 },
      { id: '200', name: 'Road Trip', trackCount: 2 },
    ]);
  });

  it('returns playlist tracks in order', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(getPlaylistTracks(catalog, 'Road Trip').map((t) => t.id)).toEqual([6, 1]);
  });

  it('rejects an unknown playlist', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(() => getPlaylistTracks(catalog, 'Nope')).toThrow(UnknownPlaylistError);
  });

  it('draws candidates from a playlist or the whole library', () => {
    const catalog = parseLibrary(xml, 'lib.xml');

    expect(candidateTracks(catalog).map((t) => t.id)).toEqual([1, 2, 6]);
    expect(candidateTracks(catalog, 'Road Trip').map((t) => t.id)).toEqual([6, 1]);
  });
});
