import { mkdtemp, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { pathToFileURL } from 'node:url';
import plist, { type PlistObject } from 'plist';
import { targetPath } from './target-path.js';
import type { Catalog, DeviceInventory, DeviceTrack, Playlist, Track } from './types.js';

export function makeTrack(id: number, overrides: Partial<Track> = {}): Track {
  return {
    id,
    persistentId: null,
    title: `Song ${id}`,
    artist: `Artist ${id}`,
    albumArtist: null,
    album: 'Album',
    compilation: false,
    kind: 'MPEG audio file',
    size: 1000,
    totalTime: 180000,
    location: `/library/Artist ${id}/Album/${id}.mp3`,
    playlists: new Set<string>(),
    ...overrides,
  };
}

export function makeCatalog(tracks: Track[], playlists: Playlist[] = []): Catalog {
  return {
    source: '/library/iTunes Music Library.xml',
    tracks: new Map(tracks.map((t) => [t.id, t])),
    playlists: new Map(playlists.map((p) => [p.name, p])),
    missing: [],
  };
}

export function deviceTrackFor(track: Track, mountPath: string): DeviceTrack {
  const path = targetPath(track, mountPath);

  return {
    path,
    relativePath: path.slice(mountPath.length + 1),
    size: track.size,
    trackId: track.id,
    match: 'path',
  };
}

export function makeInventory(mountPath: string, tracks: DeviceTrack[]): DeviceInventory {
  return {
    mountPath,
    tracks,
    totalBytes: tracks.reduce((sum, t) => sum + t.size, 0),
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `musicmover-${prefix}-`));
}

export async function writeFileWithDirs(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

export interface LibraryTrackFixture {
  id: number;
  name: string;
  artist?: string;
  album?: string;
  compilation?: boolean;
  size?: number;
  /** A local path, turned into a file:// URL. */
  path?: string;
  /** Used as-is when given. */
  location?: string;
}

export interface LibraryPlaylistFixture {
  name: string;
  id: number;
  persistentId?: string;
  trackIds?: number[];
}

export function buildLibraryXml(tracks: LibraryTrackFixture[], playlists: LibraryPlaylistFixture[]): string {
  const trackDict: Record<string, PlistObject> = {};

  for (const fixture of tracks) {
    const entry: Record<string, string | number | boolean> = {
      'Track ID': fixture.id,
      Name: fixture.name,
      Kind: 'MPEG audio file',
    };

    if (fixture.artist !== undefined) entry.Artist = fixture.artist;
    if (fixture.album !== undefined) entry.Album = fixture.album;
    if (fixture.compilation) entry.Compilation = true;
    if (fixture.size !== undefined) entry.Size = fixture.size;
    if (fixture.path !== undefined) entry.Location = pathToFileURL(fixture.path).href;
    if (fixture.location !== undefined) entry.Location = fixture.location;

    trackDict[String(fixture.id)] = entry;
  }

  const playlistArray: PlistObject[] = playlists.map((fixture) => {
    const entry: Record<string, string | number | PlistObject[]> = {
      Name: fixture.name,
      'Playlist ID': fixture.id,
    };

    if (fixture.persistentId !== undefined) entry['Playlist Persistent ID'] = fixture.persistentId;
    if (fixture.trackIds !== undefined) {
      entry['Playlist Items'] = fixture.trackIds.map((id) => ({ 'Track ID': id }));
    }

    return entry;
  });

  return plist.build({
    'Major Version': 1,
    'Minor Version': 1,
    Tracks: trackDict,
    Playlists: playlistArray,
  });
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error('Expected function to throw');
}
