import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import plist from 'plist';
import { z } from 'zod';
import { expandPath } from './config.js';
import { ParseError, UnknownPlaylistError, errorMessage } from './errors.js';
import type { Catalog, MissingReason, MissingTrack, Playlist, Track } from './types.js';

export interface LibraryOptions {
  /** Check that every track's file exists. On by default. */
  checkFiles?: boolean;
}

export interface PlaylistSummary {
  id: string;
  name: string;
  trackCount: number;
}

const trackSchema = z.object({
  'Track ID': z.number().int(),
  'Persistent ID': z.string().optional(),
  Name: z.string().optional(),
  Artist: z.string().optional(),
  'Album Artist': z.string().optional(),
  Album: z.string().optional(),
  Kind: z.string().optional(),
  Compilation: z.boolean().optional(),
  Size: z.number().nonnegative().optional(),
  'Total Time': z.number().nonnegative().optional(),
  Location: z.string().optional(),
});

const playlistSchema = z.object({
  Name: z.string(),
  'Playlist ID': z.number().int().optional(),
  'Playlist Persistent ID': z.string().optional(),
  'Playlist Items': z.array(z.object({ 'Track ID': z.number().int().optional() })).optional(),
});

const librarySchema = z.object({
  Tracks: z.record(z.string(), trackSchema),
  Playlists: z.array(playlistSchema).default([]),
});

type RawTrack = z.infer<typeof trackSchema>;
type RawPlaylist = z.infer<typeof playlistSchema>;

type ResolvedLocation = { path: string } | { reason: MissingReason };

export function resolveLocation(location: string | undefined, checkFiles = true): ResolvedLocation {
  if (!location) {
    return { reason: 'no-location' };
  }

  let path: string;

  try {
    const url = new URL(location);

    if (url.protocol !== 'file:') {
      return { reason: 'unsupported-url' };
    }

    path = fileURLToPath(url);
  } catch {
    return { reason: 'unsupported-url' };
  }

  if (checkFiles && !existsSync(path)) {
    return { reason: 'file-not-found' };
  }

  return { path };
}

function playlistId(raw: RawPlaylist): string {
  if (raw['Playlist Persistent ID']) {
    return raw['Playlist Persistent ID'];
  }

  if (raw['Playlist ID'] !== undefined) {
    return String(raw['Playlist ID']);
  }

  return raw.Name;
}

function buildTrack(raw: RawTrack, location: string, playlists: Set<string> | undefined): Track {
  return Object.freeze({
    id: raw['Track ID'],
    persistentId: raw['Persistent ID'] ?? null,
    title: raw.Name ?? null,
    artist: raw.Artist ?? null,
    albumArtist: raw['Album Artist'] ?? null,
    album: raw.Album ?? null,
    compilation: raw.Compilation ?? false,
    kind: raw.Kind ?? null,
    size: raw.Size ?? 0,
    totalTime: raw['Total Time'] ?? null,
    location,
    playlists: new Set(playlists),
  });
}

/**
 * Build a Catalog from the XML text of an iTunes library export.
 */
export function parseLibrary(xml: string, source: string, options: LibraryOptions = {}): Catalog {
  const checkFiles = options.checkFiles ?? true;
  let parsed: unknown;

  try {
    parsed = plist.parse(xml);
  } catch (error) {
    throw new ParseError(source, 'XML', errorMessage(error), error);
  }

  const result = librarySchema.safeParse(parsed);

  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue.path.length > 0 ? issue.path.join(' › ') : 'root';
    throw new ParseError(source, location, issue.message, result.error);
  }

  const resolved = new Map<number, { raw: RawTrack; path: string }>();
  const missing: MissingTrack[] = [];

  for (const raw of Object.values(result.data.Tracks)) {
    const location = resolveLocation(raw.Location, checkFiles);

    if ('reason' in location) {
      missing.push(
        Object.freeze({
          id: raw['Track ID'],
          title: raw.Name ?? null,
          location: raw.Location ?? null,
          reason: location.reason,
        })
      );
      continue;
    }

    resolved.set(raw['Track ID'], { raw, path: location.path });
  }

  const playlists = new Map<string, Playlist>();
  const membership = new Map<number, Set<string>>();

  for (const raw of result.data.Playlists) {
    const id = playlistId(raw);
    const trackIds: number[] = [];

    for (const item of raw['Playlist Items'] ?? []) {
      const trackId = item['Track ID'];

      if (trackId === undefined || !resolved.has(trackId)) {
        continue;
      }

      trackIds.push(trackId);

      let memberOf = membership.get(trackId);

      if (!memberOf) {
        memberOf = new Set();
        membership.set(trackId, memberOf);
      }

      memberOf.add(id);
    }

    playlists.set(raw.Name, Object.freeze({ id, name: raw.Name, trackIds: Object.freeze(trackIds) }));
  }

  const tracks = new Map<number, Track>();

  for (const [id, { raw, path }] of resolved) {
    tracks.set(id, buildTrack(raw, path, membership.get(id)));
  }

  return Object.freeze({
    source,
    tracks,
    playlists,
    missing: Object.freeze(missing),
  });
}

export async function loadLibrary(libraryPath: string, options: LibraryOptions = {}): Promise<Catalog> {
  const source = resolve(expandPath(libraryPath));
  let xml: string;

  try {
    xml = await readFile(source, 'utf-8');
  } catch (error) {
    throw new ParseError(source, 'file', errorMessage(error), error);
  }

  return parseLibrary(xml, source, options);
}

export function listPlaylists(catalog: Catalog): PlaylistSummary[] {
  return Array.from(catalog.playlists.values())
    .map((playlist) => ({
      id: playlist.id,
      name: playlist.name,
      trackCount: playlist.trackIds.length,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function getPlaylistTracks(catalog: Catalog, name: string): Track[] {
  const playlist = catalog.playlists.get(name);

  if (!playlist) {
    throw new UnknownPlaylistError(name);
  }

  const tracks: Track[] = [];

  for (const id of playlist.trackIds) {
    const track = catalog.tracks.get(id);

    if (track) {
      tracks.push(track);
    }
  }

  return tracks;
}

/**
 * Tracks a run may draw from: one playlist in playlist order, or the
 * whole library in track id order.
 */
export function candidateTracks(catalog: Catalog, playlist: string | null = null): Track[] {
  if (playlist !== null) {
    return getPlaylistTracks(catalog, playlist);
  }

  return Array.from(catalog.tracks.values()).sort((a, b) => a.id - b.id);
}
