export interface Track {
  readonly id: number;
  readonly persistentId: string | null;
  readonly title: string | null;
  readonly artist: string | null;
  readonly albumArtist: string | null;
  readonly album: string | null;
  readonly compilation: boolean;
  readonly kind: string | null;
  readonly size: number;
  readonly totalTime: number | null;
  readonly location: string;
  readonly playlists: ReadonlySet<string>;
}

export interface Playlist {
  readonly id: string;
  readonly name: string;
  readonly trackIds: readonly number[];
}

export type MissingReason = 'no-location' | 'unsupported-url' | 'file-not-found';

export interface MissingTrack {
  readonly id: number;
  readonly title: string | null;
  readonly location: string | null;
  readonly reason: MissingReason;
}

export interface Catalog {
  readonly source: string;
  readonly tracks: ReadonlyMap<number, Track>;
  readonly playlists: ReadonlyMap<string, Playlist>;
  readonly missing: readonly MissingTrack[];
}

export type MatchKind = 'path' | 'filename' | 'tags';

export interface DeviceTrack {
  path: string;
  relativePath: string;
  size: number;
  trackId: number | null;
  match: MatchKind | null;
}

export interface DeviceInventory {
  mountPath: string;
  tracks: DeviceTrack[];
  totalBytes: number;
}

export interface EmbeddedTags {
  artist: string | null;
  title: string | null;
  album: string | null;
}

export type PlanMode = 'freshen' | 'initial-fill' | 'copy';

export interface ReplacementPlan {
  mode: PlanMode;
  removals: DeviceTrack[];
  additions: Track[];
  bytesToFree: number;
  bytesToCopy: number;
}

export interface Capacity {
  freeBytes: number;
  blockSize: number;
  minFreeBytes: number;
  maxSizeBytes: number | null;
  currentBytes: number;
}

export interface Chunk {
  tracks: Track[];
  bytes: number;
}

export type DeleteMethod = 'trash' | 'permanent';

export type OutcomeStatus = 'ok' | 'copy-failed' | 'delete-failed' | 'not-found' | 'skipped';

export interface CopyLogEntry {
  trackId: number;
  source: string;
  destination: string;
  copiedAt: string;
  status: OutcomeStatus;
  success: boolean;
  error?: string;
  code?: string;
}

export interface DeletionLogEntry {
  path: string;
  trackId: number | null;
  deletedAt: string;
  method: DeleteMethod;
  status: OutcomeStatus;
  success: boolean;
  error?: string;
  code?: string;
}

export interface PerFileError {
  operation: 'copy' | 'delete';
  path: string;
  message: string;
  code?: string;
}

export interface ExecutionLog {
  executedAt: string;
  deletions: DeletionLogEntry[];
  copies: CopyLogEntry[];
  failures: PerFileError[];
  canceled: boolean;
}

export type ProgressEvent =
  | { operation: 'delete'; index: number; total: number; entry: DeletionLogEntry }
  | { operation: 'copy'; index: number; total: number; entry: CopyLogEntry };

export interface Config {
  libraryPath: string;
  percent: number;
  minFreeMB: number;
  maxSizeMB: number | null;
  playlist: string | null;
  musicExtensions: string[];
  deleteMethod: DeleteMethod;
  initialFill: number;
  historySize: number;
  dataDir: string;
}

export interface HistoryEntry {
  trackId: number;
  removedAt: string;
}

export interface History {
  removed: HistoryEntry[];
}
