export abstract class MusicMoverError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MusicMoverError';
  }
}

export class ParseError extends MusicMoverError {
  constructor(
    public readonly file: string,
    public readonly location: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Could not read library ${file} at ${location}: ${detail}`, { cause });
    this.name = 'ParseError';
  }
}

export class NotMountedError extends MusicMoverError {
  constructor(public readonly mountPath: string, reason: string) {
    super(`Device is not mounted at ${mountPath}: ${reason}`);
    this.name = 'NotMountedError';
  }
}

export class UnknownPlaylistError extends MusicMoverError {
  constructor(public readonly playlist: string) {
    super(`Playlist not found in library: ${playlist}`);
    this.name = 'UnknownPlaylistError';
  }
}

export class ConfigError extends MusicMoverError {
  constructor(message: string, cause?: unknown) {
    super(`Invalid configuration: ${message}`, { cause });
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}
