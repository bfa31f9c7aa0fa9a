import type { ShowCandidate } from './ShowMatcher.js';

/**
 * Application errors. `status` is the HTTP status routes respond with.
 */
export class RerunError extends Error {
  readonly status: number;

  constructor(message: string, status: number = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** The playlist has no show entries at all. */
export class EmptyPlaylistError extends RerunError {
  constructor(playlistName: string) {
    super(`Playlist '${playlistName}' has no shows. Add shows before generating.`, 400);
  }
}

/** None of the playlist's shows could be found in the catalog. */
export class NoResolvableShowsError extends RerunError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(
      missing.length > 0
        ? `None of the configured shows could be found in the library: ${missing.join(', ')}`
        : 'None of the configured shows could be found in the library.',
      422
    );
    this.missing = missing;
  }
}

export class PlaylistNotFoundError extends RerunError {
  constructor(playlistName: string) {
    super(`Playlist '${playlistName}' not found`, 404);
  }
}

export class NoDefaultPlaylistError extends RerunError {
  constructor() {
    super('No default playlist. Create a playlist first.', 404);
  }
}

/** The playlist has never been published, so there is nothing to export. */
export class NothingPublishedError extends RerunError {
  constructor(playlistName: string) {
    super(`Playlist '${playlistName}' has not been generated yet`, 404);
  }
}

export class GenerationInProgressError extends RerunError {
  constructor(playlistName: string) {
    super(`Playlist '${playlistName}' is already being generated`, 409);
  }
}

/** Nothing in the synced library resembles the requested show. */
export class ShowNotFoundError extends RerunError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** Several library titles (or one uncertain one) match; the client must pick. */
export class AmbiguousShowError extends RerunError {
  readonly candidates: ShowCandidate[];

  constructor(query: string, candidates: ShowCandidate[]) {
    super(`No exact match for '${query}'. Did you mean: ${candidates.map(c => c.name).join(', ')}?`, 422);
    this.candidates = candidates;
  }
}

export class ShowHasNoEpisodesError extends RerunError {
  constructor(showName: string) {
    super(`'${showName}' has no episodes`, 422);
  }
}

export class ValidationError extends RerunError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** A catalog or sink call to the media server failed. */
export class UpstreamError extends RerunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorStatus(err: unknown): number {
  return err instanceof RerunError ? err.status : 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
