export class ScoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or auth failure while reading liked tracks. Retried next cycle. */
export class FetchError extends ScoutError {}

/** Top-track lookup or enqueue failure for a single artist. */
export class QueueError extends ScoutError {
  readonly artistId: string | null;

  constructor(
    message: string,
    options?: { cause?: unknown; artistId?: string | undefined }
  ) {
    super(message, options);
    this.artistId = options?.artistId ?? null;
  }
}

/** The service has no device currently playing, so nothing can be queued. */
export class NoActivePlaybackError extends QueueError {}

/** Invalid configuration; fatal before the loop starts. */
export class ConfigError extends ScoutError {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid ${key}: ${message}`);
    this.key = key;
  }
}

/** The startup scan of liked tracks failed; fatal. */
export class IndexBuildError extends ScoutError {}
