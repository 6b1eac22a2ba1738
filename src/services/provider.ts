import type { Artist, PlaybackState, Track } from "./types";

/**
 * Streaming service interface — abstracts away Spotify/TIDAL/etc.
 * The watcher only ever talks to a service through this.
 */
export interface StreamingService {
  readonly serviceName: string;
  /**
   * Likes at or after `since`, newest first. The marker instant is included
   * because like timestamps are coarse; callers drop what they already saw.
   * With `since` null this is a scan of at most `limit` recent likes; with a
   * marker every like back to it is returned and `limit` is only a page size.
   */
  fetchLikedTracks(since: Date | null, limit: number): Promise<Track[]>;
  fetchTopTracks(artistId: string, count: number): Promise<Track[]>;
  /** Throws NoActivePlaybackError when no device is playing. */
  enqueue(trackId: string): Promise<void>;
  describePlayback(): Promise<PlaybackState | null>;
}

export function uniqueArtists(artists: readonly Artist[]): Artist[] {
  const seen = new Set<string>();
  const unique: Artist[] = [];
  for (const artist of artists) {
    if (seen.has(artist.id)) continue;
    seen.add(artist.id);
    unique.push(artist);
  }
  return unique;
}

export function likedAtOrAfter(track: Track, since: Date | null): boolean {
  if (!track.likedAt) return false;
  if (!since) return true;
  return track.likedAt.getTime() >= since.getTime();
}

function likedTime(track: Track): number {
  return track.likedAt ? track.likedAt.getTime() : 0;
}

/** Stable sort; tracks liked at the same instant keep their relative order. */
export function sortNewestFirst(tracks: readonly Track[]): Track[] {
  return tracks
    .map((track, index) => ({ track, index }))
    .sort((a, b) => likedTime(b.track) - likedTime(a.track) || a.index - b.index)
    .map(({ track }) => track);
}

export function sortOldestFirst(tracks: readonly Track[]): Track[] {
  return sortNewestFirst(tracks).reverse();
}

export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
