import { IndexBuildError } from "../lib/errors";
import { log } from "../lib/logger";
import type { StreamingService } from "../services/provider";
import type { Artist, Track } from "../services/types";
import type { KnownArtistsView } from "./types";

/**
 * Set of artist IDs the listener already knows: every artist on the
 * scanned liked tracks, plus every artist evaluated during this run.
 * Append-only; nothing is ever removed.
 */
export class KnownArtistIndex implements KnownArtistsView {
  private readonly ids = new Set<string>();
  private readonly service: StreamingService;

  constructor(service: StreamingService) {
    this.service = service;
  }

  /**
   * Scan up to `scanLimit` of the most recent likes and index their artists.
   * Returns the scanned tracks (newest first). On failure the index stays
   * empty and IndexBuildError is thrown.
   */
  async build(scanLimit: number): Promise<Track[]> {
    if (scanLimit <= 0) return [];

    log(`[index] Building known artists index from last ${scanLimit} liked tracks...`);
    let tracks: Track[];
    try {
      tracks = await this.service.fetchLikedTracks(null, scanLimit);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IndexBuildError(`Could not build known artists index: ${message}`, {
        cause: error,
      });
    }

    for (const track of tracks) {
      this.addAll(track.artists);
    }
    log(`[index] Found ${this.ids.size} known artists from ${tracks.length} liked tracks`);
    return tracks;
  }

  contains(artistId: string): boolean {
    return this.ids.has(artistId);
  }

  /** Returns true when the artist was not known before. */
  add(artistId: string): boolean {
    if (this.ids.has(artistId)) return false;
    this.ids.add(artistId);
    return true;
  }

  addAll(artists: readonly Artist[]): number {
    let added = 0;
    for (const artist of artists) {
      if (this.add(artist.id)) added++;
    }
    return added;
  }

  get size(): number {
    return this.ids.size;
  }

  view(): KnownArtistsView {
    const ids = this.ids;
    return {
      contains: (artistId: string) => ids.has(artistId),
      get size() {
        return ids.size;
      },
    };
  }
}
