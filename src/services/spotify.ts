import { z } from "zod";
import { FetchError, NoActivePlaybackError, QueueError } from "../lib/errors";
import { debug } from "../lib/logger";
import { withRetry } from "../lib/retry";
import { likedAtOrAfter, parseTimestamp, type StreamingService } from "./provider";
import type { Artist, PlaybackState, Track } from "./types";

const PAGE_SIZE = 50;
const REQUEST_TIMEOUT_MS = 15000;

// --- Payload schemas ---

const SpotifyArtistSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
});

const SpotifyTrackSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  artists: z.array(SpotifyArtistSchema).nullish(),
});

type SpotifyTrack = z.infer<typeof SpotifyTrackSchema>;

const SavedTracksSchema = z.object({
  items: z
    .array(
      z
        .object({
          added_at: z.string().nullish(),
          track: SpotifyTrackSchema.nullish(),
        })
        .nullable()
    )
    .nullish(),
  next: z.string().nullish(),
});

const TopTracksSchema = z.object({
  tracks: z.array(SpotifyTrackSchema).nullish(),
});

const PlayerSchema = z.object({
  is_playing: z.boolean().nullish(),
  device: z.object({ name: z.string().nullish() }).nullish(),
  item: z.object({ name: z.string().nullish() }).nullish(),
});

export function mapSpotifyTrack(raw: SpotifyTrack, likedAt: Date | null): Track | null {
  if (!raw.id) return null;
  const artists: Artist[] = [];
  for (const artist of raw.artists ?? []) {
    if (!artist.id) continue;
    artists.push({ id: artist.id, name: artist.name ?? "Unknown" });
  }
  return {
    id: raw.id,
    title: raw.name ?? "Unknown",
    artists,
    likedAt,
  };
}

/** Throws ZodError when the payload is not a saved-tracks page. */
export function normalizeSavedTracks(payload: unknown): { tracks: Track[]; hasNext: boolean } {
  const page = SavedTracksSchema.parse(payload ?? {});
  const tracks: Track[] = [];
  for (const item of page.items ?? []) {
    if (!item?.track) continue;
    const track = mapSpotifyTrack(item.track, parseTimestamp(item.added_at));
    if (track) tracks.push(track);
  }
  return { tracks, hasNext: Boolean(page.next) };
}

export type SpotifyClientOptions = {
  accessToken: string;
  apiUrl: string;
  market: string;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Spotify Web API adapter. The access token must carry the
 * user-library-read, user-read-playback-state and
 * user-modify-playback-state scopes.
 */
export class SpotifyClient implements StreamingService {
  readonly serviceName = "Spotify";
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly market: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(options: SpotifyClientOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, "");
    this.accessToken = options.accessToken;
    this.market = options.market;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep;
  }

  private async request(
    method: "GET" | "POST",
    pathAndQuery: string,
    label: string
  ): Promise<Response> {
    const url = `${this.baseUrl}${pathAndQuery}`;
    return withRetry(
      async () => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
        try {
          return await this.fetchImpl(url, {
            method,
            headers: {
              Accept: "application/json",
              Authorization: `Bearer ${this.accessToken}`,
            },
            signal: controller.signal,
          });
        } finally {
          clearTimeout(timeout);
        }
      },
      { label, ...(this.sleep ? { sleep: this.sleep } : {}) }
    );
  }

  async fetchLikedTracks(since: Date | null, limit: number): Promise<Track[]> {
    const collected: Track[] = [];
    const pageLimit = Math.min(PAGE_SIZE, Math.max(1, limit));
    let offset = 0;

    // With a marker, read every page back to it; `limit` only caps a scan from scratch
    while (since || collected.length < limit) {
      const pageSize = since ? pageLimit : Math.min(pageLimit, limit - collected.length);
      let page: { tracks: Track[]; hasNext: boolean };
      try {
        const response = await this.request(
          "GET",
          `/me/tracks?limit=${pageSize}&offset=${offset}`,
          "liked tracks"
        );
        if (!response.ok) {
          throw new Error(`Spotify returned ${response.status}`);
        }
        page = normalizeSavedTracks(await response.json());
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new FetchError(`Failed to fetch liked tracks: ${message}`, { cause: error });
      }

      debug(`[spotify] Liked tracks page at offset ${offset}: ${page.tracks.length} tracks`);

      // Saved tracks come newest first, so the first older one ends the scan
      for (const track of page.tracks) {
        if (!likedAtOrAfter(track, since)) return collected;
        collected.push(track);
        if (!since && collected.length >= limit) return collected;
      }

      if (!page.hasNext || page.tracks.length === 0) break;
      offset += pageSize;
    }

    return collected;
  }

  async fetchTopTracks(artistId: string, count: number): Promise<Track[]> {
    let payload: z.infer<typeof TopTracksSchema>;
    try {
      const response = await this.request(
        "GET",
        `/artists/${encodeURIComponent(artistId)}/top-tracks?market=${encodeURIComponent(this.market)}`,
        `top tracks ${artistId}`
      );
      if (!response.ok) {
        throw new Error(`Spotify returned ${response.status}`);
      }
      payload = TopTracksSchema.parse((await response.json()) ?? {});
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueueError(`Failed to get top tracks for artist ${artistId}: ${message}`, {
        cause: error,
        artistId,
      });
    }

    const tracks: Track[] = [];
    for (const item of payload.tracks ?? []) {
      const track = mapSpotifyTrack(item, null);
      if (track) tracks.push(track);
    }
    return tracks.slice(0, count);
  }

  async enqueue(trackId: string): Promise<void> {
    const uri = `spotify:track:${trackId}`;
    let response: Response;
    try {
      response = await this.request(
        "POST",
        `/me/player/queue?uri=${encodeURIComponent(uri)}`,
        `queue ${trackId}`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueueError(`Failed to queue ${uri}: ${message}`, { cause: error });
    }

    if (response.status === 404) {
      throw new NoActivePlaybackError(
        "No active device found. Make sure Spotify is playing on a device."
      );
    }
    if (!response.ok) {
      throw new QueueError(`Failed to queue ${uri}: Spotify returned ${response.status}`);
    }
  }

  async describePlayback(): Promise<PlaybackState | null> {
    const response = await this.request("GET", "/me/player", "playback state");
    if (response.status === 204) return null;
    if (!response.ok) {
      throw new Error(`Spotify returned ${response.status}`);
    }
    const raw = PlayerSchema.parse((await response.json()) ?? {});
    return {
      isPlaying: raw.is_playing === true,
      deviceName: raw.device?.name ?? null,
      trackTitle: raw.item?.name ?? null,
    };
  }
}
