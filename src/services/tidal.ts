import { z } from "zod";
import { FetchError, QueueError } from "../lib/errors";
import { debug } from "../lib/logger";
import { sleep as defaultSleep, withRetry } from "../lib/retry";
import {
  likedAtOrAfter,
  parseTimestamp,
  sortNewestFirst,
  type StreamingService,
} from "./provider";
import type { Artist, PlaybackState, Track } from "./types";

const RATE_LIMIT_MS = 200;
const BATCH_SIZE = 50;
const REQUEST_TIMEOUT_MS = 15000;
const JSON_API = "application/vnd.api+json";

// --- JSON:API schemas ---

const ResourceRefSchema = z.object({
  id: z.string(),
  type: z.string(),
  meta: z.object({ addedAt: z.string().nullish() }).nullish(),
});

const ResourceSchema = ResourceRefSchema.extend({
  attributes: z
    .object({
      title: z.string().nullish(),
      version: z.string().nullish(),
      name: z.string().nullish(),
    })
    .nullish(),
  relationships: z
    .object({
      artists: z.object({ data: z.array(ResourceRefSchema).nullish() }).nullish(),
    })
    .nullish(),
});

const DocumentSchema = z.object({
  data: z.union([z.array(ResourceSchema), ResourceSchema]).nullish(),
  included: z.array(ResourceSchema).nullish(),
  links: z.object({ next: z.string().nullish() }).nullish(),
});

type Resource = z.infer<typeof ResourceSchema>;
type Document = z.infer<typeof DocumentSchema>;

export type TidalClientOptions = {
  accessToken: string;
  apiUrl: string;
  countryCode: string;
  queuePlaylistId: string | null;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Build a lookup map from included resources: "type:id" -> resource
 */
function buildIncludedMap(included: Resource[]): Map<string, Resource> {
  const map = new Map<string, Resource>();
  for (const item of included) {
    map.set(`${item.type}:${item.id}`, item);
  }
  return map;
}

function asResourceList(data: Document["data"]): Resource[] {
  return Array.isArray(data) ? data : [];
}

export function mapTrackResource(
  track: Resource,
  includedMap: Map<string, Resource>,
  likedAt: Date | null
): Track {
  const attrs = track.attributes;
  const title = attrs?.version
    ? `${attrs.title ?? "Unknown"} (${attrs.version})`
    : (attrs?.title ?? "Unknown");

  const artists: Artist[] = [];
  for (const ref of track.relationships?.artists?.data ?? []) {
    const artist = includedMap.get(`artists:${ref.id}`);
    artists.push({ id: ref.id, name: artist?.attributes?.name ?? "Unknown" });
  }

  return { id: track.id, title, artists, likedAt };
}

/**
 * Extract the page cursor from a JSON:API `links.next` value.
 */
export function cursorFromNextLink(next: string | null | undefined): string | undefined {
  if (!next) return undefined;
  const match = next.match(/page%5Bcursor%5D=([^&]+)|page\[cursor\]=([^&]+)/);
  if (!match) return undefined;
  const cursor = decodeURIComponent(match[1] ?? match[2] ?? "");
  return cursor.length > 0 ? cursor : undefined;
}

/**
 * TIDAL open API adapter. The API has no remote playback queue, so
 * "enqueue" appends to a playlist the listener keeps playing
 * (`tidal.queue_playlist_id`).
 */
export class TidalClient implements StreamingService {
  readonly serviceName = "TIDAL";
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly countryCode: string;
  private readonly queuePlaylistId: string | null;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private userId: string | null = null;

  constructor(options: TidalClientOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, "");
    this.accessToken = options.accessToken;
    this.countryCode = options.countryCode;
    this.queuePlaylistId = options.queuePlaylistId;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  private async request(
    pathAndQuery: string,
    label: string,
    init?: { method: "POST"; body: unknown }
  ): Promise<Document> {
    const url = `${this.baseUrl}${pathAndQuery}`;
    const response = await withRetry(
      async () => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
        try {
          return await this.fetchImpl(url, {
            method: init?.method ?? "GET",
            headers: {
              Accept: JSON_API,
              Authorization: `Bearer ${this.accessToken}`,
              ...(init ? { "Content-Type": JSON_API } : {}),
            },
            ...(init ? { body: JSON.stringify(init.body) } : {}),
            signal: controller.signal,
          });
        } finally {
          clearTimeout(timeout);
        }
      },
      { label, sleep: this.sleep }
    );

    if (!response.ok) {
      throw new Error(`TIDAL returned ${response.status} for ${label}`);
    }
    if (response.status === 204) return {};
    return DocumentSchema.parse((await response.json()) ?? {});
  }

  private query(params: Record<string, string>): string {
    const search = new URLSearchParams({ countryCode: this.countryCode, ...params });
    return search.toString();
  }

  private async resolveUserId(): Promise<string> {
    if (this.userId) return this.userId;
    const doc = await this.request("/users/me", "current user");
    const data = doc.data;
    const id = data && !Array.isArray(data) ? data.id : undefined;
    if (!id) {
      throw new Error("TIDAL did not return a user id");
    }
    this.userId = id;
    return id;
  }

  /**
   * Batch-fetch tracks by IDs with artist resolution.
   * Chunks into batches of BATCH_SIZE to stay within URL length limits.
   */
  private async fetchTracksByIds(
    trackIds: string[],
    likedAt: Map<string, Date | null>
  ): Promise<Track[]> {
    const byId = new Map<string, Track>();

    for (let i = 0; i < trackIds.length; i += BATCH_SIZE) {
      if (i > 0) await this.sleep(RATE_LIMIT_MS);

      const chunk = trackIds.slice(i, i + BATCH_SIZE);
      const doc = await this.request(
        `/tracks?${this.query({ "filter[id]": chunk.join(","), include: "artists" })}`,
        "tracks"
      );
      const includedMap = buildIncludedMap(doc.included ?? []);
      for (const resource of asResourceList(doc.data)) {
        byId.set(
          resource.id,
          mapTrackResource(resource, includedMap, likedAt.get(resource.id) ?? null)
        );
      }
    }

    // Preserve original ID order (API may return in different order)
    const ordered: Track[] = [];
    for (const id of trackIds) {
      const track = byId.get(id);
      if (track) ordered.push(track);
    }
    return ordered;
  }

  async fetchLikedTracks(since: Date | null, limit: number): Promise<Track[]> {
    try {
      const userId = await this.resolveUserId();
      const likedAt = new Map<string, Date | null>();
      let cursor: string | undefined;

      // The collection has no guaranteed order, so a poll with a marker
      // walks it to the end; only a scan from scratch stops at `limit`
      while (since || likedAt.size < limit) {
        const params: Record<string, string> = { locale: "en-US" };
        if (cursor) params["page[cursor]"] = cursor;

        const doc = await this.request(
          `/userCollections/${encodeURIComponent(userId)}/relationships/tracks?${this.query(params)}`,
          "liked tracks"
        );
        const refs = asResourceList(doc.data);
        if (refs.length === 0) break;
        for (const ref of refs) {
          likedAt.set(ref.id, parseTimestamp(ref.meta?.addedAt));
        }

        cursor = cursorFromNextLink(doc.links?.next);
        if (!cursor) break;
        await this.sleep(RATE_LIMIT_MS);
      }

      const candidateIds = [...likedAt.entries()]
        .filter(([, addedAt]) => addedAt && (!since || addedAt.getTime() >= since.getTime()))
        .map(([id]) => id);
      debug(`[tidal] ${likedAt.size} collection entries, ${candidateIds.length} since marker`);

      const tracks = sortNewestFirst(
        (await this.fetchTracksByIds(candidateIds, likedAt)).filter((track) =>
          likedAtOrAfter(track, since)
        )
      );
      return since ? tracks : tracks.slice(0, limit);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Failed to fetch favorites: ${message}`, { cause: error });
    }
  }

  async fetchTopTracks(artistId: string, count: number): Promise<Track[]> {
    try {
      const doc = await this.request(
        `/artists/${encodeURIComponent(artistId)}/relationships/tracks?${this.query({
          collapseBy: "FINGERPRINT",
        })}`,
        `top tracks ${artistId}`
      );
      const trackIds = asResourceList(doc.data)
        .filter((ref) => ref.type === "tracks")
        .map((ref) => ref.id)
        .slice(0, count);
      if (trackIds.length === 0) return [];
      return await this.fetchTracksByIds(trackIds, new Map());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueueError(`Failed to get top tracks for artist ${artistId}: ${message}`, {
        cause: error,
        artistId,
      });
    }
  }

  async enqueue(trackId: string): Promise<void> {
    if (!this.queuePlaylistId) {
      throw new QueueError(
        "TIDAL has no remote playback queue. Set tidal.queue_playlist_id to a playlist to queue into."
      );
    }
    try {
      await this.request(
        `/playlists/${encodeURIComponent(this.queuePlaylistId)}/relationships/items?${this.query({})}`,
        `queue ${trackId}`,
        { method: "POST", body: { data: [{ id: trackId, type: "tracks" }] } }
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueueError(`Failed to add ${trackId} to queue playlist: ${message}`, {
        cause: error,
      });
    }
  }

  async describePlayback(): Promise<PlaybackState | null> {
    // The open API exposes no playback state
    return null;
  }
}
