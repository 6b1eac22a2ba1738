import type { ScoutConfig, ServiceName } from "../lib/config";
import { ConfigError } from "../lib/errors";
import type { StreamingService } from "./provider";
import { SpotifyClient } from "./spotify";
import { TidalClient } from "./tidal";

type FactoryOptions = {
  fetchImpl?: typeof fetch;
};

export function createStreamingService(
  service: ServiceName,
  config: ScoutConfig,
  options: FactoryOptions = {}
): StreamingService {
  const fetchOption = options.fetchImpl ? { fetchImpl: options.fetchImpl } : {};

  if (service === "spotify") {
    const token = config.spotify.access_token;
    if (!token) {
      throw new ConfigError("SPOTIFY_ACCESS_TOKEN", "required for the spotify service");
    }
    return new SpotifyClient({
      accessToken: token,
      apiUrl: config.spotify.api_url,
      market: config.spotify.market,
      ...fetchOption,
    });
  }

  const token = config.tidal.access_token;
  if (!token) {
    throw new ConfigError("TIDAL_ACCESS_TOKEN", "required for the tidal service");
  }
  return new TidalClient({
    accessToken: token,
    apiUrl: config.tidal.api_url,
    countryCode: config.tidal.country_code,
    queuePlaylistId: config.tidal.queue_playlist_id,
    ...fetchOption,
  });
}
