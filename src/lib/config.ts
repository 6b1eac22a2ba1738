import fs from "fs";
import yaml from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors";
import { defaultConfigPath, defaultDatabasePath, expandHome } from "./paths";

export const SERVICE_NAMES = ["spotify", "tidal"] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

export type ScrapeSettings = {
  min_artists: number;
  top_tracks_limit: number;
  skip_known_artists: boolean;
  poll_interval_seconds: number;
  known_artists_scan_limit: number;
  poll_fetch_limit: number;
};

export type ScoutConfig = {
  service: ServiceName;
  scrape: ScrapeSettings;
  spotify: {
    access_token: string | null;
    api_url: string;
    market: string;
  };
  tidal: {
    access_token: string | null;
    api_url: string;
    country_code: string;
    queue_playlist_id: string | null;
  };
  database: {
    path: string;
  };
};

type Env = Record<string, string | undefined>;

export const DEFAULT_SCRAPE_SETTINGS: ScrapeSettings = {
  min_artists: 2,
  top_tracks_limit: 1,
  skip_known_artists: true,
  poll_interval_seconds: 30,
  known_artists_scan_limit: 500,
  poll_fetch_limit: 20,
};

const DEFAULT_CONFIG: ScoutConfig = {
  service: "spotify",
  scrape: DEFAULT_SCRAPE_SETTINGS,
  spotify: {
    access_token: null,
    api_url: "https://api.spotify.com/v1",
    market: "US",
  },
  tidal: {
    access_token: null,
    api_url: "https://openapi.tidal.com/v2",
    country_code: "US",
    queue_playlist_id: null,
  },
  database: {
    path: defaultDatabasePath(),
  },
};

// --- Schemas ---

const trimmed = (raw: unknown): unknown => (typeof raw === "string" ? raw.trim() : raw);

const integer = (min: number) =>
  z.preprocess(
    trimmed,
    z.coerce
      .number({ invalid_type_error: "expected an integer" })
      .int({ message: "expected an integer" })
      .min(min, { message: `must be >= ${min}` })
  );

const TRUE_WORDS = ["true", "1", "yes", "on"];
const FALSE_WORDS = ["false", "0", "no", "off"];

const flag = z.preprocess((raw) => {
  if (typeof raw !== "string") return raw;
  const normalized = raw.trim().toLowerCase();
  if (TRUE_WORDS.includes(normalized)) return true;
  if (FALSE_WORDS.includes(normalized)) return false;
  return raw;
}, z.boolean({ invalid_type_error: "expected a boolean" }));

const serviceName = z.preprocess(
  (raw) => (typeof raw === "string" ? raw.trim().toLowerCase() : raw),
  z.enum(SERVICE_NAMES, {
    errorMap: () => ({ message: `expected one of ${SERVICE_NAMES.join(", ")}` }),
  })
);

// Blank strings count as unset
const optionalString = z
  .preprocess(
    (raw) => (typeof raw === "string" ? raw.trim() || null : raw),
    z.string({ invalid_type_error: "expected a string" }).nullish()
  )
  .transform((value) => value ?? null);

const section = z.record(z.string(), z.unknown(), { invalid_type_error: "expected a mapping" }).nullish();

const FileConfigSchema = z.object({
  service: z.unknown(),
  scrape: section,
  spotify: section,
  tidal: section,
  database: section,
});

const TopLevelSchema = z.record(z.string(), z.unknown(), {
  invalid_type_error: "expected a mapping at the top level",
});

/**
 * Effective settings keyed by their environment variable names, so a
 * failing path names the key the user has to fix.
 */
const SettingsSchema = z.object({
  SERVICE: serviceName,
  SCRAPE_MIN_ARTISTS: integer(1),
  SCRAPE_TOP_TRACKS_LIMIT: integer(1),
  SCRAPE_SKIP_KNOWN_ARTISTS: flag,
  SCRAPE_POLL_INTERVAL_SECONDS: integer(0),
  SCRAPE_KNOWN_ARTISTS_SCAN_LIMIT: integer(0),
  SCRAPE_POLL_FETCH_LIMIT: integer(1),
  SPOTIFY_ACCESS_TOKEN: optionalString,
  SPOTIFY_API_URL: optionalString,
  SPOTIFY_MARKET: optionalString,
  TIDAL_ACCESS_TOKEN: optionalString,
  TIDAL_API_URL: optionalString,
  TIDAL_COUNTRY_CODE: optionalString,
  TIDAL_QUEUE_PLAYLIST_ID: optionalString,
  COLLAB_SCOUT_DB_PATH: optionalString,
});

type RawSettings = Record<keyof z.input<typeof SettingsSchema>, unknown>;

function toConfigError(
  error: z.ZodError,
  raw: Record<string, unknown>,
  fallbackKey: string
): ConfigError {
  const issue = error.issues[0];
  const key = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : fallbackKey;
  const value = raw[String(issue?.path[0] ?? fallbackKey)];
  const got = value === undefined ? "" : ` (got ${JSON.stringify(value)})`;
  return new ConfigError(key, `${issue?.message ?? "invalid value"}${got}`);
}

export function parseService(key: string, raw: unknown): ServiceName {
  const result = serviceName.safeParse(raw);
  if (!result.success) {
    throw toConfigError(result.error, { [key]: raw }, key);
  }
  return result.data;
}

// --- Loading ---

export function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};
  const raw = fs.readFileSync(configPath, "utf8");
  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(configPath, `not valid YAML (${message})`);
  }
  if (parsed == null) return {};
  const result = TopLevelSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(configPath, result.error.issues[0]?.message ?? "invalid file");
  }
  return result.data;
}

/**
 * Build the effective configuration: defaults, then the YAML file, then
 * environment variables. Every value is validated; the first bad one
 * raises ConfigError.
 */
export function resolveConfig(fileConfig: Record<string, unknown>, env: Env): ScoutConfig {
  const fileResult = FileConfigSchema.safeParse(fileConfig);
  if (!fileResult.success) {
    throw toConfigError(fileResult.error, fileConfig, "config");
  }
  const file = fileResult.data;
  const scrape: Record<string, unknown> = file.scrape ?? {};
  const spotify: Record<string, unknown> = file.spotify ?? {};
  const tidal: Record<string, unknown> = file.tidal ?? {};
  const database: Record<string, unknown> = file.database ?? {};
  const defaults = DEFAULT_CONFIG.scrape;

  const pick = (envKey: string, fileValue: unknown, fallback: unknown = null) =>
    env[envKey] ?? fileValue ?? fallback;

  const raw: RawSettings = {
    SERVICE: pick("SERVICE", file.service, DEFAULT_CONFIG.service),
    SCRAPE_MIN_ARTISTS: pick("SCRAPE_MIN_ARTISTS", scrape.min_artists, defaults.min_artists),
    SCRAPE_TOP_TRACKS_LIMIT: pick(
      "SCRAPE_TOP_TRACKS_LIMIT",
      scrape.top_tracks_limit,
      defaults.top_tracks_limit
    ),
    SCRAPE_SKIP_KNOWN_ARTISTS: pick(
      "SCRAPE_SKIP_KNOWN_ARTISTS",
      scrape.skip_known_artists,
      defaults.skip_known_artists
    ),
    SCRAPE_POLL_INTERVAL_SECONDS: pick(
      "SCRAPE_POLL_INTERVAL_SECONDS",
      scrape.poll_interval_seconds,
      defaults.poll_interval_seconds
    ),
    SCRAPE_KNOWN_ARTISTS_SCAN_LIMIT: pick(
      "SCRAPE_KNOWN_ARTISTS_SCAN_LIMIT",
      scrape.known_artists_scan_limit,
      defaults.known_artists_scan_limit
    ),
    SCRAPE_POLL_FETCH_LIMIT: pick(
      "SCRAPE_POLL_FETCH_LIMIT",
      scrape.poll_fetch_limit,
      defaults.poll_fetch_limit
    ),
    SPOTIFY_ACCESS_TOKEN: pick("SPOTIFY_ACCESS_TOKEN", spotify.access_token),
    SPOTIFY_API_URL: pick("SPOTIFY_API_URL", spotify.api_url),
    SPOTIFY_MARKET: pick("SPOTIFY_MARKET", spotify.market),
    TIDAL_ACCESS_TOKEN: pick("TIDAL_ACCESS_TOKEN", tidal.access_token),
    TIDAL_API_URL: pick("TIDAL_API_URL", tidal.api_url),
    TIDAL_COUNTRY_CODE: pick("TIDAL_COUNTRY_CODE", tidal.country_code),
    TIDAL_QUEUE_PLAYLIST_ID: pick("TIDAL_QUEUE_PLAYLIST_ID", tidal.queue_playlist_id),
    COLLAB_SCOUT_DB_PATH: pick("COLLAB_SCOUT_DB_PATH", database.path),
  };

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    throw toConfigError(result.error, raw, "config");
  }
  const settings = result.data;

  return {
    service: settings.SERVICE,
    scrape: {
      min_artists: settings.SCRAPE_MIN_ARTISTS,
      top_tracks_limit: settings.SCRAPE_TOP_TRACKS_LIMIT,
      skip_known_artists: settings.SCRAPE_SKIP_KNOWN_ARTISTS,
      poll_interval_seconds: settings.SCRAPE_POLL_INTERVAL_SECONDS,
      known_artists_scan_limit: settings.SCRAPE_KNOWN_ARTISTS_SCAN_LIMIT,
      poll_fetch_limit: settings.SCRAPE_POLL_FETCH_LIMIT,
    },
    spotify: {
      access_token: settings.SPOTIFY_ACCESS_TOKEN,
      api_url: settings.SPOTIFY_API_URL ?? DEFAULT_CONFIG.spotify.api_url,
      market: settings.SPOTIFY_MARKET ?? DEFAULT_CONFIG.spotify.market,
    },
    tidal: {
      access_token: settings.TIDAL_ACCESS_TOKEN,
      api_url: settings.TIDAL_API_URL ?? DEFAULT_CONFIG.tidal.api_url,
      country_code: settings.TIDAL_COUNTRY_CODE ?? DEFAULT_CONFIG.tidal.country_code,
      queue_playlist_id: settings.TIDAL_QUEUE_PLAYLIST_ID,
    },
    database: {
      path: expandHome(settings.COLLAB_SCOUT_DB_PATH ?? DEFAULT_CONFIG.database.path),
    },
  };
}

export function loadConfig(env: Env = process.env): ScoutConfig {
  const configPath = expandHome(env.COLLAB_SCOUT_CONFIG_PATH ?? defaultConfigPath());
  return resolveConfig(readConfigFile(configPath), env);
}
