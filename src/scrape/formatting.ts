import type { ScrapeSettings } from "../lib/config";
import type { Artist, PlaybackState, Track } from "../services/types";
import type { CycleReport, RuleVerdict } from "./types";

export function formatArtists(artists: readonly Artist[]): string {
  if (artists.length === 0) return "Unknown";
  return artists.map((artist) => artist.name).join(", ");
}

export function formatVerdict(track: Track, verdict: RuleVerdict): string {
  const label = `${track.title} - ${formatArtists(track.artists)}`;
  if (verdict.passed) {
    return `PASS ${label}: ${verdict.reason}`;
  }
  return `SKIP ${label}: ${verdict.rule ?? "unknown rule"} - ${verdict.reason}`;
}

export function formatCycleSummary(report: CycleReport): string {
  if (report.error) {
    return `Poll failed: ${report.error}`;
  }
  const passed = report.tracks.filter((t) => t.verdict.passed).length;
  return `Checked ${report.fetched} new like(s), ${passed} passed, ${report.queued} track(s) queued.`;
}

export type StatusInput = {
  serviceName: string;
  playback: PlaybackState | null;
  settings: ScrapeSettings;
  rules: Array<{ name: string; description: string }>;
  knownArtists: number;
  lastLike: Date | null;
};

export function formatStatus(input: StatusInput): string {
  const { settings, playback } = input;
  const lines = [
    "collab-scout status",
    "",
    `Service: ${input.serviceName}`,
    playback && playback.isPlaying
      ? `Playback: playing${playback.trackTitle ? ` "${playback.trackTitle}"` : ""}${
          playback.deviceName ? ` on ${playback.deviceName}` : ""
        }`
      : "Playback: no active playback",
    "",
    "Configuration:",
    `  Min artists to trigger: ${settings.min_artists}`,
    `  Top tracks per artist: ${settings.top_tracks_limit}`,
    `  Skip known artists: ${settings.skip_known_artists}`,
    `  Poll interval: ${settings.poll_interval_seconds}s`,
    `  Known artists scan limit: ${settings.known_artists_scan_limit}`,
    "",
    "Rules:",
    ...input.rules.map((rule, i) => `  ${i + 1}. ${rule.name} - ${rule.description}`),
    "",
    `Known artists: ${input.knownArtists}`,
    `Last like: ${input.lastLike ? input.lastLike.toISOString() : "none"}`,
  ];
  return lines.join("\n");
}
