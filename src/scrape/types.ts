import type { Artist, Track } from "../services/types";

/**
 * Read-only view of the known-artist index handed to rules.
 */
export interface KnownArtistsView {
  contains(artistId: string): boolean;
  readonly size: number;
}

/**
 * Snapshot of one candidate track. Built fresh per track and frozen.
 */
export interface RuleContext {
  readonly track: Track;
  /** The track's artists, deduplicated by id. */
  readonly artists: readonly Artist[];
  readonly artistCount: number;
  readonly knownArtists: KnownArtistsView;
  readonly knownInTrack: readonly Artist[];
  readonly unknownArtists: readonly Artist[];
  readonly skipKnownArtists: boolean;
  readonly now: Date;
}

/**
 * What a single rule says about a context.
 */
export interface RuleOutcome {
  passed: boolean;
  reason: string;
}

export interface Rule {
  readonly name: string;
  readonly description: string;
  evaluate(context: RuleContext): RuleOutcome;
}

/**
 * Aggregate result of running every rule.
 */
export interface RuleVerdict {
  passed: boolean;
  /** Name of the deciding rule: the first failure, or null when all passed. */
  rule: string | null;
  reason: string;
  artistsToQueue: Artist[];
}

export type WatcherState = "idle" | "fetching" | "evaluating" | "queueing" | "stopped";

export type QueueAttempt = {
  artist: Artist;
  trackId: string | null;
  trackTitle: string | null;
  status: "queued" | "failed" | "skipped";
  error: string | null;
};

export type TrackReport = {
  track: Track;
  verdict: RuleVerdict;
  dryRun: boolean;
  attempts: QueueAttempt[];
};

export type CycleReport = {
  fetched: number;
  tracks: TrackReport[];
  queued: number;
  markerBefore: Date | null;
  markerAfter: Date | null;
  error: string | null;
};

/**
 * Sink for evaluated tracks, e.g. the SQLite history journal.
 */
export interface ScrapeJournal {
  record(serviceName: string, report: TrackReport): void;
}
