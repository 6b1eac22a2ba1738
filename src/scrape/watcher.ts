import type { ScrapeSettings } from "../lib/config";
import { IndexBuildError } from "../lib/errors";
import { debug, errorMessage, log, warn } from "../lib/logger";
import { sortOldestFirst, type StreamingService } from "../services/provider";
import type { Artist, Track } from "../services/types";
import { buildRuleContext } from "./context";
import type { RulesEngine } from "./engine";
import { formatArtists, formatVerdict } from "./formatting";
import type { KnownArtistIndex } from "./knownArtists";
import type { PollState } from "./pollState";
import type {
  CycleReport,
  QueueAttempt,
  ScrapeJournal,
  TrackReport,
  WatcherState,
} from "./types";

export type WatcherOptions = {
  service: StreamingService;
  engine: RulesEngine;
  index: KnownArtistIndex;
  pollState: PollState;
  settings: ScrapeSettings;
  dryRun?: boolean | undefined;
  once?: boolean | undefined;
  journal?: ScrapeJournal | undefined;
  now?: (() => Date) | undefined;
  onCycle?: ((report: CycleReport) => void) | undefined;
};

/**
 * Polls for newly liked tracks, runs each through the rules engine and
 * queues top tracks for the artists of the ones that pass.
 *
 * IDLE → FETCHING → EVALUATING → QUEUEING → IDLE, until stop() or a
 * `once` run moves it to STOPPED. Cycles never overlap.
 */
export class LikedTracksWatcher {
  private readonly service: StreamingService;
  private readonly engine: RulesEngine;
  private readonly index: KnownArtistIndex;
  private readonly pollState: PollState;
  private readonly settings: ScrapeSettings;
  private readonly dryRun: boolean;
  private readonly once: boolean;
  private readonly journal: ScrapeJournal | undefined;
  private readonly now: () => Date;
  private readonly onCycle: ((report: CycleReport) => void) | undefined;

  private currentState: WatcherState = "idle";
  private stopRequested = false;
  private wake: (() => void) | null = null;

  constructor(options: WatcherOptions) {
    this.service = options.service;
    this.engine = options.engine;
    this.index = options.index;
    this.pollState = options.pollState;
    this.settings = options.settings;
    this.dryRun = options.dryRun ?? false;
    this.once = options.once ?? false;
    this.journal = options.journal;
    this.now = options.now ?? (() => new Date());
    this.onCycle = options.onCycle;
  }

  get state(): WatcherState {
    return this.currentState;
  }

  /**
   * Build the known-artist index and seed the marker with the newest like.
   */
  async initialize(): Promise<void> {
    const scanLimit = this.settings.known_artists_scan_limit;
    let seed = await this.index.build(scanLimit);

    if (scanLimit === 0) {
      try {
        seed = await this.service.fetchLikedTracks(null, 1);
      } catch (error) {
        throw new IndexBuildError(`Could not read the latest like: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    this.pollState.record(seed);
    const newest = this.pollState.lastSeen;
    log(
      `[watch] Tracking ${this.index.size} known artists, last like ${
        newest ? newest.toISOString() : "none"
      }`
    );
  }

  /**
   * One fetch–evaluate–queue pass. Never throws for service failures:
   * the report carries the error and the marker stays where it was.
   */
  async runCycle(): Promise<CycleReport> {
    const markerBefore = this.pollState.lastSeen;
    const report: CycleReport = {
      fetched: 0,
      tracks: [],
      queued: 0,
      markerBefore,
      markerAfter: markerBefore,
      error: null,
    };

    this.currentState = "fetching";
    let liked: Track[];
    try {
      liked = await this.service.fetchLikedTracks(markerBefore, this.settings.poll_fetch_limit);
    } catch (error) {
      warn(`[watch] Poll failed, will retry next cycle: ${errorMessage(error)}`);
      report.error = errorMessage(error);
      this.currentState = "idle";
      return report;
    }

    const fresh = sortOldestFirst(liked.filter((track) => this.pollState.isUnseen(track)));
    report.fetched = fresh.length;
    if (fresh.length === 0) {
      debug("[watch] No new liked tracks");
    } else {
      log(`[watch] Found ${fresh.length} new liked track(s)`);
    }

    try {
      for (const track of fresh) {
        const trackReport = await this.processTrack(track);
        report.tracks.push(trackReport);
        report.queued += trackReport.attempts.filter((a) => a.status === "queued").length;
      }
    } catch (error) {
      warn(`[watch] Cycle aborted, will retry next cycle: ${errorMessage(error)}`);
      report.error = errorMessage(error);
      this.currentState = "idle";
      return report;
    }

    this.pollState.record(fresh);
    report.markerAfter = this.pollState.lastSeen;
    this.currentState = "idle";
    return report;
  }

  private async processTrack(track: Track): Promise<TrackReport> {
    this.currentState = "evaluating";
    const context = buildRuleContext({
      track,
      knownArtists: this.index.view(),
      skipKnownArtists: this.settings.skip_known_artists,
      now: this.now(),
    });
    const verdict = this.engine.evaluate(context);
    log(`[watch] ${formatVerdict(track, verdict)}`);

    let attempts: QueueAttempt[] = [];
    if (verdict.passed) {
      if (this.dryRun) {
        log(`[dry-run] Would queue top tracks for: ${formatArtists(verdict.artistsToQueue)}`);
      } else {
        this.currentState = "queueing";
        attempts = await this.queueTopTracks(track, verdict.artistsToQueue);
      }
    }

    // Whatever happened above, these artists never trigger again this run
    this.index.addAll(context.artists);

    const trackReport: TrackReport = { track, verdict, dryRun: this.dryRun, attempts };
    this.journal?.record(this.service.serviceName, trackReport);
    return trackReport;
  }

  private async queueTopTracks(liked: Track, artists: Artist[]): Promise<QueueAttempt[]> {
    const attempts: QueueAttempt[] = [];
    const queuedIds = new Set<string>();

    for (const artist of artists) {
      let topTracks: Track[];
      try {
        topTracks = await this.service.fetchTopTracks(
          artist.id,
          this.settings.top_tracks_limit
        );
      } catch (error) {
        warn(`[watch] ${artist.name}: ${errorMessage(error)}`);
        attempts.push({
          artist,
          trackId: null,
          trackTitle: null,
          status: "failed",
          error: errorMessage(error),
        });
        continue;
      }

      if (topTracks.length === 0) {
        log(`[watch] ${artist.name}: no top tracks`);
        attempts.push({
          artist,
          trackId: null,
          trackTitle: null,
          status: "skipped",
          error: "No top tracks",
        });
        continue;
      }

      for (const top of topTracks) {
        if (top.id === liked.id || queuedIds.has(top.id)) {
          debug(`[watch] ${artist.name}: skipping ${top.title}, already liked or queued`);
          attempts.push({
            artist,
            trackId: top.id,
            trackTitle: top.title,
            status: "skipped",
            error: null,
          });
          continue;
        }

        try {
          await this.service.enqueue(top.id);
          queuedIds.add(top.id);
          log(`[watch] Queued: ${top.title} (${artist.name})`);
          attempts.push({
            artist,
            trackId: top.id,
            trackTitle: top.title,
            status: "queued",
            error: null,
          });
        } catch (error) {
          warn(`[watch] Failed to queue ${top.title} (${artist.name}): ${errorMessage(error)}`);
          attempts.push({
            artist,
            trackId: top.id,
            trackTitle: top.title,
            status: "failed",
            error: errorMessage(error),
          });
        }
      }
    }

    return attempts;
  }

  /**
   * Loop until stop() is called, or for exactly one cycle in `once` mode.
   */
  async start(): Promise<void> {
    const intervalMs = this.settings.poll_interval_seconds * 1000;
    log(`[watch] Poll interval: ${this.settings.poll_interval_seconds}s`);
    log(`[watch] Active rules: ${this.engine.listRules().join(", ")}`);

    while (!this.stopRequested) {
      const report = await this.runCycle();
      this.onCycle?.(report);
      if (this.once || this.stopRequested) break;
      await this.idle(intervalMs);
    }

    this.currentState = "stopped";
    log("[watch] Stopped");
  }

  /**
   * Request shutdown. Takes effect at the next idle boundary; an in-flight
   * cycle is allowed to finish.
   */
  stop(): void {
    this.stopRequested = true;
    this.wake?.();
  }

  private idle(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}
