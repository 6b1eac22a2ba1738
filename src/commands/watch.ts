import { Command } from "commander";
import { loadConfig, parseService, type ScoutConfig } from "../lib/config";
import { errorMessage, log, setVerbose, warn } from "../lib/logger";
import { applySchema, createScrapeJournal, openDatabase } from "../db";
import { createStreamingService } from "../services/factory";
import type { StreamingService } from "../services/provider";
import type { PlaybackState } from "../services/types";
import {
  KnownArtistIndex,
  LikedTracksWatcher,
  PollState,
  RulesEngine,
  defaultRules,
  formatCycleSummary,
  formatStatus,
  type CycleReport,
  type ScrapeJournal,
} from "../scrape";

export type WatchOptions = {
  once?: boolean;
  dryRun?: boolean;
  status?: boolean;
  debug?: boolean;
  service?: string;
  history?: boolean;
};

export type WatchDependencies = {
  config?: ScoutConfig;
  service?: StreamingService;
  engine?: RulesEngine;
  journal?: ScrapeJournal;
  print?: (text: string) => void;
};

/**
 * Running totals for one `watch` run. Only the latest report is kept, so a
 * long-running watcher does not accumulate history in memory.
 */
export class RunTally {
  last: CycleReport | null = null;
  cycles = 0;
  queued = 0;

  add(report: CycleReport): void {
    this.last = report;
    this.cycles += 1;
    this.queued += report.queued;
  }
}

async function printStatus(
  service: StreamingService,
  config: ScoutConfig,
  engine: RulesEngine,
  print: (text: string) => void
): Promise<void> {
  const index = new KnownArtistIndex(service);
  const pollState = new PollState();
  const watcher = new LikedTracksWatcher({
    service,
    engine,
    index,
    pollState,
    settings: config.scrape,
  });
  await watcher.initialize();

  let playback: PlaybackState | null = null;
  try {
    playback = await service.describePlayback();
  } catch (error) {
    warn(`[status] Could not read playback state: ${errorMessage(error)}`);
  }

  print(
    formatStatus({
      serviceName: service.serviceName,
      playback,
      settings: config.scrape,
      rules: engine.describeRules(),
      knownArtists: index.size,
      lastLike: pollState.lastSeen,
    })
  );
}

export async function runWatch(
  options: WatchOptions,
  deps: WatchDependencies = {}
): Promise<void> {
  setVerbose(Boolean(options.debug));
  const print = deps.print ?? ((text: string) => console.log(text));

  const config = deps.config ?? loadConfig();
  const serviceName = options.service
    ? parseService("--service", options.service)
    : config.service;
  const service = deps.service ?? createStreamingService(serviceName, config);
  const engine = deps.engine ?? new RulesEngine(defaultRules(config.scrape));

  log(`[watch] Using service: ${service.serviceName}`);

  if (options.status) {
    await printStatus(service, config, engine, print);
    return;
  }

  if (options.dryRun) {
    log("[watch] DRY RUN - nothing will be queued");
  }

  const db =
    deps.journal || options.history === false ? null : openDatabase(config.database.path);
  try {
    let journal = deps.journal;
    if (db) {
      applySchema(db);
      journal = createScrapeJournal(db);
    }

    const tally = new RunTally();
    const watcher = new LikedTracksWatcher({
      service,
      engine,
      index: new KnownArtistIndex(service),
      pollState: new PollState(),
      settings: config.scrape,
      dryRun: options.dryRun,
      once: options.once,
      journal,
      onCycle: (report) => tally.add(report),
    });

    await watcher.initialize();

    const shutdown = () => {
      log("[watch] Received stop signal, finishing current cycle...");
      watcher.stop();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    try {
      await watcher.start();
    } finally {
      process.removeListener("SIGINT", shutdown);
      process.removeListener("SIGTERM", shutdown);
    }

    if (options.once && tally.last) {
      print(formatCycleSummary(tally.last));
    } else {
      log(`[watch] Queued ${tally.queued} track(s) in ${tally.cycles} cycle(s) this run`);
    }
  } finally {
    db?.close();
  }
}

export function registerWatchCommand(program: Command): void {
  program
    .command("watch", { isDefault: true })
    .description("Poll liked tracks and queue top tracks from new collaborators")
    .option("--once", "Run a single poll cycle and exit")
    .option("--dry-run", "Evaluate new likes but do not queue anything")
    .option("--status", "Show service, configuration and index summary, then exit")
    .option("--debug", "Verbose logging")
    .option("--service <service>", "Streaming service (spotify|tidal)")
    .option("--no-history", "Do not record verdicts in the history database")
    .action(async (options: WatchOptions) => {
      await runWatch(options);
    });
}
