import { beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_SCRAPE_SETTINGS, type ScrapeSettings } from "../lib/config";
import { IndexBuildError } from "../lib/errors";
import { FakeStreamingService, track } from "../testing/fakeService";
import { RulesEngine } from "./engine";
import { KnownArtistIndex } from "./knownArtists";
import { PollState } from "./pollState";
import { defaultRules } from "./rules";
import type { CycleReport, ScrapeJournal, TrackReport } from "./types";
import { LikedTracksWatcher } from "./watcher";

type Setup = {
  settings?: Partial<ScrapeSettings>;
  dryRun?: boolean;
  once?: boolean;
  journal?: ScrapeJournal;
  onCycle?: (report: CycleReport) => void;
};

function setup(options: Setup = {}) {
  const settings: ScrapeSettings = {
    ...DEFAULT_SCRAPE_SETTINGS,
    poll_interval_seconds: 0,
    ...options.settings,
  };
  const service = new FakeStreamingService();
  const index = new KnownArtistIndex(service);
  const pollState = new PollState();
  const watcher = new LikedTracksWatcher({
    service,
    engine: new RulesEngine(defaultRules(settings)),
    index,
    pollState,
    settings,
    dryRun: options.dryRun,
    once: options.once,
    journal: options.journal,
    onCycle: options.onCycle,
  });
  return { service, index, pollState, watcher };
}

const SEED_TIME = "2026-01-01T00:00:00.000Z";

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("LikedTracksWatcher.initialize", () => {
  it("indexes artists of existing likes and seeds the marker", async () => {
    const { service, index, pollState, watcher } = setup();
    service.likes = [track("old1", ["s", "t"], SEED_TIME), track("old0", ["u"], "2025-12-01T00:00:00Z")];

    await watcher.initialize();

    expect(index.size).toBe(3);
    expect(pollState.lastSeen?.toISOString()).toBe(SEED_TIME);
  });

  it("reads only the latest like when the scan limit is 0", async () => {
    const { service, index, pollState, watcher } = setup({
      settings: { known_artists_scan_limit: 0 },
    });
    service.likes = [track("old1", ["s", "t"], SEED_TIME)];

    await watcher.initialize();

    expect(index.size).toBe(0);
    expect(service.fetchCalls).toEqual([{ since: null, limit: 1 }]);
    expect(pollState.lastSeen?.toISOString()).toBe(SEED_TIME);
  });

  it("fails with IndexBuildError when the scan cannot be fetched", async () => {
    const { service, index, watcher } = setup();
    service.failFetch = true;

    await expect(watcher.initialize()).rejects.toBeInstanceOf(IndexBuildError);
    expect(index.size).toBe(0);
  });
});

describe("LikedTracksWatcher.runCycle", () => {
  async function ready(options: Setup = {}) {
    const context = setup(options);
    context.service.likes = [track("seed", ["s"], SEED_TIME)];
    await context.watcher.initialize();
    context.service.topTracks.set("x", [track("x1", ["x"])]);
    context.service.topTracks.set("y", [track("y1", ["y"])]);
    return context;
  }

  it("queues one top track per artist of a new collaboration", async () => {
    const { service, pollState, watcher } = await ready();
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(report.tracks[0]?.verdict.passed).toBe(true);
    expect(service.enqueued).toEqual(["x1", "y1"]);
    expect(report.queued).toBe(2);
    expect(pollState.lastSeen?.toISOString()).toBe("2026-01-02T00:00:00.000Z");
    expect(watcher.state).toBe("idle");
  });

  it("skips a solo track on MinimumArtistsRule", async () => {
    const { service, watcher } = await ready();
    service.likes.push(track("t1", ["x"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(report.tracks[0]?.verdict.rule).toBe("MinimumArtistsRule");
    expect(service.topTrackCalls).toEqual([]);
    expect(service.enqueued).toEqual([]);
  });

  it("skips a collaboration with a known artist on NoKnownArtistsRule", async () => {
    const { service, watcher } = setup();
    service.likes = [track("seed", ["x"], SEED_TIME)];
    await watcher.initialize();
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(report.tracks[0]?.verdict.rule).toBe("NoKnownArtistsRule");
    expect(service.enqueued).toEqual([]);
  });

  it("logs but queues nothing in dry-run mode", async () => {
    const { service, index, watcher } = await ready({ dryRun: true });
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(report.tracks[0]?.verdict.passed).toBe(true);
    expect(report.tracks[0]?.dryRun).toBe(true);
    expect(service.topTrackCalls).toEqual([]);
    expect(service.enqueued).toEqual([]);
    expect(index.contains("x")).toBe(true);
  });

  it("finishes the cycle when one enqueue fails", async () => {
    const { service, index, pollState, watcher } = await ready();
    service.failEnqueueFor.add("y1");
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(report.error).toBeNull();
    expect(service.enqueued).toEqual(["x1"]);
    expect(report.tracks[0]?.attempts.map((a) => a.status)).toEqual(["queued", "failed"]);
    expect(index.contains("x")).toBe(true);
    expect(index.contains("y")).toBe(true);
    expect(pollState.lastSeen?.toISOString()).toBe("2026-01-02T00:00:00.000Z");
  });

  it("records a failed attempt when there is no active playback", async () => {
    const { service, watcher } = await ready();
    service.noActivePlayback = true;
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(report.tracks[0]?.attempts.map((a) => a.error)).toEqual([
      "No active device found.",
      "No active device found.",
    ]);
    expect(report.queued).toBe(0);
  });

  it("records a failed attempt when top tracks cannot be fetched", async () => {
    const { service, watcher } = await ready();
    service.failTopTracksFor.add("x");
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(report.tracks[0]?.attempts).toEqual([
      {
        artist: { id: "x", name: "X" },
        trackId: null,
        trackTitle: null,
        status: "failed",
        error: "Failed to get top tracks for artist x",
      },
      {
        artist: { id: "y", name: "Y" },
        trackId: "y1",
        trackTitle: "Track y1",
        status: "queued",
        error: null,
      },
    ]);
  });

  it("leaves the marker alone when the fetch fails", async () => {
    const { service, pollState, watcher } = await ready();
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));
    service.failFetch = true;

    const failed = await watcher.runCycle();

    expect(failed.error).toBe("Failed to fetch liked tracks: service unavailable");
    expect(pollState.lastSeen?.toISOString()).toBe(SEED_TIME);
    expect(watcher.state).toBe("idle");

    service.failFetch = false;
    const retried = await watcher.runCycle();
    expect(retried.fetched).toBe(1);
    expect(service.enqueued).toEqual(["x1", "y1"]);
  });

  it("processes new likes oldest first and learns artists as it goes", async () => {
    const { service, watcher } = await ready();
    service.likes.push(
      track("t2", ["y", "z"], "2026-01-03T00:00:00Z"),
      track("t1", ["x", "y"], "2026-01-02T00:00:00Z")
    );

    const report = await watcher.runCycle();

    expect(report.tracks.map((t) => t.track.id)).toEqual(["t1", "t2"]);
    expect(report.tracks[1]?.verdict.rule).toBe("NoKnownArtistsRule");
    expect(report.markerAfter?.toISOString()).toBe("2026-01-03T00:00:00.000Z");
  });

  it("never reprocesses a like once the marker has passed it", async () => {
    const { service, watcher } = await ready();
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    await watcher.runCycle();
    const second = await watcher.runCycle();

    expect(second.fetched).toBe(0);
    expect(service.enqueued).toEqual(["x1", "y1"]);
  });

  it("evaluates every new like even when more arrive than one page holds", async () => {
    const { service, watcher } = await ready({ settings: { poll_fetch_limit: 2 } });
    service.likes.push(
      track("a", ["x", "y"], "2026-01-02T00:00:00Z"),
      track("b", ["p"], "2026-01-03T00:00:00Z"),
      track("c", ["q"], "2026-01-04T00:00:00Z")
    );

    const first = await watcher.runCycle();
    const second = await watcher.runCycle();

    expect(first.tracks.map((t) => t.track.id)).toEqual(["a", "b", "c"]);
    expect(second.fetched).toBe(0);
    expect(service.fetchCalls[service.fetchCalls.length - 1]).toEqual({
      since: new Date("2026-01-04T00:00:00Z"),
      limit: 2,
    });
  });

  it("picks up a like in the same second as the marker", async () => {
    const { service, watcher } = await ready();
    service.likes.push(track("t1", ["x", "y"], SEED_TIME));

    const report = await watcher.runCycle();

    expect(report.tracks.map((t) => t.track.id)).toEqual(["t1"]);
    expect(service.enqueued).toEqual(["x1", "y1"]);

    const again = await watcher.runCycle();
    expect(again.fetched).toBe(0);
  });

  it("ignores likes without a timestamp", async () => {
    const { service, watcher } = await ready();
    service.likes.push(track("t1", ["x", "y"], null));

    const report = await watcher.runCycle();

    expect(report.fetched).toBe(0);
    expect(report.markerAfter?.toISOString()).toBe(SEED_TIME);
  });

  it("does not queue the liked track itself", async () => {
    const { service, watcher } = await ready({ settings: { top_tracks_limit: 2 } });
    service.topTracks.set("x", [track("t1", ["x", "y"]), track("x1", ["x"])]);
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    const report = await watcher.runCycle();

    expect(service.enqueued).toEqual(["x1", "y1"]);
    expect(report.tracks[0]?.attempts[0]).toMatchObject({ trackId: "t1", status: "skipped" });
  });

  it("queues a shared top track only once", async () => {
    const { service, watcher } = await ready();
    service.topTracks.set("y", [track("x1", ["x", "y"])]);
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    await watcher.runCycle();

    expect(service.enqueued).toEqual(["x1"]);
  });

  it("asks for top_tracks_limit tracks per artist", async () => {
    const { service, watcher } = await ready({ settings: { top_tracks_limit: 3 } });
    service.likes.push(track("t1", ["x", "y"], "2026-01-02T00:00:00Z"));

    await watcher.runCycle();

    expect(service.topTrackCalls).toEqual([
      { artistId: "x", count: 3 },
      { artistId: "y", count: 3 },
    ]);
  });

  it("records every evaluated like in the journal", async () => {
    const recorded: Array<{ serviceName: string; report: TrackReport }> = [];
    const journal: ScrapeJournal = {
      record: (serviceName, report) => recorded.push({ serviceName, report }),
    };
    const { service, watcher } = await ready({ journal });
    service.likes.push(
      track("t1", ["x", "y"], "2026-01-02T00:00:00Z"),
      track("t2", ["z"], "2026-01-03T00:00:00Z")
    );

    await watcher.runCycle();

    expect(recorded.map((r) => [r.serviceName, r.report.track.id, r.report.verdict.passed])).toEqual([
      ["Fake", "t1", true],
      ["Fake", "t2", false],
    ]);
  });
});

describe("LikedTracksWatcher.start", () => {
  it("runs exactly one cycle in once mode", async () => {
    const onCycle = vi.fn();
    const { service, watcher } = setup({ once: true, onCycle });
    service.likes = [track("seed", ["s"], SEED_TIME)];
    await watcher.initialize();

    await watcher.start();

    expect(onCycle).toHaveBeenCalledTimes(1);
    expect(watcher.state).toBe("stopped");
  });

  it("stops during the wait between cycles", async () => {
    let firstCycle: () => void = () => {};
    const cycled = new Promise<void>((resolve) => {
      firstCycle = resolve;
    });
    const { watcher } = setup({
      settings: { poll_interval_seconds: 3600 },
      onCycle: () => firstCycle(),
    });

    const running = watcher.start();
    await cycled;
    watcher.stop();
    await running;

    expect(watcher.state).toBe("stopped");
  });

  it("does not start a cycle after stop was requested", async () => {
    const onCycle = vi.fn();
    const { watcher } = setup({ onCycle });

    watcher.stop();
    await watcher.start();

    expect(onCycle).not.toHaveBeenCalled();
    expect(watcher.state).toBe("stopped");
  });
});
