import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { schemaStatements } from "./schema";
import type { ScrapeJournal, TrackReport } from "../scrape/types";

export type JournalAttempt = {
  artistName: string;
  trackTitle: string | null;
  status: "queued" | "failed" | "skipped";
  error: string | null;
};

export type JournalEntry = {
  id: number;
  service: string;
  trackId: string;
  trackTitle: string;
  artists: string[];
  passed: boolean;
  rule: string | null;
  reason: string;
  dryRun: boolean;
  evaluatedAt: string;
  attempts: JournalAttempt[];
};

export type JournalStats = {
  evaluated: number;
  passed: number;
  queued: number;
  failed: number;
};

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const directory = path.dirname(dbPath);
    fs.mkdirSync(directory, { recursive: true });
  }
  return new Database(dbPath);
}

export function applySchema(db: Database.Database): void {
  for (const statement of schemaStatements) {
    db.exec(statement);
  }
}

/**
 * SQLite-backed history of every evaluated like and the queue attempts it
 * triggered. Purely a record; the watcher never reads it back.
 */
export function createScrapeJournal(
  db: Database.Database,
  clock: () => Date = () => new Date()
): ScrapeJournal {
  const insertEvent = db.prepare(`
    INSERT INTO scrape_events (
      service,
      track_id,
      track_title,
      artists_json,
      liked_at,
      passed,
      rule,
      reason,
      dry_run,
      evaluated_at
    )
    VALUES (
      @service,
      @track_id,
      @track_title,
      @artists_json,
      @liked_at,
      @passed,
      @rule,
      @reason,
      @dry_run,
      @evaluated_at
    );
  `);

  const insertAttempt = db.prepare(`
    INSERT INTO queue_attempts (
      event_id,
      artist_id,
      artist_name,
      track_id,
      track_title,
      status,
      error
    )
    VALUES (?, ?, ?, ?, ?, ?, ?);
  `);

  const transaction = db.transaction((serviceName: string, report: TrackReport) => {
    const { track, verdict } = report;
    const result = insertEvent.run({
      service: serviceName,
      track_id: track.id,
      track_title: track.title,
      artists_json: JSON.stringify(track.artists.map((a) => a.name)),
      liked_at: track.likedAt ? track.likedAt.toISOString() : null,
      passed: verdict.passed ? 1 : 0,
      rule: verdict.rule,
      reason: verdict.reason,
      dry_run: report.dryRun ? 1 : 0,
      evaluated_at: clock().toISOString(),
    });
    const eventId = Number(result.lastInsertRowid);
    for (const attempt of report.attempts) {
      insertAttempt.run(
        eventId,
        attempt.artist.id,
        attempt.artist.name,
        attempt.trackId,
        attempt.trackTitle,
        attempt.status,
        attempt.error
      );
    }
  });

  return {
    record(serviceName: string, report: TrackReport): void {
      transaction(serviceName, report);
    },
  };
}

type EventRow = {
  id: number;
  service: string;
  track_id: string;
  track_title: string;
  artists_json: string;
  passed: number;
  rule: string | null;
  reason: string;
  dry_run: number;
  evaluated_at: string;
};

type AttemptRow = {
  event_id: number;
  artist_name: string;
  track_title: string | null;
  status: JournalAttempt["status"];
  error: string | null;
};

export function getRecentEvents(db: Database.Database, limit = 20): JournalEntry[] {
  const events = db
    .prepare(
      `
    SELECT id, service, track_id, track_title, artists_json, passed, rule, reason,
           dry_run, evaluated_at
    FROM scrape_events
    ORDER BY evaluated_at DESC, id DESC
    LIMIT ?
  `
    )
    .all(limit) as EventRow[];

  if (events.length === 0) return [];

  const placeholders = events.map(() => "?").join(", ");
  const attempts = db
    .prepare(
      `
    SELECT event_id, artist_name, track_title, status, error
    FROM queue_attempts
    WHERE event_id IN (${placeholders})
    ORDER BY id
  `
    )
    .all(...events.map((e) => e.id)) as AttemptRow[];

  const byEvent = new Map<number, JournalAttempt[]>();
  for (const row of attempts) {
    const list = byEvent.get(row.event_id) ?? [];
    list.push({
      artistName: row.artist_name,
      trackTitle: row.track_title,
      status: row.status,
      error: row.error,
    });
    byEvent.set(row.event_id, list);
  }

  return events.map((row) => ({
    id: row.id,
    service: row.service,
    trackId: row.track_id,
    trackTitle: row.track_title,
    artists: JSON.parse(row.artists_json) as string[],
    passed: row.passed === 1,
    rule: row.rule,
    reason: row.reason,
    dryRun: row.dry_run === 1,
    evaluatedAt: row.evaluated_at,
    attempts: byEvent.get(row.id) ?? [],
  }));
}

export function getJournalStats(db: Database.Database): JournalStats {
  const events = db
    .prepare(
      `SELECT
         COUNT(*) as evaluated,
         COALESCE(SUM(passed), 0) as passed
       FROM scrape_events`
    )
    .get() as { evaluated: number; passed: number };
  const attempts = db
    .prepare(
      `SELECT
         COALESCE(SUM(CASE WHEN status = 'queued' THEN 1 ELSE 0 END), 0) as queued,
         COALESCE(SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END), 0) as failed
       FROM queue_attempts`
    )
    .get() as { queued: number; failed: number };
  return {
    evaluated: events.evaluated,
    passed: events.passed,
    queued: attempts.queued,
    failed: attempts.failed,
  };
}
