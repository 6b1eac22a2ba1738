export const schemaStatements = [
  `
CREATE TABLE IF NOT EXISTS scrape_events (
  id INTEGER PRIMARY KEY,
  service TEXT NOT NULL,
  track_id TEXT NOT NULL,
  track_title TEXT NOT NULL,
  artists_json TEXT NOT NULL,
  liked_at TEXT,
  passed INTEGER NOT NULL,
  rule TEXT,
  reason TEXT NOT NULL,
  dry_run INTEGER NOT NULL DEFAULT 0,
  evaluated_at TEXT NOT NULL
);
  `,
  `CREATE INDEX IF NOT EXISTS idx_scrape_events_evaluated_at
   ON scrape_events(evaluated_at);`,
  `
CREATE TABLE IF NOT EXISTS queue_attempts (
  id INTEGER PRIMARY KEY,
  event_id INTEGER NOT NULL REFERENCES scrape_events(id),
  artist_id TEXT NOT NULL,
  artist_name TEXT NOT NULL,
  track_id TEXT,
  track_title TEXT,
  status TEXT NOT NULL CHECK (status IN ('queued', 'failed', 'skipped')),
  error TEXT
);
  `,
  `CREATE INDEX IF NOT EXISTS idx_queue_attempts_event
   ON queue_attempts(event_id);`,
];
