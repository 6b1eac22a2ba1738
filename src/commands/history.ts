import { Command } from "commander";
import { loadConfig } from "../lib/config";
import {
  applySchema,
  getJournalStats,
  getRecentEvents,
  openDatabase,
  type JournalEntry,
  type JournalStats,
} from "../db";

type HistoryOptions = {
  limit?: number;
  format?: string;
};

type HistoryFormat = "text" | "json";

function normalizeFormat(value: string | undefined): HistoryFormat {
  const normalized = (value ?? "text").toLowerCase();
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new Error("Unsupported format. Use text or json.");
}

function normalizeLimit(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return 20;
  }
  return Math.floor(value);
}

export function formatHistoryText(entries: JournalEntry[], stats: JournalStats): string {
  const lines = [
    `${stats.evaluated} likes evaluated, ${stats.passed} passed, ${stats.queued} tracks queued, ${stats.failed} failed.`,
  ];
  for (const entry of entries) {
    const verdict = entry.passed ? "PASS" : "SKIP";
    const artists = entry.artists.length > 0 ? entry.artists.join(", ") : "Unknown";
    const dryRun = entry.dryRun ? " (dry run)" : "";
    const detail = entry.passed ? entry.reason : `${entry.rule ?? "unknown rule"} - ${entry.reason}`;
    lines.push(`${entry.evaluatedAt} ${verdict} ${entry.trackTitle} - ${artists}${dryRun}: ${detail}`);
    for (const attempt of entry.attempts) {
      const title = attempt.trackTitle ?? "no track";
      const error = attempt.error ? ` (${attempt.error})` : "";
      lines.push(`    ${attempt.status} ${title} [${attempt.artistName}]${error}`);
    }
  }
  return lines.join("\n");
}

export function runHistory(options: HistoryOptions): void {
  const format = normalizeFormat(options.format);
  const limit = normalizeLimit(options.limit);
  const config = loadConfig();
  const db = openDatabase(config.database.path);
  try {
    applySchema(db);
    const entries = getRecentEvents(db, limit);
    const stats = getJournalStats(db);
    if (format === "json") {
      console.log(JSON.stringify({ stats, entries }, null, 2));
      return;
    }
    console.log(formatHistoryText(entries, stats));
  } finally {
    db.close();
  }
}

export function registerHistoryCommand(program: Command): void {
  program
    .command("history")
    .description("Show recent verdicts and queued tracks")
    .option("--limit <count>", "Number of entries (default: 20)", (value) => Number.parseInt(value, 10))
    .option("--format <format>", "Output format (text|json)", "text")
    .action((options: HistoryOptions) => {
      runHistory(options);
    });
}
