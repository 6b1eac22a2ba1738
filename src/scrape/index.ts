// Public API for the scrape module
export { KnownArtistIndex } from "./knownArtists";
export { buildRuleContext, type RuleContextInput } from "./context";
export {
  CustomPredicateRule,
  MinimumArtistsRule,
  NoKnownArtistsRule,
  createTimeOfDayRule,
  defaultRules,
  type RulePredicate,
} from "./rules";
export { RulesEngine, ENGINE_RULE_NAME } from "./engine";
export { PollState } from "./pollState";
export { LikedTracksWatcher, type WatcherOptions } from "./watcher";
export { formatCycleSummary, formatStatus, formatVerdict } from "./formatting";
export type {
  CycleReport,
  KnownArtistsView,
  QueueAttempt,
  Rule,
  RuleContext,
  RuleOutcome,
  RuleVerdict,
  ScrapeJournal,
  TrackReport,
  WatcherState,
} from "./types";
