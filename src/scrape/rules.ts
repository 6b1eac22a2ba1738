import { warn } from "../lib/logger";
import type { Rule, RuleContext, RuleOutcome } from "./types";

/**
 * Track must credit at least `threshold` distinct artists (the
 * collaboration check).
 */
export class MinimumArtistsRule implements Rule {
  readonly name = "MinimumArtistsRule";
  readonly threshold: number;

  constructor(threshold = 2) {
    this.threshold = threshold;
  }

  get description(): string {
    return `Track credits at least ${this.threshold} artists`;
  }

  evaluate(context: RuleContext): RuleOutcome {
    const count = context.artistCount;
    if (count >= this.threshold) {
      return { passed: true, reason: `Track has ${count} artists (>= ${this.threshold})` };
    }
    return {
      passed: false,
      reason: `Track has only ${count} artist(s), need >= ${this.threshold}`,
    };
  }
}

/**
 * None of the track's artists may already be known. A no-op when the
 * context says known-artist skipping is disabled.
 */
export class NoKnownArtistsRule implements Rule {
  readonly name = "NoKnownArtistsRule";
  readonly description = "No artist on the track is already known";

  evaluate(context: RuleContext): RuleOutcome {
    if (!context.skipKnownArtists) {
      return { passed: true, reason: "Known artist check disabled" };
    }
    if (context.knownInTrack.length > 0) {
      const names = context.knownInTrack.map((artist) => artist.name);
      return { passed: false, reason: `Already known artist(s): ${names.join(", ")}` };
    }
    return { passed: true, reason: "No known artists on this track" };
  }
}

export type RulePredicate = (context: RuleContext) => boolean;

/**
 * Wraps an injected predicate. A predicate that throws fails the rule
 * instead of the whole evaluation.
 */
export class CustomPredicateRule implements Rule {
  readonly name: string;
  readonly description: string;
  private readonly predicate: RulePredicate;

  constructor(predicate: RulePredicate, name: string, description = "") {
    this.predicate = predicate;
    this.name = name;
    this.description = description;
  }

  evaluate(context: RuleContext): RuleOutcome {
    try {
      const passed = this.predicate(context);
      return { passed, reason: this.description || `${this.name}: ${passed}` };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warn(`[rules] Error evaluating custom rule ${this.name}: ${message}`);
      return { passed: false, reason: `Rule evaluation error: ${message}` };
    }
  }
}

function pad(hour: number): string {
  return String(hour).padStart(2, "0");
}

/**
 * Only allow queueing between `startHour` (inclusive) and `endHour`
 * (exclusive), local time. Ranges may wrap midnight, e.g. 22 to 6.
 */
export function createTimeOfDayRule(startHour: number, endHour: number): CustomPredicateRule {
  for (const hour of [startHour, endHour]) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new RangeError(`Hour must be an integer from 0 to 23, got ${hour}`);
    }
  }

  const inWindow = (context: RuleContext): boolean => {
    const hour = context.now.getHours();
    if (startHour <= endHour) {
      return startHour <= hour && hour < endHour;
    }
    return hour >= startHour || hour < endHour;
  };

  return new CustomPredicateRule(
    inWindow,
    `TimeOfDay(${pad(startHour)}:00-${pad(endHour)}:00)`,
    `Only queue between ${startHour}:00 and ${endHour}:00`
  );
}

export function defaultRules(settings: { min_artists: number } = { min_artists: 2 }): Rule[] {
  return [new MinimumArtistsRule(settings.min_artists), new NoKnownArtistsRule()];
}
