import { beforeEach, describe, expect, it, vi } from "vitest";
import { artist, track } from "../testing/fakeService";
import { buildRuleContext } from "./context";
import {
  CustomPredicateRule,
  MinimumArtistsRule,
  NoKnownArtistsRule,
  createTimeOfDayRule,
  defaultRules,
} from "./rules";
import type { KnownArtistsView } from "./types";

function known(...ids: string[]): KnownArtistsView {
  const set = new Set(ids);
  return { contains: (id) => set.has(id), size: set.size };
}

function contextFor(
  artistIds: string[],
  options: { known?: string[]; skipKnownArtists?: boolean; now?: Date } = {}
) {
  return buildRuleContext({
    track: track("t1", artistIds, "2026-01-01T00:00:00Z"),
    knownArtists: known(...(options.known ?? [])),
    skipKnownArtists: options.skipKnownArtists ?? true,
    now: options.now ?? new Date(2026, 0, 1, 12),
  });
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("buildRuleContext", () => {
  it("dedupes artists by id and splits known from unknown", () => {
    const context = contextFor(["x", "y", "x"], { known: ["y"] });
    expect(context.artistCount).toBe(2);
    expect(context.knownInTrack).toEqual([artist("y")]);
    expect(context.unknownArtists).toEqual([artist("x")]);
    expect(Object.isFrozen(context)).toBe(true);
  });
});

describe("MinimumArtistsRule", () => {
  it("passes at the threshold", () => {
    const outcome = new MinimumArtistsRule(2).evaluate(contextFor(["x", "y"]));
    expect(outcome).toEqual({ passed: true, reason: "Track has 2 artists (>= 2)" });
  });

  it("fails below the threshold", () => {
    const outcome = new MinimumArtistsRule(2).evaluate(contextFor(["x"]));
    expect(outcome).toEqual({
      passed: false,
      reason: "Track has only 1 artist(s), need >= 2",
    });
  });

  it("counts a repeated artist once", () => {
    const outcome = new MinimumArtistsRule(2).evaluate(contextFor(["x", "x"]));
    expect(outcome.passed).toBe(false);
  });
});

describe("NoKnownArtistsRule", () => {
  const rule = new NoKnownArtistsRule();

  it("fails and names the known artists", () => {
    const outcome = rule.evaluate(contextFor(["x", "y"], { known: ["x"] }));
    expect(outcome).toEqual({ passed: false, reason: "Already known artist(s): X" });
  });

  it("passes when no artist is known", () => {
    expect(rule.evaluate(contextFor(["x", "y"])).passed).toBe(true);
  });

  it("passes when skipping known artists is disabled", () => {
    const outcome = rule.evaluate(
      contextFor(["x", "y"], { known: ["x", "y"], skipKnownArtists: false })
    );
    expect(outcome).toEqual({ passed: true, reason: "Known artist check disabled" });
  });
});

describe("CustomPredicateRule", () => {
  it("uses the description as the reason", () => {
    const rule = new CustomPredicateRule(() => false, "NeverRule", "Never passes");
    expect(rule.evaluate(contextFor(["x", "y"]))).toEqual({
      passed: false,
      reason: "Never passes",
    });
  });

  it("falls back to name and result without a description", () => {
    const rule = new CustomPredicateRule((ctx) => ctx.artistCount === 3, "ThreeArtists");
    expect(rule.evaluate(contextFor(["a", "b", "c"])).reason).toBe("ThreeArtists: true");
  });

  it("turns a throwing predicate into a failure", () => {
    const rule = new CustomPredicateRule(() => {
      throw new Error("lookup failed");
    }, "Broken");
    expect(rule.evaluate(contextFor(["x", "y"]))).toEqual({
      passed: false,
      reason: "Rule evaluation error: lookup failed",
    });
  });
});

describe("createTimeOfDayRule", () => {
  it("allows hours inside a daytime window", () => {
    const rule = createTimeOfDayRule(9, 17);
    expect(rule.name).toBe("TimeOfDay(09:00-17:00)");
    expect(rule.evaluate(contextFor(["x", "y"], { now: new Date(2026, 0, 1, 9) })).passed).toBe(
      true
    );
    expect(rule.evaluate(contextFor(["x", "y"], { now: new Date(2026, 0, 1, 17) })).passed).toBe(
      false
    );
  });

  it("wraps around midnight", () => {
    const rule = createTimeOfDayRule(22, 6);
    expect(rule.evaluate(contextFor(["x", "y"], { now: new Date(2026, 0, 1, 23) })).passed).toBe(
      true
    );
    expect(rule.evaluate(contextFor(["x", "y"], { now: new Date(2026, 0, 1, 3) })).passed).toBe(
      true
    );
    expect(rule.evaluate(contextFor(["x", "y"], { now: new Date(2026, 0, 1, 12) })).passed).toBe(
      false
    );
  });

  it("rejects hours out of range", () => {
    expect(() => createTimeOfDayRule(0, 24)).toThrow(RangeError);
  });
});

describe("defaultRules", () => {
  it("orders the artist count check before the index lookup", () => {
    expect(defaultRules({ min_artists: 3 }).map((rule) => rule.name)).toEqual([
      "MinimumArtistsRule",
      "NoKnownArtistsRule",
    ]);
  });
});
