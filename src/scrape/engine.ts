import { debug, log } from "../lib/logger";
import { defaultRules } from "./rules";
import type { Rule, RuleContext, RuleVerdict } from "./types";

export const ENGINE_RULE_NAME = "RulesEngine";

/**
 * Runs rules in exactly the configured order and stops at the first
 * failure. Put cheap structural rules first; the engine does not reorder.
 */
export class RulesEngine {
  private readonly rules: Rule[];

  constructor(rules: readonly Rule[] = defaultRules()) {
    this.rules = [...rules];
  }

  addRule(rule: Rule): void {
    this.rules.push(rule);
    log(`[rules] Added rule: ${rule.name}`);
  }

  removeRule(name: string): boolean {
    const index = this.rules.findIndex((rule) => rule.name === name);
    if (index === -1) return false;
    this.rules.splice(index, 1);
    log(`[rules] Removed rule: ${name}`);
    return true;
  }

  listRules(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  describeRules(): Array<{ name: string; description: string }> {
    return this.rules.map((rule) => ({ name: rule.name, description: rule.description }));
  }

  evaluate(context: RuleContext): RuleVerdict {
    const names = context.artists.map((artist) => artist.name).join(", ");
    debug(`[rules] Evaluating: ${context.track.title} by ${names}`);

    for (const rule of this.rules) {
      const outcome = rule.evaluate(context);
      debug(`[rules]   ${rule.name}: ${outcome.passed ? "PASS" : "FAIL"} - ${outcome.reason}`);
      if (!outcome.passed) {
        return { passed: false, rule: rule.name, reason: outcome.reason, artistsToQueue: [] };
      }
    }

    if (context.unknownArtists.length === 0) {
      return {
        passed: false,
        rule: ENGINE_RULE_NAME,
        reason: "All artists already known",
        artistsToQueue: [],
      };
    }

    return {
      passed: true,
      rule: null,
      reason: `All ${this.rules.length} rules passed`,
      artistsToQueue: [...context.unknownArtists],
    };
  }
}
