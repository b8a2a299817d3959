import type { DriftRuleConfig } from "../../core/config.js";
import { ConfigError } from "../../core/errors.js";

export type DriftRule = {
  name: string;
  predicate: (line: string) => boolean;
};

export function regexRule(name: string, pattern: RegExp): DriftRule {
  // A global regex keeps lastIndex between calls; strip it so test() is stateless.
  const re = pattern.global ? new RegExp(pattern.source, pattern.flags.replace("g", "")) : pattern;
  return { name, predicate: (line) => re.test(line) };
}

// Order is the order matches are reported in. Forks replace this list through drift.rules.
// Identifiers are matched as substrings: in snake_case `_` is a word character, so `\b`
// would miss `_is_premium_user()` or `check_is_premium`.
export const DEFAULT_DRIFT_RULES: readonly DriftRule[] = [
  regexRule("premium-flag", /(?:is_?|not_?)?premium(?:_?users?)?/i),
  regexRule(
    "license-check",
    /Licen[cs]e(?:Check|Checker|Key|Manager|Validator)|licen[cs]e_(?:check|key|valid)/i,
  ),
  regexRule("license-env", /[A-Z][A-Z0-9]*_LICEN[CS]E(?:_KEY)?/),
  regexRule("enterprise-feature", /enterprise.*feature/i),
  regexRule("feature-toggle", /\b(?:FEATURE|FF)_[A-Z0-9_]{2,}\b|feature_(?:flag|enabled|gate)s?/i),
];

export function buildDriftRules(configured: DriftRuleConfig[] | undefined): DriftRule[] {
  if (!configured || configured.length === 0) return [...DEFAULT_DRIFT_RULES];

  return configured.map((rule) => {
    let re: RegExp;
    try {
      re = new RegExp(rule.pattern, rule.flags);
    } catch (err) {
      throw new ConfigError(`drift rule "${rule.name}" has an invalid pattern: ${rule.pattern}`, err);
    }
    return regexRule(rule.name, re);
  });
}

export function matchRules(line: string, rules: readonly DriftRule[]): string[] {
  return rules.filter((rule) => rule.predicate(line)).map((rule) => rule.name);
}
