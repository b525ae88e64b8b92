import type { Rule, RuleCategory } from "./types";

export type RuleProfile = "all" | "style" | "usage";

const CATEGORIES: Record<RuleProfile, ReadonlySet<RuleCategory>> = {
  all: new Set<RuleCategory>(["style", "usage"]),
  style: new Set<RuleCategory>(["style"]),
  usage: new Set<RuleCategory>(["usage"]),
};

export function resolveProfile(input?: string): RuleProfile {
  if (!input || input === "all") {
    return "all";
  }
  if (input === "style" || input === "usage") {
    return input;
  }
  throw new Error(`Unsupported profile: ${input}`);
}

export function getProfileCategories(profile: RuleProfile): ReadonlySet<RuleCategory> {
  return CATEGORIES[profile];
}

export function isRuleInProfile(rule: Rule, profile: RuleProfile): boolean {
  const categories = getProfileCategories(profile);
  return rule.descriptors.some((descriptor) => categories.has(descriptor.category));
}
