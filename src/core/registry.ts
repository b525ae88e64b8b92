import type { SyntaxKind } from "./syntax";
import type { CodeFixProvider, Rule, RuleDescriptor } from "./types";

/**
 * Explicit set of active rules. Each kind maps to its subscribers in
 * registration order, so one tree walk can fan out to every interested rule.
 */
export class RuleRegistry {
  private readonly rules: Rule[] = [];
  private readonly rulesByKind = new Map<SyntaxKind, Rule[]>();
  private readonly descriptorsById = new Map<string, RuleDescriptor>();
  private readonly fixProvidersByRuleId = new Map<string, CodeFixProvider[]>();

  register(rule: Rule): this {
    for (const descriptor of rule.descriptors) {
      if (this.descriptorsById.has(descriptor.id)) {
        throw new Error(`Rule id registered twice: ${descriptor.id}`);
      }
    }

    this.rules.push(rule);
    for (const descriptor of rule.descriptors) {
      this.descriptorsById.set(descriptor.id, descriptor);
    }
    for (const kind of new Set(rule.kinds)) {
      const subscribers = this.rulesByKind.get(kind);
      if (subscribers) {
        subscribers.push(rule);
      } else {
        this.rulesByKind.set(kind, [rule]);
      }
    }
    return this;
  }

  registerFixProvider(provider: CodeFixProvider): this {
    for (const ruleId of provider.fixableRuleIds) {
      const providers = this.fixProvidersByRuleId.get(ruleId);
      if (providers) {
        providers.push(provider);
      } else {
        this.fixProvidersByRuleId.set(ruleId, [provider]);
      }
    }
    return this;
  }

  registeredRules(): readonly Rule[] {
    return this.rules;
  }

  rulesFor(kind: SyntaxKind): readonly Rule[] {
    return this.rulesByKind.get(kind) ?? [];
  }

  supportedRules(): RuleDescriptor[] {
    return this.rules.flatMap((rule) => rule.descriptors);
  }

  descriptor(id: string): RuleDescriptor | undefined {
    return this.descriptorsById.get(id);
  }

  fixProvidersFor(ruleId: string): readonly CodeFixProvider[] {
    return this.fixProvidersByRuleId.get(ruleId) ?? [];
  }
}
