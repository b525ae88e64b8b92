import type { NodeOfKind, Span, SyntaxKind, SyntaxNode } from "../syntax";
import type { Finding, Rule, RuleCategory, RuleContext, RuleDescriptor, Severity } from "../types";

export const HELP_LINK_BASE = "docs/rules";

export interface DescriptorInit {
  id: string;
  title: string;
  messageFormat: string;
  category: RuleCategory;
  severity: Severity;
  kinds: readonly SyntaxKind[];
}

export function createDescriptor(init: DescriptorInit): RuleDescriptor {
  return Object.freeze({
    ...init,
    kinds: Object.freeze([...init.kinds]),
    helpLink: `${HELP_LINK_BASE}/${init.id}.md`,
  });
}

export function createFinding(descriptor: RuleDescriptor, span: Span, message = descriptor.messageFormat): Finding {
  return {
    ruleId: descriptor.id,
    severity: descriptor.severity,
    message,
    span,
  };
}

export interface RuleDefinition<K extends SyntaxKind> {
  name: string;
  descriptors: readonly RuleDescriptor[];
  kinds: readonly K[];
  start(context: RuleContext): ((node: NodeOfKind<K>) => readonly Finding[]) | undefined;
}

/** Wraps a kind-typed definition so evaluators only ever see the kinds they asked for. */
export function defineRule<K extends SyntaxKind>(definition: RuleDefinition<K>): Rule {
  const kinds = new Set<SyntaxKind>(definition.kinds);
  const isSubscribed = (node: SyntaxNode): node is NodeOfKind<K> => kinds.has(node.kind);

  return {
    name: definition.name,
    descriptors: definition.descriptors,
    kinds: definition.kinds,
    start(context) {
      const evaluate = definition.start(context);
      if (!evaluate) {
        return undefined;
      }
      return (node) => (isSubscribed(node) ? evaluate(node) : []);
    },
  };
}

/** Span of the trailing `name` token of a member access or member binding. */
export function trailingNameSpan(node: SyntaxNode, name: string): Span | undefined {
  if (!node.span) {
    return undefined;
  }
  return { start: node.span.end - name.length, end: node.span.end };
}
