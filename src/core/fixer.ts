import { logger as defaultLogger, type Logger } from "./logger";
import { mapChildren, spansOverlap, type Expression, type Span, type SyntaxNode } from "./syntax";
import type { SyntaxTree } from "./tree";
import type { FixProposal } from "./types";

export interface BatchPlan {
  accepted: FixProposal[];
  skipped: FixProposal[];
}

export interface BatchResult extends BatchPlan {
  tree: SyntaxTree;
}

/**
 * Orders fixes by source position (start ascending, wider first on ties)
 * and drops every fix whose target overlaps or nests with an accepted one.
 */
export function planBatch(fixes: readonly FixProposal[]): BatchPlan {
  const ordered = [...fixes].sort((left, right) => {
    if (left.target.span.start !== right.target.span.start) {
      return left.target.span.start - right.target.span.start;
    }
    if (left.target.span.end !== right.target.span.end) {
      return right.target.span.end - left.target.span.end;
    }
    return left.ruleId.localeCompare(right.ruleId);
  });

  const accepted: FixProposal[] = [];
  const skipped: FixProposal[] = [];
  for (const fix of ordered) {
    if (accepted.some((other) => spansOverlap(other.target.span, fix.target.span))) {
      skipped.push(fix);
    } else {
      accepted.push(fix);
    }
  }
  return { accepted, skipped };
}

export class Fixer {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /** Applies one fix and normalizes the rewritten region. A missing target leaves the tree as is. */
  applyOne(tree: SyntaxTree, fix: FixProposal): SyntaxTree {
    const root = this.applyRaw(tree, tree.root, fix);
    return root === tree.root ? tree : tree.withRoot(normalizeRegions(root, [fix.target.span]));
  }

  applyBatch(tree: SyntaxTree, fixes: readonly FixProposal[]): SyntaxTree {
    return this.applyBatchWithPlan(tree, fixes).tree;
  }

  applyBatchWithPlan(tree: SyntaxTree, fixes: readonly FixProposal[]): BatchResult {
    const plan = planBatch(fixes);
    for (const fix of plan.skipped) {
      this.logger.debug("Skipping fix that overlaps an earlier one", {
        rule: fix.ruleId,
        file: tree.filePath,
        start: fix.target.span.start,
      });
    }

    let root = tree.root;
    for (const fix of plan.accepted) {
      root = this.applyRaw(tree, root, fix);
    }

    if (root === tree.root) {
      return { ...plan, tree };
    }
    const regions = plan.accepted.map((fix) => fix.target.span);
    return { ...plan, tree: tree.withRoot(normalizeRegions(root, regions)) };
  }

  private applyRaw(tree: SyntaxTree, root: SyntaxNode, fix: FixProposal): SyntaxNode {
    const current = root === tree.root ? tree : tree.withRoot(root);
    const target = current.findNode(fix.target.span, fix.target.kind);
    if (!target) {
      this.logger.debug("Fix target no longer present", { rule: fix.ruleId, file: tree.filePath });
      return root;
    }
    return fix.apply(root, target);
  }
}

/**
 * Region-limited cleanup after a rewrite: inside synthesized nodes, drops
 * parentheses that a collection element or spread operand does not need.
 */
export function normalizeRegions(root: SyntaxNode, regions: readonly Span[]): SyntaxNode {
  if (regions.length === 0) {
    return root;
  }
  return normalizeNode(root, regions);
}

function normalizeNode(node: SyntaxNode, regions: readonly Span[]): SyntaxNode {
  const range = node.span ?? node.origin;
  if (range && !regions.some((region) => spansOverlap(region, range))) {
    return node;
  }
  const rebuilt = mapChildren(node, (child) => normalizeNode(child, regions));
  return rebuilt.span ? rebuilt : simplify(rebuilt);
}

function simplify(node: SyntaxNode): SyntaxNode {
  switch (node.kind) {
    case "collection-literal": {
      let changed = false;
      const elements = node.elements.map((element) => {
        if (element.kind === "spread-element") {
          return element;
        }
        const unwrapped = unwrapParentheses(element);
        changed = changed || unwrapped !== element;
        return unwrapped;
      });
      return changed ? { ...node, elements } : node;
    }
    case "spread-element": {
      const expression = unwrapParentheses(node.expression);
      return expression === node.expression ? node : { ...node, expression };
    }
    default:
      return node;
  }
}

function unwrapParentheses(expression: Expression): Expression {
  let current = expression;
  while (current.kind === "parenthesized" && isPrimary(current.expression)) {
    current = current.expression;
  }
  return current;
}

function isPrimary(expression: Expression): boolean {
  switch (expression.kind) {
    case "binary":
    case "lambda":
    case "member-binding":
      return false;
    default:
      return true;
  }
}
