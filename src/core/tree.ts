import { layout, renderNode } from "./printer";
import {
  childrenOf,
  forEachNode,
  hasKind,
  spanContains,
  spanEquals,
  type NodeOfKind,
  type Span,
  type SyntaxKind,
  type SyntaxNode,
} from "./syntax";

/** First language version with inline collection literals (`[a, ..b]`). */
export const COLLECTION_LITERAL_LANGUAGE_VERSION = 12;

export const LATEST_LANGUAGE_VERSION = 13;

export interface ParseOptions {
  languageVersion: number;
}

export interface SyntaxTreeInit {
  root: SyntaxNode;
  text: string;
  filePath: string;
  options?: ParseOptions;
  generated?: boolean;
}

export interface LineAndColumn {
  line: number;
  column: number;
}

export class SyntaxTree {
  readonly root: SyntaxNode;
  readonly text: string;
  readonly filePath: string;
  readonly options: ParseOptions;
  readonly generated: boolean;

  private parents: Map<SyntaxNode, SyntaxNode> | undefined;
  private lineStarts: number[] | undefined;

  constructor(init: SyntaxTreeInit) {
    this.root = init.root;
    this.text = init.text;
    this.filePath = init.filePath;
    this.options = init.options ?? { languageVersion: LATEST_LANGUAGE_VERSION };
    this.generated = init.generated ?? false;
  }

  withRoot(root: SyntaxNode): SyntaxTree {
    return new SyntaxTree({
      root,
      text: this.text,
      filePath: this.filePath,
      options: this.options,
      generated: this.generated,
    });
  }

  supportsCollectionLiterals(): boolean {
    return this.options.languageVersion >= COLLECTION_LITERAL_LANGUAGE_VERSION;
  }

  parentOf(node: SyntaxNode): SyntaxNode | undefined {
    if (!this.parents) {
      const parents = new Map<SyntaxNode, SyntaxNode>();
      forEachNode(this.root, (current) => {
        for (const child of childrenOf(current)) {
          parents.set(child, current);
        }
      });
      this.parents = parents;
    }
    return this.parents.get(node);
  }

  /** Nearest first. */
  ancestors(node: SyntaxNode): SyntaxNode[] {
    const result: SyntaxNode[] = [];
    let current = this.parentOf(node);
    while (current) {
      result.push(current);
      current = this.parentOf(current);
    }
    return result;
  }

  firstAncestor<K extends SyntaxKind>(node: SyntaxNode, kind: K): NodeOfKind<K> | undefined {
    let current = this.parentOf(node);
    while (current) {
      if (hasKind(current, kind)) {
        return current;
      }
      current = this.parentOf(current);
    }
    return undefined;
  }

  /** Outermost original node with exactly this span (and kind, when given). */
  findNode(span: Span, kind?: SyntaxKind): SyntaxNode | undefined {
    let found: SyntaxNode | undefined;
    forEachNode(this.root, (node) => {
      if (found) {
        return false;
      }
      if (node.span && !spanContains(node.span, span)) {
        return false;
      }
      if (spanEquals(node.span, span) && (kind === undefined || node.kind === kind)) {
        found = node;
        return false;
      }
      return true;
    });
    return found;
  }

  nodesOfKind<K extends SyntaxKind>(kind: K): NodeOfKind<K>[] {
    const nodes: NodeOfKind<K>[] = [];
    forEachNode(this.root, (node) => {
      if (hasKind(node, kind)) {
        nodes.push(node);
      }
    });
    return nodes;
  }

  lineAndColumnAt(offset: number): LineAndColumn {
    const starts = this.getLineStarts();
    let low = 0;
    let high = starts.length - 1;
    while (low < high) {
      const middle = Math.ceil((low + high) / 2);
      if (starts[middle] <= offset) {
        low = middle;
      } else {
        high = middle - 1;
      }
    }
    return { line: low + 1, column: offset - starts[low] + 1 };
  }

  print(): string {
    if (!this.root.span) {
      return renderNode(this.root, this.text);
    }
    return (
      this.text.slice(0, this.root.span.start) +
      renderNode(this.root, this.text) +
      this.text.slice(this.root.span.end)
    );
  }

  private getLineStarts(): number[] {
    if (!this.lineStarts) {
      const starts = [0];
      for (let i = 0; i < this.text.length; i += 1) {
        if (this.text[i] === "\n") {
          starts.push(i + 1);
        }
      }
      this.lineStarts = starts;
    }
    return this.lineStarts;
  }
}

export interface LayoutOptions {
  filePath?: string;
  options?: ParseOptions;
  generated?: boolean;
}

/** Builds a tree from span-less nodes by printing them canonically. */
export function layoutTree(root: SyntaxNode, options: LayoutOptions = {}): SyntaxTree {
  const laidOut = layout(root);
  return new SyntaxTree({
    root: laidOut.root,
    text: laidOut.text,
    filePath: options.filePath ?? "Test0.cs",
    options: options.options,
    generated: options.generated,
  });
}

/**
 * Reports nodes that cannot be placed in the text: spans outside the text or
 * their parent, overlapping siblings, and unplaced children of a spanned node.
 */
export function verifySpans(root: SyntaxNode, textLength: number): string[] {
  const issues: string[] = [];
  if (root.span && (root.span.start < 0 || root.span.end > textLength)) {
    issues.push(`${root.kind} [${root.span.start}, ${root.span.end}) lies outside the text`);
  }

  forEachNode(root, (node) => {
    if (node.span && node.span.start > node.span.end) {
      issues.push(`${node.kind} [${node.span.start}, ${node.span.end}) ends before it starts`);
    }

    let previousEnd = node.span?.start ?? 0;
    for (const child of childrenOf(node)) {
      if (!child.span) {
        if (node.span && !child.origin) {
          issues.push(`${child.kind} inside ${node.kind} [${node.span.start}, ${node.span.end}) has no span`);
        }
        continue;
      }
      if (node.span && !spanContains(node.span, child.span)) {
        issues.push(`${child.kind} [${child.span.start}, ${child.span.end}) is not inside its parent ${node.kind}`);
      } else if (child.span.start < previousEnd) {
        issues.push(`${child.kind} [${child.span.start}, ${child.span.end}) overlaps a preceding sibling`);
      }
      previousEnd = Math.max(previousEnd, child.span.end);
    }
  });

  return issues;
}
