import { childrenOf, mapChildren, type SyntaxNode } from "./syntax";

type Part = string | SyntaxNode;

function join(nodes: readonly SyntaxNode[], separator: string): Part[] {
  const parts: Part[] = [];
  nodes.forEach((node, index) => {
    if (index > 0) {
      parts.push(separator);
    }
    parts.push(node);
  });
  return parts;
}

/** Canonical token layout; node parts appear in the same order as childrenOf. */
function partsOf(node: SyntaxNode): Part[] {
  switch (node.kind) {
    case "compilation-unit":
      return join(node.members, "\n");
    case "using-directive":
      return [`using ${node.name};`];
    case "class-declaration":
      return [
        `class ${node.name}\n{\n`,
        ...join(node.members, "\n"),
        node.members.length > 0 ? "\n}" : "}",
      ];
    case "method-declaration":
      return [
        node.returnType,
        ` ${node.name}(`,
        ...join(node.parameters, ", "),
        ")\n{\n",
        ...join(node.body, "\n"),
        node.body.length > 0 ? "\n}" : "}",
      ];
    case "parameter":
      return [node.type, ` ${node.name}`];
    case "type-reference":
      return node.typeArguments.length > 0
        ? [node.name, "<", ...join(node.typeArguments, ", "), ">"]
        : [node.name];
    case "local-declaration":
      return node.initializer
        ? [`var ${node.name} = `, node.initializer, ";"]
        : [`var ${node.name};`];
    case "expression-statement":
      return [node.expression, ";"];
    case "return-statement":
      return node.expression ? ["return ", node.expression, ";"] : ["return;"];
    case "identifier":
      return [node.name];
    case "numeric-literal":
      return [node.text];
    case "string-literal":
      return [JSON.stringify(node.value)];
    case "boolean-literal":
      return [node.value ? "true" : "false"];
    case "member-access":
      return [node.expression, `.${node.name}`];
    case "conditional-access":
      return [node.expression, "?", node.whenNotNull];
    case "member-binding":
      return [`.${node.name}`];
    case "invocation":
      return [node.expression, "(", ...join(node.arguments, ", "), ")"];
    case "object-creation":
      return [
        "new ",
        node.type,
        ...(node.arguments ? ["(", ...join(node.arguments, ", "), ")"] : []),
        ...(node.initializer ? [" ", node.initializer] : []),
      ];
    case "initializer":
      return node.elements.length > 0 ? ["{ ", ...join(node.elements, ", "), " }"] : ["{ }"];
    case "array-creation":
      return node.elementType
        ? ["new ", node.elementType, "[] ", node.initializer]
        : ["new[] ", node.initializer];
    case "collection-literal":
      return ["[", ...join(node.elements, ", "), "]"];
    case "spread-element":
      return ["..", node.expression];
    case "binary":
      return [node.left, ` ${node.operator} `, node.right];
    case "parenthesized":
      return ["(", node.expression, ")"];
    case "lambda":
      return [
        node.parameters.length === 1 ? node.parameters[0] : `(${node.parameters.join(", ")})`,
        " => ",
        node.body,
      ];
    case "interpolated-string":
      return ['$"', ...node.contents, '"'];
    case "interpolated-text":
      return [node.text];
    case "interpolation":
      return ["{", node.expression, "}"];
  }
}

export interface LaidOutNode {
  root: SyntaxNode;
  text: string;
}

/** Prints `root` canonically and returns a copy in which every node carries its span. */
export function layout(root: SyntaxNode): LaidOutNode {
  const out = { text: "" };
  const laidOut = layoutNode(root, out);
  return { root: laidOut, text: out.text };
}

function layoutNode(node: SyntaxNode, out: { text: string }): SyntaxNode {
  const start = out.text.length;
  const children: SyntaxNode[] = [];
  for (const part of partsOf(node)) {
    if (typeof part === "string") {
      out.text += part;
    } else {
      children.push(layoutNode(part, out));
    }
  }

  let index = 0;
  const rebuilt = mapChildren(node, () => {
    const child = children[index];
    index += 1;
    return child;
  });
  return { ...rebuilt, span: { start, end: out.text.length } };
}

/**
 * Prints a node against the source it was parsed from: text covered by an
 * original span is copied verbatim, synthesized nodes use the canonical layout.
 */
export function renderNode(node: SyntaxNode, source: string): string {
  if (!node.span) {
    return partsOf(node)
      .map((part) => (typeof part === "string" ? part : renderNode(part, source)))
      .join("");
  }

  let text = "";
  let cursor = node.span.start;
  for (const child of childrenOf(node)) {
    const range = child.span ?? child.origin;
    if (!range) {
      throw new Error(`Cannot place synthesized ${child.kind} inside ${node.kind}: no origin span`);
    }
    text += source.slice(cursor, range.start) + renderNode(child, source);
    cursor = range.end;
  }
  return text + source.slice(cursor, node.span.end);
}
