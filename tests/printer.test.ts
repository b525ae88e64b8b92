import {
  arrayCreation,
  binary,
  collectionLiteral,
  identifier,
  initializer,
  interpolatedString,
  interpolatedText,
  interpolation,
  invocation,
  lambda,
  localDeclaration,
  numericLiteral,
  objectCreation,
  parenthesized,
  spreadElement,
  stringLiteral,
} from "../src/core/factory";
import { layout, renderNode } from "../src/core/printer";
import { SyntaxTree } from "../src/core/tree";
import type { Invocation } from "../src/core/syntax";
import { listOfInt } from "./helpers";

describe("canonical layout", () => {
  it("prints collection literals with spread elements", () => {
    const literal = collectionLiteral([identifier("a"), spreadElement(identifier("b"))]);

    expect(renderNode(literal, "")).toBe("[a, ..b]");
  });

  it("prints creations with and without argument lists", () => {
    expect(renderNode(objectCreation(listOfInt(), []), "")).toBe("new List<int>()");
    expect(
      renderNode(objectCreation(listOfInt(), undefined, initializer([numericLiteral(1), numericLiteral(2)])), ""),
    ).toBe("new List<int> { 1, 2 }");
    expect(renderNode(arrayCreation(undefined, initializer([])), "")).toBe("new[] { }");
  });

  it("prints lambdas, parentheses and interpolated strings", () => {
    expect(renderNode(lambda(["a", "b"], binary("+", identifier("a"), identifier("b"))), "")).toBe("(a, b) => a + b");
    expect(renderNode(parenthesized(lambda(["x"], identifier("x"))), "")).toBe("(x => x)");
    expect(renderNode(interpolatedString([interpolatedText("x "), interpolation(identifier("y"))]), "")).toBe(
      '$"x {y}"',
    );
  });

  it("escapes string literal values", () => {
    expect(renderNode(stringLiteral('say "hi"'), "")).toBe('"say \\"hi\\""');
  });

  it("assigns every node the span of its printed text", () => {
    const { root, text } = layout(localDeclaration("items", objectCreation(listOfInt(), [])));

    expect(text).toBe("var items = new List<int>();");
    expect(root.span).toEqual({ start: 0, end: 28 });
    if (root.kind !== "local-declaration" || !root.initializer?.span) {
      throw new Error("expected a laid-out local declaration");
    }
    expect(root.initializer.span).toEqual({ start: 12, end: 27 });
  });
});

describe("source-preserving rendering", () => {
  const text = "f(  a ,b )";
  const call: Invocation = {
    kind: "invocation",
    span: { start: 0, end: 10 },
    expression: { kind: "identifier", name: "f", span: { start: 0, end: 1 } },
    arguments: [
      { kind: "identifier", name: "a", span: { start: 4, end: 5 } },
      { kind: "identifier", name: "b", span: { start: 7, end: 8 } },
    ],
  };

  it("keeps original spacing", () => {
    const tree = new SyntaxTree({ root: call, text, filePath: "Spacing.cs" });

    expect(tree.print()).toBe(text);
  });

  it("prints a synthesized node in place of the node it replaced", () => {
    const replaced = invocation(call.expression, [
      { ...identifier("zz"), origin: { start: 4, end: 5 } },
      call.arguments[1],
    ]);
    const tree = new SyntaxTree({ root: { ...replaced, span: call.span }, text, filePath: "Spacing.cs" });

    expect(tree.print()).toBe("f(  zz ,b )");
  });

  it("refuses a synthesized node with no origin under a spanned parent", () => {
    const broken = { ...invocation(call.expression, [identifier("zz")]), span: call.span };

    expect(() => renderNode(broken, text)).toThrow("Cannot place synthesized identifier inside invocation: no origin span");
  });
});
