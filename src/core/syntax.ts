export interface Span {
  start: number;
  end: number;
}

interface NodeBase<K extends string> {
  readonly kind: K;
  readonly span?: Span;
  /** Span of the original node this synthesized node replaced. */
  readonly origin?: Span;
}

export interface CompilationUnit extends NodeBase<"compilation-unit"> {
  readonly members: readonly (UsingDirective | Member)[];
}

export interface UsingDirective extends NodeBase<"using-directive"> {
  readonly name: string;
}

export interface ClassDeclaration extends NodeBase<"class-declaration"> {
  readonly name: string;
  readonly members: readonly Member[];
}

export interface MethodDeclaration extends NodeBase<"method-declaration"> {
  readonly name: string;
  readonly returnType: TypeReference;
  readonly parameters: readonly Parameter[];
  readonly body: readonly Statement[];
}

export interface Parameter extends NodeBase<"parameter"> {
  readonly name: string;
  readonly type: TypeReference;
}

export interface TypeReference extends NodeBase<"type-reference"> {
  readonly name: string;
  readonly typeArguments: readonly TypeReference[];
}

export interface LocalDeclaration extends NodeBase<"local-declaration"> {
  readonly name: string;
  readonly initializer?: Expression;
}

export interface ExpressionStatement extends NodeBase<"expression-statement"> {
  readonly expression: Expression;
}

export interface ReturnStatement extends NodeBase<"return-statement"> {
  readonly expression?: Expression;
}

export interface Identifier extends NodeBase<"identifier"> {
  readonly name: string;
}

export interface NumericLiteral extends NodeBase<"numeric-literal"> {
  readonly text: string;
}

export interface StringLiteral extends NodeBase<"string-literal"> {
  readonly value: string;
}

export interface BooleanLiteral extends NodeBase<"boolean-literal"> {
  readonly value: boolean;
}

export interface MemberAccess extends NodeBase<"member-access"> {
  readonly expression: Expression;
  readonly name: string;
}

/** `receiver?.rest`, where `whenNotNull` starts with a member binding. */
export interface ConditionalAccess extends NodeBase<"conditional-access"> {
  readonly expression: Expression;
  readonly whenNotNull: Expression;
}

export interface MemberBinding extends NodeBase<"member-binding"> {
  readonly name: string;
}

export interface Invocation extends NodeBase<"invocation"> {
  readonly expression: Expression;
  readonly arguments: readonly Expression[];
}

export interface ObjectCreation extends NodeBase<"object-creation"> {
  readonly type: TypeReference;
  /** Undefined when the creation has no argument list at all (`new T { ... }`). */
  readonly arguments?: readonly Expression[];
  readonly initializer?: Initializer;
}

export interface Initializer extends NodeBase<"initializer"> {
  readonly elements: readonly Expression[];
}

export interface ArrayCreation extends NodeBase<"array-creation"> {
  readonly elementType?: TypeReference;
  readonly initializer: Initializer;
}

export interface CollectionLiteral extends NodeBase<"collection-literal"> {
  readonly elements: readonly CollectionElement[];
}

export interface SpreadElement extends NodeBase<"spread-element"> {
  readonly expression: Expression;
}

export interface BinaryExpression extends NodeBase<"binary"> {
  readonly operator: string;
  readonly left: Expression;
  readonly right: Expression;
}

export interface ParenthesizedExpression extends NodeBase<"parenthesized"> {
  readonly expression: Expression;
}

export interface Lambda extends NodeBase<"lambda"> {
  readonly parameters: readonly string[];
  readonly body: Expression;
}

export interface InterpolatedString extends NodeBase<"interpolated-string"> {
  readonly contents: readonly InterpolatedContent[];
}

export interface InterpolatedText extends NodeBase<"interpolated-text"> {
  readonly text: string;
}

export interface Interpolation extends NodeBase<"interpolation"> {
  readonly expression: Expression;
}

export type Member = ClassDeclaration | MethodDeclaration;

export type Statement = LocalDeclaration | ExpressionStatement | ReturnStatement;

export type Expression =
  | Identifier
  | NumericLiteral
  | StringLiteral
  | BooleanLiteral
  | MemberAccess
  | ConditionalAccess
  | MemberBinding
  | Invocation
  | ObjectCreation
  | ArrayCreation
  | CollectionLiteral
  | BinaryExpression
  | ParenthesizedExpression
  | Lambda
  | InterpolatedString;

export type CollectionElement = Expression | SpreadElement;

export type InterpolatedContent = InterpolatedText | Interpolation;

export type SyntaxNode =
  | CompilationUnit
  | UsingDirective
  | Member
  | Parameter
  | TypeReference
  | Statement
  | Expression
  | Initializer
  | SpreadElement
  | InterpolatedContent;

export type SyntaxKind = SyntaxNode["kind"];

export type NodeOfKind<K extends SyntaxKind> = Extract<SyntaxNode, { kind: K }>;

const EXPRESSION_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  "identifier",
  "numeric-literal",
  "string-literal",
  "boolean-literal",
  "member-access",
  "conditional-access",
  "member-binding",
  "invocation",
  "object-creation",
  "array-creation",
  "collection-literal",
  "binary",
  "parenthesized",
  "lambda",
  "interpolated-string",
]);

const STATEMENT_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  "local-declaration",
  "expression-statement",
  "return-statement",
]);

export function isExpression(node: SyntaxNode): node is Expression {
  return EXPRESSION_KINDS.has(node.kind);
}

export function isStatement(node: SyntaxNode): node is Statement {
  return STATEMENT_KINDS.has(node.kind);
}

export function isMember(node: SyntaxNode): node is Member {
  return node.kind === "class-declaration" || node.kind === "method-declaration";
}

export function isCompilationUnitMember(node: SyntaxNode): node is UsingDirective | Member {
  return node.kind === "using-directive" || isMember(node);
}

export function isCollectionElement(node: SyntaxNode): node is CollectionElement {
  return node.kind === "spread-element" || isExpression(node);
}

export function isInterpolatedContent(node: SyntaxNode): node is InterpolatedContent {
  return node.kind === "interpolated-text" || node.kind === "interpolation";
}

export function isTypeReference(node: SyntaxNode): node is TypeReference {
  return node.kind === "type-reference";
}

export function isParameter(node: SyntaxNode): node is Parameter {
  return node.kind === "parameter";
}

export function isInitializer(node: SyntaxNode): node is Initializer {
  return node.kind === "initializer";
}

export function hasKind<K extends SyntaxKind>(node: SyntaxNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  switch (node.kind) {
    case "compilation-unit":
    case "class-declaration":
      return [...node.members];
    case "method-declaration":
      return [node.returnType, ...node.parameters, ...node.body];
    case "parameter":
      return [node.type];
    case "type-reference":
      return [...node.typeArguments];
    case "local-declaration":
      return node.initializer ? [node.initializer] : [];
    case "return-statement":
      return node.expression ? [node.expression] : [];
    case "expression-statement":
    case "member-access":
    case "spread-element":
    case "parenthesized":
    case "interpolation":
      return [node.expression];
    case "conditional-access":
      return [node.expression, node.whenNotNull];
    case "invocation":
      return [node.expression, ...node.arguments];
    case "object-creation":
      return [node.type, ...(node.arguments ?? []), ...(node.initializer ? [node.initializer] : [])];
    case "initializer":
      return [...node.elements];
    case "array-creation":
      return node.elementType ? [node.elementType, node.initializer] : [node.initializer];
    case "collection-literal":
      return [...node.elements];
    case "binary":
      return [node.left, node.right];
    case "lambda":
      return [node.body];
    case "interpolated-string":
      return [...node.contents];
    case "using-directive":
    case "identifier":
    case "numeric-literal":
    case "string-literal":
    case "boolean-literal":
    case "member-binding":
    case "interpolated-text":
      return [];
  }
}

export type ChildMapper = (child: SyntaxNode) => SyntaxNode;

/**
 * Rebuilds `node` with every child passed through `map`. Returns `node` itself
 * when no child changed, so untouched subtrees stay shared.
 */
export function mapChildren(node: SyntaxNode, map: ChildMapper): SyntaxNode {
  switch (node.kind) {
    case "compilation-unit": {
      const members = mapList(node.members, map, isCompilationUnitMember, "member");
      return members === node.members ? node : { ...node, members };
    }
    case "class-declaration": {
      const members = mapList(node.members, map, isMember, "member");
      return members === node.members ? node : { ...node, members };
    }
    case "method-declaration": {
      const returnType = mapOne(node.returnType, map, isTypeReference, "type reference");
      const parameters = mapList(node.parameters, map, isParameter, "parameter");
      const body = mapList(node.body, map, isStatement, "statement");
      return returnType === node.returnType && parameters === node.parameters && body === node.body
        ? node
        : { ...node, returnType, parameters, body };
    }
    case "parameter": {
      const type = mapOne(node.type, map, isTypeReference, "type reference");
      return type === node.type ? node : { ...node, type };
    }
    case "type-reference": {
      const typeArguments = mapList(node.typeArguments, map, isTypeReference, "type reference");
      return typeArguments === node.typeArguments ? node : { ...node, typeArguments };
    }
    case "local-declaration": {
      const initializer = node.initializer && mapOne(node.initializer, map, isExpression, "expression");
      return initializer === node.initializer ? node : { ...node, initializer };
    }
    case "return-statement": {
      const expression = node.expression && mapOne(node.expression, map, isExpression, "expression");
      return expression === node.expression ? node : { ...node, expression };
    }
    case "expression-statement":
    case "member-access":
    case "parenthesized":
    case "interpolation":
    case "spread-element": {
      const expression = mapOne(node.expression, map, isExpression, "expression");
      return expression === node.expression ? node : { ...node, expression };
    }
    case "conditional-access": {
      const expression = mapOne(node.expression, map, isExpression, "expression");
      const whenNotNull = mapOne(node.whenNotNull, map, isExpression, "expression");
      return expression === node.expression && whenNotNull === node.whenNotNull
        ? node
        : { ...node, expression, whenNotNull };
    }
    case "invocation": {
      const expression = mapOne(node.expression, map, isExpression, "expression");
      const args = mapList(node.arguments, map, isExpression, "expression");
      return expression === node.expression && args === node.arguments
        ? node
        : { ...node, expression, arguments: args };
    }
    case "object-creation": {
      const type = mapOne(node.type, map, isTypeReference, "type reference");
      const args = node.arguments && mapList(node.arguments, map, isExpression, "expression");
      const initializer = node.initializer && mapOne(node.initializer, map, isInitializer, "initializer");
      return type === node.type && args === node.arguments && initializer === node.initializer
        ? node
        : { ...node, type, arguments: args, initializer };
    }
    case "initializer": {
      const elements = mapList(node.elements, map, isExpression, "expression");
      return elements === node.elements ? node : { ...node, elements };
    }
    case "array-creation": {
      const elementType = node.elementType && mapOne(node.elementType, map, isTypeReference, "type reference");
      const initializer = mapOne(node.initializer, map, isInitializer, "initializer");
      return elementType === node.elementType && initializer === node.initializer
        ? node
        : { ...node, elementType, initializer };
    }
    case "collection-literal": {
      const elements = mapList(node.elements, map, isCollectionElement, "collection element");
      return elements === node.elements ? node : { ...node, elements };
    }
    case "binary": {
      const left = mapOne(node.left, map, isExpression, "expression");
      const right = mapOne(node.right, map, isExpression, "expression");
      return left === node.left && right === node.right ? node : { ...node, left, right };
    }
    case "lambda": {
      const body = mapOne(node.body, map, isExpression, "expression");
      return body === node.body ? node : { ...node, body };
    }
    case "interpolated-string": {
      const contents = mapList(node.contents, map, isInterpolatedContent, "interpolated content");
      return contents === node.contents ? node : { ...node, contents };
    }
    case "using-directive":
    case "identifier":
    case "numeric-literal":
    case "string-literal":
    case "boolean-literal":
    case "member-binding":
    case "interpolated-text":
      return node;
  }
}

function mapOne<T extends SyntaxNode>(
  child: T,
  map: ChildMapper,
  guard: (node: SyntaxNode) => node is T,
  expected: string,
): T {
  const mapped = map(child);
  if (mapped === child) {
    return child;
  }
  if (!guard(mapped)) {
    throw new Error(`Cannot place ${mapped.kind} where ${expected} is expected`);
  }
  return mapped;
}

function mapList<T extends SyntaxNode>(
  children: readonly T[],
  map: ChildMapper,
  guard: (node: SyntaxNode) => node is T,
  expected: string,
): readonly T[] {
  let changed = false;
  const mapped = children.map((child) => {
    const next = mapOne(child, map, guard, expected);
    if (next !== child) {
      changed = true;
    }
    return next;
  });
  return changed ? mapped : children;
}

export function spanContains(outer: Span, inner: Span): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

export function spansOverlap(left: Span, right: Span): boolean {
  return left.start < right.end && right.start < left.end;
}

export function spanEquals(left: Span | undefined, right: Span | undefined): boolean {
  return left !== undefined && right !== undefined && left.start === right.start && left.end === right.end;
}

/**
 * Copy-on-write replacement of `target` (matched by identity) under `root`.
 * Only subtrees whose span could contain the target are visited.
 */
export function replaceNode(root: SyntaxNode, target: SyntaxNode, replacement: SyntaxNode): SyntaxNode {
  if (root === target) {
    return replacement;
  }
  if (root.span && target.span && !spanContains(root.span, target.span)) {
    return root;
  }
  return mapChildren(root, (child) => replaceNode(child, target, replacement));
}

/** Pre-order, left-to-right walk that stops descending when `visit` returns false. */
export function forEachNode(root: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) {
      break;
    }
    if (visit(node) === false) {
      continue;
    }
    const children = childrenOf(node);
    for (let i = children.length - 1; i >= 0; i -= 1) {
      stack.push(children[i]);
    }
  }
}
