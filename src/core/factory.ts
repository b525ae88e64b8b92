import type {
  ArrayCreation,
  BinaryExpression,
  BooleanLiteral,
  ClassDeclaration,
  CollectionElement,
  CollectionLiteral,
  CompilationUnit,
  ConditionalAccess,
  Expression,
  ExpressionStatement,
  Identifier,
  Initializer,
  InterpolatedContent,
  InterpolatedString,
  InterpolatedText,
  Interpolation,
  Invocation,
  Lambda,
  LocalDeclaration,
  Member,
  MemberAccess,
  MemberBinding,
  MethodDeclaration,
  NumericLiteral,
  ObjectCreation,
  Parameter,
  ParenthesizedExpression,
  ReturnStatement,
  SpreadElement,
  Statement,
  StringLiteral,
  TypeReference,
  UsingDirective,
} from "./syntax";

// Span-less node constructors. Spans come from layoutTree or from a snapshot.

export function compilationUnit(members: (UsingDirective | Member)[]): CompilationUnit {
  return { kind: "compilation-unit", members };
}

export function usingDirective(name: string): UsingDirective {
  return { kind: "using-directive", name };
}

export function classDeclaration(name: string, members: Member[]): ClassDeclaration {
  return { kind: "class-declaration", name, members };
}

export function methodDeclaration(
  name: string,
  returnType: TypeReference,
  parameters: Parameter[],
  body: Statement[],
): MethodDeclaration {
  return { kind: "method-declaration", name, returnType, parameters, body };
}

export function parameter(name: string, type: TypeReference): Parameter {
  return { kind: "parameter", name, type };
}

export function typeReference(name: string, typeArguments: TypeReference[] = []): TypeReference {
  return { kind: "type-reference", name, typeArguments };
}

export function localDeclaration(name: string, initializer?: Expression): LocalDeclaration {
  return initializer ? { kind: "local-declaration", name, initializer } : { kind: "local-declaration", name };
}

export function expressionStatement(expression: Expression): ExpressionStatement {
  return { kind: "expression-statement", expression };
}

export function returnStatement(expression?: Expression): ReturnStatement {
  return expression ? { kind: "return-statement", expression } : { kind: "return-statement" };
}

export function identifier(name: string): Identifier {
  return { kind: "identifier", name };
}

export function numericLiteral(value: number | string): NumericLiteral {
  return { kind: "numeric-literal", text: String(value) };
}

export function stringLiteral(value: string): StringLiteral {
  return { kind: "string-literal", value };
}

export function booleanLiteral(value: boolean): BooleanLiteral {
  return { kind: "boolean-literal", value };
}

export function memberAccess(expression: Expression, name: string): MemberAccess {
  return { kind: "member-access", expression, name };
}

export function conditionalAccess(expression: Expression, whenNotNull: Expression): ConditionalAccess {
  return { kind: "conditional-access", expression, whenNotNull };
}

export function memberBinding(name: string): MemberBinding {
  return { kind: "member-binding", name };
}

export function invocation(expression: Expression, args: Expression[] = []): Invocation {
  return { kind: "invocation", expression, arguments: args };
}

/** `a.b(args)` shorthand. */
export function methodCall(receiver: Expression, name: string, args: Expression[] = []): Invocation {
  return invocation(memberAccess(receiver, name), args);
}

export function objectCreation(
  type: TypeReference,
  args: Expression[] | undefined,
  initializer?: Initializer,
): ObjectCreation {
  return {
    kind: "object-creation",
    type,
    ...(args ? { arguments: args } : {}),
    ...(initializer ? { initializer } : {}),
  };
}

export function initializer(elements: Expression[]): Initializer {
  return { kind: "initializer", elements };
}

export function arrayCreation(elementType: TypeReference | undefined, init: Initializer): ArrayCreation {
  return elementType
    ? { kind: "array-creation", elementType, initializer: init }
    : { kind: "array-creation", initializer: init };
}

export function collectionLiteral(elements: CollectionElement[]): CollectionLiteral {
  return { kind: "collection-literal", elements };
}

export function spreadElement(expression: Expression): SpreadElement {
  return { kind: "spread-element", expression };
}

export function binary(operator: string, left: Expression, right: Expression): BinaryExpression {
  return { kind: "binary", operator, left, right };
}

export function parenthesized(expression: Expression): ParenthesizedExpression {
  return { kind: "parenthesized", expression };
}

export function lambda(parameters: string[], body: Expression): Lambda {
  return { kind: "lambda", parameters, body };
}

export function interpolatedString(contents: InterpolatedContent[]): InterpolatedString {
  return { kind: "interpolated-string", contents };
}

export function interpolatedText(text: string): InterpolatedText {
  return { kind: "interpolated-text", text };
}

export function interpolation(expression: Expression): Interpolation {
  return { kind: "interpolation", expression };
}
