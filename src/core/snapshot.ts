import { z } from "zod";
import { isGeneratedSource } from "./config";
import { SemanticModel, type TypeDescriptor } from "./semantic";
import type {
  ClassDeclaration,
  CollectionElement,
  CompilationUnit,
  Expression,
  Initializer,
  InterpolatedContent,
  Member,
  Parameter,
  Statement,
  SyntaxKind,
  TypeReference,
} from "./syntax";
import { SyntaxTree, verifySpans } from "./tree";

// Node schemas mirror the syntax module; unknown keys are stripped.

const spanSchema = z
  .object({ start: z.number().int().nonnegative(), end: z.number().int().nonnegative() })
  .refine((span) => span.start <= span.end, { message: "span ends before it starts" });

const syntaxKindSchema = z.enum([
  "compilation-unit",
  "using-directive",
  "class-declaration",
  "method-declaration",
  "parameter",
  "type-reference",
  "local-declaration",
  "expression-statement",
  "return-statement",
  "identifier",
  "numeric-literal",
  "string-literal",
  "boolean-literal",
  "member-access",
  "conditional-access",
  "member-binding",
  "invocation",
  "object-creation",
  "initializer",
  "array-creation",
  "collection-literal",
  "spread-element",
  "binary",
  "parenthesized",
  "lambda",
  "interpolated-string",
  "interpolated-text",
  "interpolation",
]) satisfies z.ZodType<SyntaxKind>;

const base = { span: spanSchema.optional() };

const typeReferenceSchema: z.ZodType<TypeReference, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    ...base,
    kind: z.literal("type-reference"),
    name: z.string(),
    typeArguments: z.array(typeReferenceSchema).default([]),
  }),
);

const expressionSchema: z.ZodType<Expression, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ ...base, kind: z.literal("identifier"), name: z.string() }),
    z.object({ ...base, kind: z.literal("numeric-literal"), text: z.string() }),
    z.object({ ...base, kind: z.literal("string-literal"), value: z.string() }),
    z.object({ ...base, kind: z.literal("boolean-literal"), value: z.boolean() }),
    z.object({ ...base, kind: z.literal("member-access"), expression: expressionSchema, name: z.string() }),
    z.object({
      ...base,
      kind: z.literal("conditional-access"),
      expression: expressionSchema,
      whenNotNull: expressionSchema,
    }),
    z.object({ ...base, kind: z.literal("member-binding"), name: z.string() }),
    z.object({
      ...base,
      kind: z.literal("invocation"),
      expression: expressionSchema,
      arguments: z.array(expressionSchema).default([]),
    }),
    z.object({
      ...base,
      kind: z.literal("object-creation"),
      type: typeReferenceSchema,
      arguments: z.array(expressionSchema).optional(),
      initializer: initializerSchema.optional(),
    }),
    z.object({
      ...base,
      kind: z.literal("array-creation"),
      elementType: typeReferenceSchema.optional(),
      initializer: initializerSchema,
    }),
    z.object({ ...base, kind: z.literal("collection-literal"), elements: z.array(collectionElementSchema) }),
    z.object({
      ...base,
      kind: z.literal("binary"),
      operator: z.string().min(1),
      left: expressionSchema,
      right: expressionSchema,
    }),
    z.object({ ...base, kind: z.literal("parenthesized"), expression: expressionSchema }),
    z.object({ ...base, kind: z.literal("lambda"), parameters: z.array(z.string()), body: expressionSchema }),
    z.object({ ...base, kind: z.literal("interpolated-string"), contents: z.array(interpolatedContentSchema) }),
  ]),
);

const initializerSchema: z.ZodType<Initializer, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({ ...base, kind: z.literal("initializer"), elements: z.array(expressionSchema) }),
);

const collectionElementSchema: z.ZodType<CollectionElement, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([z.object({ ...base, kind: z.literal("spread-element"), expression: expressionSchema }), expressionSchema]),
);

const interpolatedContentSchema: z.ZodType<InterpolatedContent, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ ...base, kind: z.literal("interpolated-text"), text: z.string() }),
    z.object({ ...base, kind: z.literal("interpolation"), expression: expressionSchema }),
  ]),
);

const statementSchema: z.ZodType<Statement, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ ...base, kind: z.literal("local-declaration"), name: z.string(), initializer: expressionSchema.optional() }),
    z.object({ ...base, kind: z.literal("expression-statement"), expression: expressionSchema }),
    z.object({ ...base, kind: z.literal("return-statement"), expression: expressionSchema.optional() }),
  ]),
);

const parameterSchema: z.ZodType<Parameter, z.ZodTypeDef, unknown> = z.object({
  ...base,
  kind: z.literal("parameter"),
  name: z.string(),
  type: typeReferenceSchema,
});

const classDeclarationSchema: z.ZodType<ClassDeclaration, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({ ...base, kind: z.literal("class-declaration"), name: z.string(), members: z.array(memberSchema) }),
);

const memberSchema: z.ZodType<Member, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    classDeclarationSchema,
    z.object({
      ...base,
      kind: z.literal("method-declaration"),
      name: z.string(),
      returnType: typeReferenceSchema,
      parameters: z.array(parameterSchema).default([]),
      body: z.array(statementSchema).default([]),
    }),
  ]),
);

const compilationUnitSchema: z.ZodType<CompilationUnit, z.ZodTypeDef, unknown> = z.object({
  ...base,
  kind: z.literal("compilation-unit"),
  members: z.array(z.union([z.object({ ...base, kind: z.literal("using-directive"), name: z.string() }), memberSchema])),
});

const typeEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  definition: z.string().optional(),
  typeArguments: z.array(z.string()).default([]),
  interfaces: z.array(z.string()).default([]),
});

const bindingSchema = z.object({
  kind: syntaxKindSchema,
  span: spanSchema,
  symbol: z
    .object({
      kind: z.enum(["constructor", "method", "property", "field", "local", "parameter", "type"]),
      name: z.string(),
      containingType: z.string().optional(),
      type: z.string().optional(),
    })
    .optional(),
  type: z.string().optional(),
});

export const snapshotSchema = z.object({
  path: z.string().min(1),
  languageVersion: z.number().int().positive(),
  generated: z.boolean().optional(),
  text: z.string(),
  root: compilationUnitSchema,
  types: z.array(typeEntrySchema).default([]),
  bindings: z.array(bindingSchema).default([]),
});

type TypeEntry = z.infer<typeof typeEntrySchema>;

export interface LoadedDocument {
  snapshotPath: string;
  tree: SyntaxTree;
  semantics: SemanticModel;
}

export interface SnapshotLoadOptions {
  languageVersion?: number;
}

export function parseSnapshot(raw: unknown, snapshotPath: string, options: SnapshotLoadOptions = {}): LoadedDocument {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid snapshot ${snapshotPath}: ${issues}`);
  }

  const snapshot = parsed.data;
  const spanIssues = verifySpans(snapshot.root, snapshot.text.length);
  if (spanIssues.length > 0) {
    throw new Error(`Invalid snapshot ${snapshotPath}: ${spanIssues[0]}`);
  }

  const semantics = new SemanticModel();
  const types = defineTypes(semantics, snapshot.types, snapshotPath);
  const typeById = (id: string | undefined): TypeDescriptor | undefined => {
    if (id === undefined) {
      return undefined;
    }
    const type = types.get(id);
    if (!type) {
      throw new Error(`Invalid snapshot ${snapshotPath}: unknown type id ${id}`);
    }
    return type;
  };

  for (const binding of snapshot.bindings) {
    const node = { kind: binding.kind, span: binding.span };
    if (binding.symbol) {
      semantics.bindSymbol(node, {
        kind: binding.symbol.kind,
        name: binding.symbol.name,
        containingType: typeById(binding.symbol.containingType),
        type: typeById(binding.symbol.type),
      });
    }
    const type = typeById(binding.type);
    if (type) {
      semantics.bindType(node, type);
    }
  }

  const tree = new SyntaxTree({
    root: snapshot.root,
    text: snapshot.text,
    filePath: snapshot.path,
    options: { languageVersion: options.languageVersion ?? snapshot.languageVersion },
    generated: snapshot.generated ?? isGeneratedSource(snapshot.path, snapshot.text),
  });

  return { snapshotPath, tree, semantics };
}

/** Definitions are registered by name; constructed types (with `definition`) are not. */
function defineTypes(semantics: SemanticModel, entries: TypeEntry[], snapshotPath: string): Map<string, TypeDescriptor> {
  const entriesById = new Map<string, TypeEntry>();
  for (const entry of entries) {
    if (entriesById.has(entry.id)) {
      throw new Error(`Invalid snapshot ${snapshotPath}: duplicate type id ${entry.id}`);
    }
    entriesById.set(entry.id, entry);
  }

  const resolved = new Map<string, TypeDescriptor>();
  const resolving = new Set<string>();

  const resolve = (id: string): TypeDescriptor => {
    const existing = resolved.get(id);
    if (existing) {
      return existing;
    }
    const entry = entriesById.get(id);
    if (!entry) {
      throw new Error(`Invalid snapshot ${snapshotPath}: unknown type id ${id}`);
    }
    if (resolving.has(id)) {
      throw new Error(`Invalid snapshot ${snapshotPath}: type ${id} refers to itself`);
    }
    resolving.add(id);

    const interfaces = entry.interfaces.map(resolve);
    const type = entry.definition
      ? semantics.construct(resolve(entry.definition), entry.typeArguments.map(resolve))
      : semantics.defineType(entry.name, { interfaces });

    resolving.delete(id);
    resolved.set(id, type);
    return type;
  };

  for (const entry of entries) {
    resolve(entry.id);
  }
  return resolved;
}
