import type { Span, SyntaxKind, SyntaxNode } from "./syntax";

export interface TypeDescriptor {
  /** Canonical (metadata) name, e.g. ``System.Collections.Generic.List`1``. */
  readonly name: string;
  /** Generic definition this type was constructed from. */
  readonly definition?: TypeDescriptor;
  readonly typeArguments: readonly TypeDescriptor[];
  readonly interfaces: readonly TypeDescriptor[];
}

export type SymbolKind = "constructor" | "method" | "property" | "field" | "local" | "parameter" | "type";

export interface SymbolInfo {
  readonly kind: SymbolKind;
  readonly name: string;
  readonly containingType?: TypeDescriptor;
  readonly type?: TypeDescriptor;
}

/**
 * Point queries against the compiled program. Every query may miss; callers
 * treat a miss as "rule does not apply".
 */
export interface SymbolResolver {
  resolveSymbol(node: SyntaxNode): SymbolInfo | undefined;
  typeOf(node: SyntaxNode): TypeDescriptor | undefined;
  lookupType(canonicalName: string): TypeDescriptor | undefined;
  /** Identity, not structural, equality. */
  equals(left: TypeDescriptor, right: TypeDescriptor): boolean;
}

export function originalDefinition(type: TypeDescriptor): TypeDescriptor {
  return type.definition ?? type;
}

export interface TypeDefinitionInit {
  interfaces?: TypeDescriptor[];
}

/** Anything that names a node position: a node itself, or a kind and span pair. */
export interface BindingTarget {
  kind: SyntaxKind;
  span?: Span;
}

function bindingKey(kind: SyntaxKind, span: Span): string {
  return `${kind}@${span.start}:${span.end}`;
}

/**
 * In-memory resolver. Bindings are keyed by node kind and span, so nodes
 * rebuilt by a rewrite keep their semantics and synthesized nodes have none.
 */
export class SemanticModel implements SymbolResolver {
  private readonly typesByName = new Map<string, TypeDescriptor>();
  private readonly symbolsByNode = new Map<string, SymbolInfo>();
  private readonly typesByNode = new Map<string, TypeDescriptor>();

  defineType(name: string, init: TypeDefinitionInit = {}): TypeDescriptor {
    if (this.typesByName.has(name)) {
      throw new Error(`Type already defined: ${name}`);
    }
    const type: TypeDescriptor = {
      name,
      typeArguments: [],
      interfaces: init.interfaces ?? [],
    };
    this.typesByName.set(name, type);
    return type;
  }

  /** Constructed generic instance; not registered under a lookup name. */
  construct(definition: TypeDescriptor, typeArguments: TypeDescriptor[]): TypeDescriptor {
    return {
      name: `${definition.name}[${typeArguments.map((argument) => argument.name).join(",")}]`,
      definition,
      typeArguments,
      interfaces: definition.interfaces,
    };
  }

  bindSymbol(node: BindingTarget, symbol: SymbolInfo): this {
    this.symbolsByNode.set(this.requireKey(node), symbol);
    return this;
  }

  bindType(node: BindingTarget, type: TypeDescriptor): this {
    this.typesByNode.set(this.requireKey(node), type);
    return this;
  }

  resolveSymbol(node: SyntaxNode): SymbolInfo | undefined {
    const key = this.keyOf(node);
    return key === undefined ? undefined : this.symbolsByNode.get(key);
  }

  typeOf(node: SyntaxNode): TypeDescriptor | undefined {
    const key = this.keyOf(node);
    if (key === undefined) {
      return undefined;
    }
    return this.typesByNode.get(key) ?? this.symbolsByNode.get(key)?.type;
  }

  lookupType(canonicalName: string): TypeDescriptor | undefined {
    return this.typesByName.get(canonicalName);
  }

  equals(left: TypeDescriptor, right: TypeDescriptor): boolean {
    return left === right;
  }

  private keyOf(node: BindingTarget): string | undefined {
    return node.span ? bindingKey(node.kind, node.span) : undefined;
  }

  private requireKey(node: BindingTarget): string {
    const key = this.keyOf(node);
    if (key === undefined) {
      throw new Error(`Cannot bind semantics to a ${node.kind} node without a span`);
    }
    return key;
  }
}
