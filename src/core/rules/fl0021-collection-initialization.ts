import { collectionLiteral, spreadElement } from "../factory";
import { originalDefinition } from "../semantic";
import { replaceNode, type CollectionElement, type Expression, type Initializer, type ObjectCreation } from "../syntax";
import type { CodeFixProvider, FixProposal } from "../types";
import { createDescriptor, createFinding, defineRule } from "./common";

export const COLLECTION_INITIALIZATION_ID = "FL0021";

export const LIST_TYPE_NAME = "System.Collections.Generic.List`1";

export const MAX_SIMPLE_INITIALIZER_ELEMENTS = 10;

/**
 * Deferred sequence operators. Matched by the outermost call name only, with
 * no check of where the method comes from.
 */
export const DEFERRED_CHAIN_METHODS: ReadonlySet<string> = new Set([
  "Where",
  "Select",
  "SelectMany",
  "OrderBy",
  "OrderByDescending",
  "GroupBy",
  "Join",
  "Skip",
  "Take",
  "Distinct",
  "Union",
  "Intersect",
  "Except",
  "Zip",
  "DefaultIfEmpty",
]);

export const collectionInitializationDescriptor = createDescriptor({
  id: COLLECTION_INITIALIZATION_ID,
  title: "Use collection expression",
  messageFormat: "Use collection expression instead of explicit collection creation",
  category: "style",
  severity: "info",
  kinds: ["object-creation"],
});

export interface CollectionInitializationOptions {
  listTypeName?: string;
}

export function createCollectionInitializationRule(options: CollectionInitializationOptions = {}) {
  const listTypeName = options.listTypeName ?? LIST_TYPE_NAME;

  return defineRule({
    name: "collection-initialization",
    descriptors: [collectionInitializationDescriptor],
    kinds: ["object-creation"],
    start({ resolver }) {
      const listType = resolver.lookupType(listTypeName);
      if (!listType) {
        return undefined;
      }

      return (creation) => {
        const createdType = resolver.typeOf(creation);
        if (!createdType || !resolver.equals(originalDefinition(createdType), listType)) {
          return [];
        }
        if (!creation.span || !suggestsCollectionLiteral(creation)) {
          return [];
        }
        return [createFinding(collectionInitializationDescriptor, creation.span)];
      };
    },
  });
}

export function suggestsCollectionLiteral(creation: ObjectCreation): boolean {
  const argumentCount = creation.arguments?.length ?? 0;

  if (argumentCount === 0 && !creation.initializer) {
    return true;
  }
  if (creation.initializer) {
    return isSimpleInitializer(creation.initializer);
  }
  if (argumentCount === 1 && creation.arguments) {
    return !isDeferredChain(creation.arguments[0]);
  }
  return false;
}

export function isSimpleInitializer(initializer: Initializer): boolean {
  return (
    initializer.elements.length <= MAX_SIMPLE_INITIALIZER_ELEMENTS &&
    initializer.elements.every(isSimpleElement)
  );
}

function isSimpleElement(expression: Expression): boolean {
  switch (expression.kind) {
    case "numeric-literal":
    case "string-literal":
    case "boolean-literal":
    case "identifier":
    case "member-access":
      return true;
    default:
      return false;
  }
}

export function isDeferredChain(expression: Expression): boolean {
  return (
    expression.kind === "invocation" &&
    expression.expression.kind === "member-access" &&
    DEFERRED_CHAIN_METHODS.has(expression.expression.name)
  );
}

/** Elements of the literal that replaces `creation`. */
export function collectionElementsFor(creation: ObjectCreation): CollectionElement[] {
  if (creation.initializer) {
    return [...creation.initializer.elements];
  }
  if (creation.arguments?.length === 1) {
    return [spreadElement(creation.arguments[0])];
  }
  return [];
}

export function createCollectionExpressionFix(creation: ObjectCreation): FixProposal | undefined {
  if (!creation.span) {
    return undefined;
  }
  return {
    title: "Use collection expression",
    equivalenceKey: "use-collection-expression",
    ruleId: COLLECTION_INITIALIZATION_ID,
    target: { kind: "object-creation", span: creation.span },
    apply(root, target) {
      if (target.kind !== "object-creation" || !target.span) {
        return root;
      }
      const literal = { ...collectionLiteral(collectionElementsFor(target)), origin: target.span };
      return replaceNode(root, target, literal);
    },
  };
}

/** Offers nothing when the tree's language version predates collection literals. */
export const collectionInitializationFixProvider: CodeFixProvider = {
  fixableRuleIds: [COLLECTION_INITIALIZATION_ID],
  proposeFixes(finding, tree) {
    if (!tree.supportsCollectionLiterals()) {
      return [];
    }
    const target = tree.findNode(finding.span, "object-creation");
    if (!target || target.kind !== "object-creation") {
      return [];
    }
    const fix = createCollectionExpressionFix(target);
    return fix ? [fix] : [];
  },
};
