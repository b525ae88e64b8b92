import { originalDefinition, type SymbolResolver, type TypeDescriptor } from "../semantic";
import type { Expression, Invocation } from "../syntax";
import type { SyntaxTree } from "../tree";
import { createDescriptor, createFinding, defineRule, trailingNameSpan } from "./common";

export const GET_OR_ADD_VALUE_ID = "FL0011";

export const GET_OR_ADD_VALUE_METHOD = "GetOrAddValue";

export const DICTIONARY_UTILITY_TYPE_NAME = "Libronix.Utility.DictionaryUtility";

export const CONCURRENT_DICTIONARY_TYPE_NAME = "System.Collections.Concurrent.ConcurrentDictionary`2";

export const getOrAddValueDescriptor = createDescriptor({
  id: GET_OR_ADD_VALUE_ID,
  title: "GetOrAddValue() Usage",
  messageFormat:
    "GetOrAddValue() is not threadsafe and should not be used with ConcurrentDictionary; use GetOrAdd() instead.",
  category: "usage",
  severity: "warning",
  kinds: ["invocation"],
});

export interface GetOrAddValueOptions {
  utilityTypeName?: string;
  concurrentDictionaryTypeName?: string;
}

export function createGetOrAddValueRule(options: GetOrAddValueOptions = {}) {
  const utilityTypeName = options.utilityTypeName ?? DICTIONARY_UTILITY_TYPE_NAME;
  const concurrentDictionaryTypeName = options.concurrentDictionaryTypeName ?? CONCURRENT_DICTIONARY_TYPE_NAME;

  return defineRule({
    name: "get-or-add-value",
    descriptors: [getOrAddValueDescriptor],
    kinds: ["invocation"],
    start({ tree, resolver }) {
      const utilityType = resolver.lookupType(utilityTypeName);
      const concurrentDictionary = resolver.lookupType(concurrentDictionaryTypeName);
      if (!utilityType || !concurrentDictionary) {
        return undefined;
      }

      return (call) => {
        const callee = call.expression;
        if (callee.kind !== "member-access" && callee.kind !== "member-binding") {
          return [];
        }
        if (callee.name !== GET_OR_ADD_VALUE_METHOD) {
          return [];
        }

        const method = resolver.resolveSymbol(callee);
        if (!method?.containingType || !resolver.equals(method.containingType, utilityType)) {
          return [];
        }

        const receiver = receiverOf(call, tree);
        if (!receiver || !isOfType(receiver, concurrentDictionary, resolver)) {
          return [];
        }

        const span = trailingNameSpan(callee, callee.name);
        return span ? [createFinding(getOrAddValueDescriptor, span)] : [];
      };
    },
  });
}

/** `a.M()` → `a`; `a?.M()` → `a` via the enclosing conditional access. */
function receiverOf(call: Invocation, tree: SyntaxTree): Expression | undefined {
  const callee = call.expression;
  if (callee.kind === "member-access") {
    return callee.expression;
  }
  const parent = tree.parentOf(call);
  if (parent?.kind === "conditional-access" && parent.whenNotNull === call) {
    return parent.expression;
  }
  return undefined;
}

function isOfType(expression: Expression, expected: TypeDescriptor, resolver: SymbolResolver): boolean {
  const type = resolver.typeOf(expression);
  return type !== undefined && resolver.equals(originalDefinition(type), expected);
}
