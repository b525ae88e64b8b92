import { originalDefinition, type SymbolResolver, type TypeDescriptor } from "../semantic";
import type { MethodDeclaration, TypeReference } from "../syntax";
import { createDescriptor, createFinding, defineRule } from "./common";

export const AVAILABLE_WORK_STATE_ID = "FL0008";

export const WORK_STATE_SENTINELS: ReadonlySet<string> = new Set(["None", "ToDo"]);

export interface WorkStateTypeNames {
  workStateInterface: string;
  workStateClass: string;
  asyncAction: string;
  asyncMethodContext: string;
  cancellationToken: string;
  enumerable: string;
}

export const DEFAULT_WORK_STATE_TYPE_NAMES: WorkStateTypeNames = {
  workStateInterface: "Libronix.Utility.Threading.IWorkState",
  workStateClass: "Libronix.Utility.Threading.WorkState",
  asyncAction: "Libronix.Utility.Threading.AsyncAction",
  asyncMethodContext: "Libronix.Utility.Threading.AsyncMethodContext",
  cancellationToken: "System.Threading.CancellationToken",
  enumerable: "System.Collections.Generic.IEnumerable`1",
};

export const availableWorkStateDescriptor = createDescriptor({
  id: AVAILABLE_WORK_STATE_ID,
  title: "WorkState.None and WorkState.ToDo Usage",
  messageFormat: "WorkState.None and WorkState.ToDo must not be used when an IWorkState is available.",
  category: "usage",
  severity: "error",
  kinds: ["member-access"],
});

export function createAvailableWorkStateRule(names: Partial<WorkStateTypeNames> = {}) {
  const typeNames: WorkStateTypeNames = { ...DEFAULT_WORK_STATE_TYPE_NAMES, ...names };

  return defineRule({
    name: "available-work-state",
    descriptors: [availableWorkStateDescriptor],
    kinds: ["member-access"],
    start({ tree, resolver }) {
      const workStateInterface = resolver.lookupType(typeNames.workStateInterface);
      const workStateClass = resolver.lookupType(typeNames.workStateClass);
      if (!workStateInterface || !workStateClass) {
        return undefined;
      }

      // Optional: a program without these simply never matches them.
      const richerContextTypes = [
        workStateInterface,
        resolver.lookupType(typeNames.cancellationToken),
        resolver.lookupType(typeNames.asyncMethodContext),
      ].filter((type): type is TypeDescriptor => type !== undefined);
      const asyncAction = resolver.lookupType(typeNames.asyncAction);
      const enumerable = resolver.lookupType(typeNames.enumerable);

      return (access) => {
        const property = resolver.resolveSymbol(access);
        if (
          property?.kind !== "property" ||
          !WORK_STATE_SENTINELS.has(property.name) ||
          !property.containingType ||
          !resolver.equals(property.containingType, workStateClass)
        ) {
          return [];
        }

        const method = tree.firstAncestor(access, "method-declaration");
        if (!method || !access.span) {
          return [];
        }

        const returnsAsyncActions =
          enumerable !== undefined &&
          asyncAction !== undefined &&
          isSequenceOf(method.returnType, enumerable, asyncAction, resolver);
        if (returnsAsyncActions || hasWorkStateParameter(method, richerContextTypes, workStateInterface, resolver)) {
          return [createFinding(availableWorkStateDescriptor, access.span)];
        }
        return [];
      };
    },
  });
}

function isSequenceOf(
  reference: TypeReference,
  enumerable: TypeDescriptor,
  elementType: TypeDescriptor,
  resolver: SymbolResolver,
): boolean {
  const type = resolver.typeOf(reference);
  if (!type || !resolver.equals(originalDefinition(type), enumerable)) {
    return false;
  }
  const [element] = type.typeArguments;
  return element !== undefined && resolver.equals(element, elementType);
}

function hasWorkStateParameter(
  method: MethodDeclaration,
  richerContextTypes: readonly TypeDescriptor[],
  workStateInterface: TypeDescriptor,
  resolver: SymbolResolver,
): boolean {
  return method.parameters.some((parameter) => {
    const type = resolver.typeOf(parameter.type);
    if (!type) {
      return false;
    }
    if (richerContextTypes.some((candidate) => resolver.equals(type, candidate))) {
      return true;
    }
    return type.interfaces.some((implemented) => resolver.equals(implemented, workStateInterface));
  });
}
