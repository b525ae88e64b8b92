import {
  classDeclaration,
  compilationUnit,
  methodDeclaration,
  typeReference,
} from "../src/core/factory";
import { createLogger, type Logger } from "../src/core/logger";
import { LIST_TYPE_NAME } from "../src/core/rules/fl0021-collection-initialization";
import { SemanticModel } from "../src/core/semantic";
import type { CompilationUnit, Parameter, Statement, TypeReference } from "../src/core/syntax";
import { layoutTree, type LayoutOptions, type SyntaxTree } from "../src/core/tree";

export interface LoadedProgram {
  tree: SyntaxTree;
  semantics: SemanticModel;
}

export const quietLogger: Logger = createLogger({ write: () => undefined });

/** `class C { void M(params) { statements } }`; statements start on line 5. */
export function methodProgram(statements: Statement[], parameters: Parameter[] = []): CompilationUnit {
  return compilationUnit([
    classDeclaration("C", [methodDeclaration("M", typeReference("void"), parameters, statements)]),
  ]);
}

export function listOfInt(): TypeReference {
  return typeReference("List", [typeReference("int")]);
}

/** Lays out the program and types every `new List<...>` as `List<int>`. */
export function listProgram(statements: Statement[], options: LayoutOptions = {}): LoadedProgram {
  const tree = layoutTree(methodProgram(statements), options);
  const semantics = new SemanticModel();
  const list = semantics.defineType(LIST_TYPE_NAME);
  const int = semantics.defineType("System.Int32");
  const listType = semantics.construct(list, [int]);
  for (const creation of tree.nodesOfKind("object-creation")) {
    if (creation.type.name === "List") {
      semantics.bindType(creation, listType);
    }
  }
  return { tree, semantics };
}
