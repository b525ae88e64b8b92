import type { CodeFixProvider, Rule } from "../types";
import { createAvailableWorkStateRule } from "./fl0008-available-work-state";
import { createGetOrAddValueRule } from "./fl0011-get-or-add-value";
import { createInterpolatedStringRule } from "./fl0007-interpolated-string";
import {
  collectionInitializationFixProvider,
  createCollectionInitializationRule,
} from "./fl0021-collection-initialization";

export function createBuiltInRules(): Rule[] {
  return [
    createCollectionInitializationRule(),
    createGetOrAddValueRule(),
    createAvailableWorkStateRule(),
    createInterpolatedStringRule(),
  ];
}

export function createBuiltInFixProviders(): CodeFixProvider[] {
  return [collectionInitializationFixProvider];
}
