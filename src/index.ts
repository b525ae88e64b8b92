export * from "./core/syntax";
export * as factory from "./core/factory";
export { layout, renderNode } from "./core/printer";
export * from "./core/tree";
export * from "./core/semantic";
export * from "./core/types";
export * from "./core/registry";
export * from "./core/engine";
export * from "./core/fixer";
export * from "./core/snapshot";
export * from "./core/profiles";
export { createAnalyzerConfig, isGeneratedSource, isFileInScope, type AnalyzerConfigInput } from "./core/config";
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./core/logger";
export { analyzeDocuments, buildAuditReport, buildFixReport, createRuleEngine, createRuleRegistry, runAudit, runFix } from "./core/analyzer";
export { renderAuditText, renderFixText, toSerializableAuditReport, toSerializableFixReport } from "./core/reporter";
export * from "./core/rules/common";
export * from "./core/rules/fl0021-collection-initialization";
export * from "./core/rules/fl0011-get-or-add-value";
export * from "./core/rules/fl0008-available-work-state";
export * from "./core/rules/fl0007-interpolated-string";
export { createBuiltInFixProviders, createBuiltInRules } from "./core/rules";
export { isSubsetMatch, renderFixtureText, runFixtures, type FixtureResult } from "./core/fixtures";
