import { RuleEngine } from "./engine";
import { Fixer } from "./fixer";
import { logger as defaultLogger, type Logger } from "./logger";
import { isRuleInProfile, type RuleProfile } from "./profiles";
import { loadProject } from "./project";
import { RuleRegistry } from "./registry";
import { createBuiltInFixProviders, createBuiltInRules } from "./rules";
import type { LoadedDocument } from "./snapshot";
import type {
  AnalysisResult,
  AnalyzerConfig,
  AuditReport,
  FixedFile,
  FixProposal,
  FixReport,
  ReportedFault,
  ReportedFinding,
} from "./types";

export interface RunOptions {
  logger?: Logger;
  signal?: AbortSignal;
}

export interface FixRunOptions extends RunOptions {
  /** Only fixes for these rule ids; every fixable rule when empty. */
  rules?: string[];
}

export interface DocumentAnalysis {
  document: LoadedDocument;
  result: AnalysisResult;
}

export function createRuleRegistry(profile: RuleProfile): RuleRegistry {
  const registry = new RuleRegistry();
  for (const rule of createBuiltInRules()) {
    if (isRuleInProfile(rule, profile)) {
      registry.register(rule);
    }
  }
  for (const provider of createBuiltInFixProviders()) {
    registry.registerFixProvider(provider);
  }
  return registry;
}

export function createRuleEngine(config: AnalyzerConfig, logger: Logger = defaultLogger): RuleEngine {
  return new RuleEngine(createRuleRegistry(config.profile), {
    logger,
    severityOverrides: config.severityOverrides,
    analyzeGeneratedCode: config.analyzeGeneratedCode,
  });
}

export function analyzeDocuments(
  engine: RuleEngine,
  documents: readonly LoadedDocument[],
  signal?: AbortSignal,
): DocumentAnalysis[] {
  return documents.map((document) => ({
    document,
    result: engine.analyze(document.tree, document.semantics, { signal }),
  }));
}

export function runAudit(config: AnalyzerConfig, options: RunOptions = {}): AuditReport {
  const logger = options.logger ?? defaultLogger;
  const { documents } = loadProject(config);
  logger.debug("Loaded syntax snapshots", { count: documents.length, root: config.rootDir });

  const analyses = analyzeDocuments(createRuleEngine(config, logger), documents, options.signal);
  return buildAuditReport(analyses);
}

export function buildAuditReport(analyses: readonly DocumentAnalysis[]): AuditReport {
  const findings: ReportedFinding[] = [];
  const faults: ReportedFault[] = [];

  for (const { document, result } of analyses) {
    const { tree } = document;
    for (const finding of result.findings) {
      const position = tree.lineAndColumnAt(finding.span.start);
      findings.push({
        rule: finding.ruleId,
        severity: finding.severity,
        file: tree.filePath,
        line: position.line,
        column: position.column,
        message: finding.message,
        fixable: finding.fix !== undefined,
      });
    }
    for (const fault of result.faults) {
      faults.push({
        rule: fault.rule,
        file: tree.filePath,
        line: fault.span ? tree.lineAndColumnAt(fault.span.start).line : undefined,
        nodeKind: fault.nodeKind,
        message: fault.message,
      });
    }
  }

  const stableFindings = sortFindings(findings);
  return {
    ok: stableFindings.every((finding) => finding.severity === "info"),
    summary: {
      files: analyses.length,
      findings: stableFindings.length,
      fixable: stableFindings.filter((finding) => finding.fixable).length,
      faults: faults.length,
    },
    findings: stableFindings,
    faults,
  };
}

export function runFix(config: AnalyzerConfig, options: FixRunOptions = {}): FixReport {
  const logger = options.logger ?? defaultLogger;
  const { documents } = loadProject(config);
  const analyses = analyzeDocuments(createRuleEngine(config, logger), documents, options.signal);
  return buildFixReport(analyses, { logger, rules: options.rules });
}

export function buildFixReport(
  analyses: readonly DocumentAnalysis[],
  options: { logger?: Logger; rules?: string[] } = {},
): FixReport {
  const fixer = new Fixer({ logger: options.logger });
  const wanted = new Set(options.rules ?? []);
  const files: FixedFile[] = [];

  for (const { document, result } of analyses) {
    const fixes = result.findings
      .filter((finding) => wanted.size === 0 || wanted.has(finding.ruleId))
      .flatMap((finding) => (finding.fix ? [finding.fix] : []));
    if (fixes.length === 0) {
      continue;
    }

    const { tree } = document;
    const batch = fixer.applyBatchWithPlan(tree, fixes);
    const label = (fix: FixProposal): string => {
      const position = tree.lineAndColumnAt(fix.target.span.start);
      return `${fix.ruleId} ${position.line}:${position.column}`;
    };
    files.push({
      file: tree.filePath,
      applied: batch.accepted.map(label),
      skipped: batch.skipped.map(label),
      output: batch.tree.print(),
    });
  }

  const applied = files.reduce((total, file) => total + file.applied.length, 0);
  const skipped = files.reduce((total, file) => total + file.skipped.length, 0);
  return {
    ok: skipped === 0,
    summary: { files: files.length, applied, skipped },
    files,
  };
}

function sortFindings(findings: ReportedFinding[]): ReportedFinding[] {
  return [...findings].sort((left, right) => {
    if (left.file !== right.file) {
      return left.file.localeCompare(right.file);
    }
    if (left.line !== right.line) {
      return left.line - right.line;
    }
    if (left.column !== right.column) {
      return left.column - right.column;
    }
    return left.rule.localeCompare(right.rule);
  });
}
