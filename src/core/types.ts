import type { RuleProfile } from "./profiles";
import type { SymbolResolver } from "./semantic";
import type { Span, SyntaxKind, SyntaxNode } from "./syntax";
import type { SyntaxTree } from "./tree";

export type Severity = "info" | "warning" | "error";

export type SeverityOverride = Severity | "off";

export type RuleCategory = "style" | "usage";

export type OutputFormat = "text" | "json";

export interface RuleDescriptor {
  id: string;
  title: string;
  messageFormat: string;
  category: RuleCategory;
  severity: Severity;
  helpLink: string;
  kinds: readonly SyntaxKind[];
}

export interface FixTarget {
  kind: SyntaxKind;
  span: Span;
}

export interface FixProposal {
  title: string;
  /** Groups proposals of the same transform, e.g. for "fix all". */
  equivalenceKey: string;
  ruleId: string;
  target: FixTarget;
  /** Pure: returns a new root and never assumes another proposal ran first. */
  apply(root: SyntaxNode, target: SyntaxNode): SyntaxNode;
}

export interface Finding {
  ruleId: string;
  severity: Severity;
  message: string;
  span: Span;
  fix?: FixProposal;
}

export interface RuleFault {
  rule: string;
  ruleIds: string[];
  nodeKind?: SyntaxKind;
  span?: Span;
  message: string;
}

export interface RuleContext {
  tree: SyntaxTree;
  resolver: SymbolResolver;
}

export type NodeEvaluator = (node: SyntaxNode) => readonly Finding[];

export interface Rule {
  /** Stable name used in fault reports. */
  name: string;
  descriptors: readonly RuleDescriptor[];
  kinds: readonly SyntaxKind[];
  /**
   * Called once per analysis pass. Returns undefined when the program lacks
   * what the rule looks for, which turns the rule off for that pass.
   */
  start(context: RuleContext): NodeEvaluator | undefined;
}

export interface CodeFixProvider {
  fixableRuleIds: readonly string[];
  proposeFixes(finding: Finding, tree: SyntaxTree): FixProposal[];
}

export interface AnalysisResult {
  findings: Finding[];
  faults: RuleFault[];
}

export interface AnalyzerConfig {
  rootDir: string;
  includeGlobs: string[];
  excludeGlobs: string[];
  format: OutputFormat;
  profile: RuleProfile;
  severityOverrides: Map<string, SeverityOverride>;
  languageVersion?: number;
  analyzeGeneratedCode: boolean;
}

export interface ReportedFinding {
  rule: string;
  severity: Severity;
  file: string;
  line: number;
  column: number;
  message: string;
  fixable: boolean;
}

export interface ReportedFault {
  rule: string;
  file: string;
  line?: number;
  nodeKind?: string;
  message: string;
}

export interface AuditReport {
  ok: boolean;
  summary: {
    files: number;
    findings: number;
    fixable: number;
    faults: number;
  };
  findings: ReportedFinding[];
  faults: ReportedFault[];
}

export interface FixedFile {
  file: string;
  applied: string[];
  skipped: string[];
  output: string;
}

export interface FixReport {
  ok: boolean;
  summary: {
    files: number;
    applied: number;
    skipped: number;
  };
  files: FixedFile[];
}
