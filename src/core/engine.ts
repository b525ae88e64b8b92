import { logger as defaultLogger, type Logger } from "./logger";
import type { RuleRegistry } from "./registry";
import type { SymbolResolver } from "./semantic";
import { forEachNode, type SyntaxNode } from "./syntax";
import type { SyntaxTree } from "./tree";
import type {
  AnalysisResult,
  Finding,
  FixProposal,
  NodeEvaluator,
  Rule,
  RuleDescriptor,
  RuleFault,
  SeverityOverride,
} from "./types";

export interface RuleEngineOptions {
  logger?: Logger;
  severityOverrides?: ReadonlyMap<string, SeverityOverride>;
  analyzeGeneratedCode?: boolean;
}

export interface AnalyzeOptions {
  /** Checked before every node visit. */
  signal?: AbortSignal;
}

export class RuleEngine {
  private readonly logger: Logger;
  private readonly severityOverrides: ReadonlyMap<string, SeverityOverride>;
  private readonly analyzeGeneratedCode: boolean;

  constructor(
    private readonly registry: RuleRegistry,
    options: RuleEngineOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.severityOverrides = options.severityOverrides ?? new Map();
    this.analyzeGeneratedCode = options.analyzeGeneratedCode ?? false;
  }

  supportedRules(): RuleDescriptor[] {
    return this.registry.supportedRules();
  }

  analyze(tree: SyntaxTree, resolver: SymbolResolver, options: AnalyzeOptions = {}): AnalysisResult {
    if (tree.generated && !this.analyzeGeneratedCode) {
      this.logger.debug("Skipping generated source", { file: tree.filePath });
      return { findings: [], faults: [] };
    }

    const faults: RuleFault[] = [];
    const evaluators = this.startRules(tree, resolver, faults);
    const findings: Finding[] = [];

    forEachNode(tree.root, (node) => {
      options.signal?.throwIfAborted();

      for (const rule of this.registry.rulesFor(node.kind)) {
        const evaluate = evaluators.get(rule);
        if (!evaluate) {
          continue;
        }

        let produced: readonly Finding[];
        try {
          produced = evaluate(node);
        } catch (error) {
          faults.push(this.recordFault(rule, tree, error, node));
          continue;
        }

        for (const finding of produced) {
          const emitted = this.emit(finding, tree);
          if (emitted) {
            findings.push(emitted);
          }
        }
      }
    });

    return { findings, faults };
  }

  proposedFixes(finding: Finding, tree: SyntaxTree): FixProposal[] {
    const proposals: FixProposal[] = [];
    for (const provider of this.registry.fixProvidersFor(finding.ruleId)) {
      try {
        proposals.push(...provider.proposeFixes(finding, tree));
      } catch (error) {
        this.logger.warn("Fix provider failed; no fix offered", {
          rule: finding.ruleId,
          file: tree.filePath,
          error: describeError(error),
        });
      }
    }
    return proposals;
  }

  private startRules(tree: SyntaxTree, resolver: SymbolResolver, faults: RuleFault[]): Map<Rule, NodeEvaluator> {
    const evaluators = new Map<Rule, NodeEvaluator>();

    for (const rule of this.registry.registeredRules()) {
      if (rule.descriptors.every((descriptor) => this.severityOverrides.get(descriptor.id) === "off")) {
        continue;
      }

      try {
        const evaluate = rule.start({ tree, resolver });
        if (evaluate) {
          evaluators.set(rule, evaluate);
        } else {
          this.logger.debug("Rule inactive for this program", { rule: rule.name, file: tree.filePath });
        }
      } catch (error) {
        faults.push(this.recordFault(rule, tree, error));
      }
    }

    return evaluators;
  }

  private emit(finding: Finding, tree: SyntaxTree): Finding | undefined {
    const override = this.severityOverrides.get(finding.ruleId);
    if (override === "off") {
      return undefined;
    }

    const emitted: Finding = {
      ruleId: finding.ruleId,
      severity: override ?? finding.severity,
      message: finding.message,
      span: finding.span,
    };
    const [fix] = this.proposedFixes(emitted, tree);
    return fix ? { ...emitted, fix } : emitted;
  }

  private recordFault(rule: Rule, tree: SyntaxTree, error: unknown, node?: SyntaxNode): RuleFault {
    const fault: RuleFault = {
      rule: rule.name,
      ruleIds: rule.descriptors.map((descriptor) => descriptor.id),
      nodeKind: node?.kind,
      span: node?.span,
      message: describeError(error),
    };
    this.logger.warn("Rule evaluation failed", {
      rule: rule.name,
      file: tree.filePath,
      nodeKind: fault.nodeKind,
      error: fault.message,
    });
    return fault;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
