import { RuleEngine } from "../src/core/engine";
import {
  expressionStatement,
  identifier,
  interpolatedString,
  interpolatedText,
  invocation,
  localDeclaration,
  memberAccess,
  methodCall,
  objectCreation,
  parameter,
  stringLiteral,
  typeReference,
} from "../src/core/factory";
import { createLogger } from "../src/core/logger";
import { RuleRegistry } from "../src/core/registry";
import { createBuiltInRules } from "../src/core/rules";
import { createDescriptor, createFinding, defineRule } from "../src/core/rules/common";
import { DEFAULT_WORK_STATE_TYPE_NAMES } from "../src/core/rules/fl0008-available-work-state";
import { CONCURRENT_DICTIONARY_TYPE_NAME, DICTIONARY_UTILITY_TYPE_NAME } from "../src/core/rules/fl0011-get-or-add-value";
import { LIST_TYPE_NAME } from "../src/core/rules/fl0021-collection-initialization";
import { SemanticModel } from "../src/core/semantic";
import type { Identifier } from "../src/core/syntax";
import { layoutTree, type SyntaxTree } from "../src/core/tree";
import type { CodeFixProvider, Rule, RuleDescriptor } from "../src/core/types";
import { listOfInt, methodProgram, quietLogger } from "./helpers";

function descriptor(id: string): RuleDescriptor {
  return createDescriptor({
    id,
    title: id,
    messageFormat: id,
    category: "usage",
    severity: "warning",
    kinds: ["identifier"],
  });
}

function identifierRule(name: string, ruleDescriptor: RuleDescriptor, inspect?: (node: Identifier) => void): Rule {
  return defineRule({
    name,
    descriptors: [ruleDescriptor],
    kinds: ["identifier"],
    start: () => (node) => {
      inspect?.(node);
      return node.span ? [createFinding(ruleDescriptor, node.span, `${ruleDescriptor.id} ${node.name}`)] : [];
    },
  });
}

function program(options: { generated?: boolean } = {}): SyntaxTree {
  return layoutTree(
    methodProgram([expressionStatement(identifier("x")), expressionStatement(identifier("y"))]),
    options,
  );
}

const semantics = new SemanticModel();

describe("RuleEngine", () => {
  it("reports in traversal order, then registration order per node", () => {
    const registry = new RuleRegistry()
      .register(identifierRule("first", descriptor("T001")))
      .register(identifierRule("second", descriptor("T002")));

    const { findings } = new RuleEngine(registry, { logger: quietLogger }).analyze(program(), semantics);

    expect(findings.map((finding) => finding.message)).toEqual(["T001 x", "T002 x", "T001 y", "T002 y"]);
  });

  it("isolates a rule that throws and keeps the others running", () => {
    const lines: string[] = [];
    const logger = createLogger({ json: true, write: (line) => lines.push(line) });
    const registry = new RuleRegistry()
      .register(
        identifierRule("throwing", descriptor("T900"), (node) => {
          if (node.name === "x") {
            throw new Error("boom");
          }
        }),
      )
      .register(identifierRule("steady", descriptor("T001")));

    const result = new RuleEngine(registry, { logger }).analyze(program(), semantics);

    expect(result.findings.map((finding) => finding.message)).toEqual(["T001 x", "T900 y", "T001 y"]);
    expect(result.faults).toEqual([
      { rule: "throwing", ruleIds: ["T900"], nodeKind: "identifier", span: { start: 21, end: 22 }, message: "boom" },
    ]);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "warn",
      message: "Rule evaluation failed",
      rule: "throwing",
      file: "Test0.cs",
      nodeKind: "identifier",
      error: "boom",
    });
  });

  it("keeps every built-in rule reporting next to a rule that always throws", () => {
    const tree = layoutTree(
      methodProgram(
        [
          localDeclaration("items", objectCreation(listOfInt(), [])),
          expressionStatement(methodCall(identifier("map"), "GetOrAddValue", [stringLiteral("k")])),
          expressionStatement(invocation(identifier("Use"), [memberAccess(identifier("WorkState"), "None")])),
          localDeclaration("text", interpolatedString([interpolatedText("plain")])),
        ],
        [parameter("workState", typeReference("IWorkState"))],
      ),
    );
    const model = new SemanticModel();
    const int = model.defineType("System.Int32");
    const text = model.defineType("System.String");
    const list = model.defineType(LIST_TYPE_NAME);
    const utility = model.defineType(DICTIONARY_UTILITY_TYPE_NAME);
    const concurrent = model.defineType(CONCURRENT_DICTIONARY_TYPE_NAME);
    const workStateInterface = model.defineType(DEFAULT_WORK_STATE_TYPE_NAMES.workStateInterface);
    const workStateClass = model.defineType(DEFAULT_WORK_STATE_TYPE_NAMES.workStateClass, {
      interfaces: [workStateInterface],
    });

    model.bindType(tree.nodesOfKind("object-creation")[0], model.construct(list, [int]));
    for (const access of tree.nodesOfKind("member-access")) {
      if (access.name === "GetOrAddValue") {
        model.bindSymbol(access, { kind: "method", name: access.name, containingType: utility });
      } else {
        model.bindSymbol(access, { kind: "property", name: access.name, containingType: workStateClass });
      }
    }
    for (const node of tree.nodesOfKind("identifier").filter((candidate) => candidate.name === "map")) {
      model.bindSymbol(node, { kind: "local", name: node.name, type: model.construct(concurrent, [text, int]) });
    }
    for (const reference of tree.nodesOfKind("type-reference").filter((candidate) => candidate.name === "IWorkState")) {
      model.bindType(reference, workStateInterface);
    }

    const throwing = defineRule({
      name: "throwing",
      descriptors: [descriptor("T900")],
      kinds: ["object-creation", "invocation", "member-access", "interpolated-string"],
      start: () => () => {
        throw new Error("boom");
      },
    });
    const registry = new RuleRegistry().register(throwing);
    for (const rule of createBuiltInRules()) {
      registry.register(rule);
    }

    const result = new RuleEngine(registry, { logger: quietLogger }).analyze(tree, model);

    expect(result.findings.map((finding) => finding.ruleId)).toEqual(["FL0021", "FL0011", "FL0008", "FL0014"]);
    expect(result.faults.map((fault) => `${fault.rule} ${fault.nodeKind}`)).toEqual([
      "throwing object-creation",
      "throwing invocation",
      "throwing member-access",
      "throwing invocation",
      "throwing member-access",
      "throwing interpolated-string",
    ]);
  });

  it("records a fault when a rule fails to start", () => {
    const failing: Rule = {
      name: "unstartable",
      descriptors: [descriptor("T901")],
      kinds: ["identifier"],
      start: () => {
        throw new Error("missing context");
      },
    };
    const registry = new RuleRegistry().register(failing).register(identifierRule("steady", descriptor("T001")));

    const result = new RuleEngine(registry, { logger: quietLogger }).analyze(program(), semantics);

    expect(result.findings).toHaveLength(2);
    expect(result.faults).toEqual([{ rule: "unstartable", ruleIds: ["T901"], message: "missing context" }]);
  });

  it("stops when the signal is aborted", () => {
    const controller = new AbortController();
    controller.abort();
    const registry = new RuleRegistry().register(identifierRule("first", descriptor("T001")));

    expect(() =>
      new RuleEngine(registry, { logger: quietLogger }).analyze(program(), semantics, { signal: controller.signal }),
    ).toThrow();
  });

  it("stops between node visits once aborted mid-walk", () => {
    const controller = new AbortController();
    const seen: string[] = [];
    const registry = new RuleRegistry().register(
      identifierRule("aborting", descriptor("T001"), (node) => {
        seen.push(node.name);
        controller.abort();
      }),
    );

    expect(() =>
      new RuleEngine(registry, { logger: quietLogger }).analyze(program(), semantics, { signal: controller.signal }),
    ).toThrow();
    expect(seen).toEqual(["x"]);
  });

  it("applies severity overrides and drops findings turned off", () => {
    const registry = new RuleRegistry()
      .register(identifierRule("first", descriptor("T001")))
      .register(identifierRule("second", descriptor("T002")));
    const severityOverrides = new Map([
      ["T001", "error" as const],
      ["T002", "off" as const],
    ]);

    const { findings } = new RuleEngine(registry, { logger: quietLogger, severityOverrides }).analyze(
      program(),
      semantics,
    );

    expect(findings.map((finding) => `${finding.ruleId}:${finding.severity}`)).toEqual(["T001:error", "T001:error"]);
  });

  it("does not start a rule whose every id is turned off", () => {
    const start = jest.fn(() => undefined);
    const registry = new RuleRegistry().register({
      name: "silenced",
      descriptors: [descriptor("T003")],
      kinds: ["identifier"],
      start,
    });

    new RuleEngine(registry, { logger: quietLogger, severityOverrides: new Map([["T003", "off" as const]]) }).analyze(
      program(),
      semantics,
    );

    expect(start).not.toHaveBeenCalled();
  });

  it("skips generated sources unless asked to analyze them", () => {
    const registry = new RuleRegistry().register(identifierRule("first", descriptor("T001")));
    const generated = program({ generated: true });

    expect(new RuleEngine(registry, { logger: quietLogger }).analyze(generated, semantics).findings).toEqual([]);
    expect(
      new RuleEngine(registry, { logger: quietLogger, analyzeGeneratedCode: true }).analyze(generated, semantics)
        .findings,
    ).toHaveLength(2);
  });

  it("omits a fix whose provider throws", () => {
    const lines: string[] = [];
    const logger = createLogger({ write: (line) => lines.push(line), now: () => new Date(0) });
    const provider: CodeFixProvider = {
      fixableRuleIds: ["T001"],
      proposeFixes: () => {
        throw new Error("no room");
      },
    };
    const registry = new RuleRegistry()
      .register(identifierRule("first", descriptor("T001")))
      .registerFixProvider(provider);

    const { findings } = new RuleEngine(registry, { logger }).analyze(program(), semantics);

    expect(findings).toHaveLength(2);
    expect(findings[0].fix).toBeUndefined();
    expect(lines[0]).toBe(
      '[1970-01-01T00:00:00.000Z] WARN Fix provider failed; no fix offered {"rule":"T001","file":"Test0.cs","error":"no room"}',
    );
  });

  it("lists the descriptors of every registered rule", () => {
    const registry = new RuleRegistry()
      .register(identifierRule("first", descriptor("T001")))
      .register(identifierRule("second", descriptor("T002")));

    expect(new RuleEngine(registry).supportedRules().map((rule) => rule.helpLink)).toEqual([
      "docs/rules/T001.md",
      "docs/rules/T002.md",
    ]);
  });
});

describe("RuleRegistry", () => {
  it("rejects a rule id registered twice", () => {
    const registry = new RuleRegistry().register(identifierRule("first", descriptor("T001")));

    expect(() => registry.register(identifierRule("again", descriptor("T001")))).toThrow(
      "Rule id registered twice: T001",
    );
  });

  it("fans out per kind in registration order", () => {
    const first = identifierRule("first", descriptor("T001"));
    const second = identifierRule("second", descriptor("T002"));
    const registry = new RuleRegistry().register(first).register(second);

    expect(registry.rulesFor("identifier")).toEqual([first, second]);
    expect(registry.rulesFor("invocation")).toEqual([]);
    expect(registry.descriptor("T002")?.title).toBe("T002");
  });
});
