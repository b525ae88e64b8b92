import fs from "node:fs";
import path from "node:path";
import { runAudit } from "./analyzer";
import { createAnalyzerConfig } from "./config";
import type { Logger } from "./logger";
import { toSerializableAuditReport } from "./reporter";

export interface FixtureResult {
  fixture: string;
  ok: boolean;
  reason?: string;
}

/**
 * Each fixture is a directory holding `src/` (syntax snapshots) and
 * `expected.json`, a subset of the serialized audit report.
 */
export function runFixtures(fixtureRoot: string, options: { logger?: Logger } = {}): FixtureResult[] {
  const fixtureNames = fs
    .readdirSync(fixtureRoot, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right));

  return fixtureNames.map((fixtureName) => runFixture(fixtureRoot, fixtureName, options.logger));
}

function runFixture(fixtureRoot: string, fixtureName: string, logger: Logger | undefined): FixtureResult {
  const fixtureDir = path.join(fixtureRoot, fixtureName);
  const srcDir = path.join(fixtureDir, "src");
  const expectedPath = path.join(fixtureDir, "expected.json");

  if (!fs.existsSync(srcDir)) {
    return { fixture: fixtureName, ok: false, reason: "missing src directory" };
  }
  if (!fs.existsSync(expectedPath)) {
    return { fixture: fixtureName, ok: false, reason: "missing expected.json" };
  }

  const expected: unknown = JSON.parse(fs.readFileSync(expectedPath, "utf8"));
  const config = createAnalyzerConfig({ root: srcDir, format: "json" });
  const actual = toSerializableAuditReport(runAudit(config, { logger }));
  const ok = isSubsetMatch(actual, expected);

  return {
    fixture: fixtureName,
    ok,
    reason: ok ? undefined : "actual output does not satisfy expected semantic subset",
  };
}

/** Every key and array item in `expected` must be present in `actual`; arrays match items in any order. */
export function isSubsetMatch(actual: unknown, expected: unknown): boolean {
  if (expected === null || expected === undefined) {
    return actual === expected;
  }

  if (typeof expected !== "object") {
    return Object.is(actual, expected);
  }

  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) {
      return false;
    }

    const used = new Set<number>();
    for (const expectedItem of expected) {
      const index = actual.findIndex((item, i) => !used.has(i) && isSubsetMatch(item, expectedItem));
      if (index < 0) {
        return false;
      }
      used.add(index);
    }
    return true;
  }

  if (!isRecord(actual)) {
    return false;
  }

  return Object.entries(expected).every(
    ([key, expectedValue]) => key in actual && isSubsetMatch(actual[key], expectedValue),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function renderFixtureText(results: readonly FixtureResult[]): string {
  const passed = results.filter((result) => result.ok).length;
  const lines = [`Fixtures: total=${results.length} passed=${passed} failed=${results.length - passed}`];
  for (const result of results) {
    lines.push(result.ok ? `- PASS ${result.fixture}` : `- FAIL ${result.fixture} ${result.reason ?? "unknown error"}`);
  }
  return lines.join("\n");
}
