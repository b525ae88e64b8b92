import path from "node:path";
import { configFromArgs } from "../src/cli/options";
import { createRuleRegistry } from "../src/core/analyzer";
import {
  createAnalyzerConfig,
  DEFAULT_EXCLUDE_GLOBS,
  DEFAULT_INCLUDE_GLOBS,
  getListArg,
  getSingleArg,
  isFileInScope,
  isGeneratedSource,
  parseCliArgs,
  parseFormat,
  parseLanguageVersion,
  parseSeverityOverrides,
} from "../src/core/config";
import { isRuleInProfile, resolveProfile } from "../src/core/profiles";
import { createCollectionInitializationRule } from "../src/core/rules/fl0021-collection-initialization";

describe("parseCliArgs", () => {
  it("separates positionals, values and flags", () => {
    const args = parseCliArgs(["input", "--root", "src", "--format=json", "--include-generated"]);

    expect(args.positionals).toEqual(["input"]);
    expect(getSingleArg(args, "root")).toBe("src");
    expect(getSingleArg(args, "format")).toBe("json");
    expect(args.flags.has("include-generated")).toBe(true);
  });

  it("collects repeated and comma-separated list values", () => {
    const args = parseCliArgs(["--disable", "FL0021,FL0007", "--disable", " FL0011 "]);

    expect(getListArg(args, "disable")).toEqual(["FL0021", "FL0007", "FL0011"]);
    expect(getListArg(args, "missing")).toEqual([]);
  });

  it("splits an inline value at its first equals sign", () => {
    const args = parseCliArgs(["--severity=FL0021=warning", "--include=**/a=b/*.json"]);

    expect(getListArg(args, "severity")).toEqual(["FL0021=warning"]);
    expect(getSingleArg(args, "include")).toBe("**/a=b/*.json");
    expect([...configFromArgs(args).severityOverrides]).toEqual([["FL0021", "warning"]]);
  });

  it("keeps the last of repeated single values", () => {
    const args = parseCliArgs(["--format", "text", "--format", "json"]);

    expect(getSingleArg(args, "format")).toBe("json");
  });
});

describe("createAnalyzerConfig", () => {
  it("fills defaults", () => {
    const config = createAnalyzerConfig({ root: "/repo" });

    expect(config).toEqual({
      rootDir: path.resolve("/repo"),
      includeGlobs: DEFAULT_INCLUDE_GLOBS,
      excludeGlobs: DEFAULT_EXCLUDE_GLOBS,
      format: "text",
      profile: "all",
      severityOverrides: new Map(),
      languageVersion: undefined,
      analyzeGeneratedCode: false,
    });
  });

  it("merges severity overrides with disabled rules", () => {
    const config = createAnalyzerConfig({
      root: "/repo",
      severity: ["FL0011=error", "FL0021=warning"],
      disable: ["FL0021"],
      languageVersion: "11",
      profile: "usage",
      exclude: ["**/legacy/**"],
    });

    expect([...config.severityOverrides]).toEqual([
      ["FL0011", "error"],
      ["FL0021", "off"],
    ]);
    expect(config.languageVersion).toBe(11);
    expect(config.profile).toBe("usage");
    expect(config.excludeGlobs).toEqual([...DEFAULT_EXCLUDE_GLOBS, "**/legacy/**"]);
  });

  it("rejects malformed values", () => {
    expect(() => parseSeverityOverrides(["FL0011"])).toThrow("Invalid severity override: FL0011 (expected RULE=level)");
    expect(() => parseSeverityOverrides(["FL0011=loud"])).toThrow("Unsupported severity for FL0011: loud");
    expect(() => parseLanguageVersion("12.5")).toThrow("Invalid language version: 12.5");
    expect(() => parseFormat("xml")).toThrow("Unsupported format: xml");
    expect(() => createAnalyzerConfig({ profile: "lint" })).toThrow("Unsupported profile: lint");
  });

  it("parses language versions", () => {
    expect(parseLanguageVersion("12")).toBe(12);
    expect(parseFormat(undefined)).toBe("text");
  });
});

describe("isFileInScope", () => {
  const config = createAnalyzerConfig({ root: "/repo" });

  it("matches snapshot files under the root", () => {
    expect(isFileInScope(config, "/repo/src/Program.snapshot.json")).toBe(true);
    expect(isFileInScope(config, "/repo/Program.snapshot.json")).toBe(true);
  });

  it("skips excluded directories, other files and paths outside the root", () => {
    expect(isFileInScope(config, "/repo/node_modules/pkg/Program.snapshot.json")).toBe(false);
    expect(isFileInScope(config, "/repo/obj/Debug/Program.snapshot.json")).toBe(false);
    expect(isFileInScope(config, "/repo/src/Program.json")).toBe(false);
    expect(isFileInScope(config, "/elsewhere/Program.snapshot.json")).toBe(false);
  });
});

describe("isGeneratedSource", () => {
  it("recognizes generated file names", () => {
    expect(isGeneratedSource("src/Model.g.cs", "")).toBe(true);
    expect(isGeneratedSource("src/Form.Designer.cs", "")).toBe(true);
    expect(isGeneratedSource("src/Program.cs", "class Program {}")).toBe(false);
  });

  it("recognizes an auto-generated header near the top", () => {
    expect(isGeneratedSource("src/Program.cs", "// <auto-generated />\nclass Program {}")).toBe(true);
    expect(isGeneratedSource("src/Program.cs", `${"\n".repeat(10)}// <auto-generated />`)).toBe(false);
  });
});

describe("profiles", () => {
  it("resolves profile names", () => {
    expect(resolveProfile(undefined)).toBe("all");
    expect(resolveProfile("style")).toBe("style");
  });

  it("selects rules by category", () => {
    const rule = createCollectionInitializationRule();

    expect(isRuleInProfile(rule, "style")).toBe(true);
    expect(isRuleInProfile(rule, "usage")).toBe(false);
  });

  it("registers the built-in rules of a profile", () => {
    const ids = (profile: "all" | "usage") =>
      createRuleRegistry(profile)
        .supportedRules()
        .map((descriptor) => descriptor.id);

    expect(ids("all")).toEqual(["FL0021", "FL0011", "FL0008", "FL0007", "FL0014"]);
    expect(ids("usage")).toEqual(["FL0011", "FL0008", "FL0007", "FL0014"]);
  });
});
