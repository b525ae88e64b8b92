import path from "node:path";
import { minimatch } from "minimatch";
import { resolveProfile } from "./profiles";
import type { AnalyzerConfig, OutputFormat, SeverityOverride } from "./types";

export const DEFAULT_INCLUDE_GLOBS = ["**/*.snapshot.json"];

export const DEFAULT_EXCLUDE_GLOBS = ["**/node_modules/**", "**/bin/**", "**/obj/**"];

/** File-name patterns of generated sources. */
export const GENERATED_SOURCE_GLOBS = ["*.g.cs", "*.g.i.cs", "*.designer.cs", "*.generated.cs", "*.AssemblyInfo.cs"];

const GENERATED_HEADER_PATTERN = /<auto-generated/i;
const GENERATED_HEADER_LINES = 10;

export interface ParsedCliArgs {
  positionals: string[];
  values: Map<string, string[]>;
  flags: Set<string>;
}

export interface AnalyzerConfigInput {
  root?: string;
  include?: string[];
  exclude?: string[];
  format?: OutputFormat;
  profile?: string;
  disable?: string[];
  severity?: string[];
  languageVersion?: string;
  includeGenerated?: boolean;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs {
  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const body = token.slice(2);
    const separator = body.indexOf("=");
    if (separator >= 0) {
      pushArgValue(values, body.slice(0, separator), body.slice(separator + 1));
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      pushArgValue(values, body, next);
      i += 1;
      continue;
    }

    flags.add(body);
  }

  return { positionals, values, flags };
}

export function getSingleArg(args: ParsedCliArgs, key: string): string | undefined {
  const values = args.values.get(key);
  return values && values.length > 0 ? values[values.length - 1] : undefined;
}

/** Repeated and comma-separated values, trimmed, empties dropped. */
export function getListArg(args: ParsedCliArgs, key: string): string[] {
  return (args.values.get(key) ?? [])
    .flatMap((entry) => entry.split(","))
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function parseFormat(value: string | undefined): OutputFormat {
  if (!value) {
    return "text";
  }
  if (value === "text" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

export function createAnalyzerConfig(input: AnalyzerConfigInput): AnalyzerConfig {
  const rootDir = path.resolve(process.cwd(), input.root ?? ".");
  const includeGlobs = input.include && input.include.length > 0 ? input.include : DEFAULT_INCLUDE_GLOBS;
  const excludeGlobs = [...DEFAULT_EXCLUDE_GLOBS, ...(input.exclude ?? [])];

  const severityOverrides = parseSeverityOverrides(input.severity ?? []);
  for (const ruleId of input.disable ?? []) {
    severityOverrides.set(ruleId, "off");
  }

  return {
    rootDir,
    includeGlobs,
    excludeGlobs,
    format: input.format ?? "text",
    profile: resolveProfile(input.profile),
    severityOverrides,
    languageVersion: input.languageVersion === undefined ? undefined : parseLanguageVersion(input.languageVersion),
    analyzeGeneratedCode: input.includeGenerated ?? false,
  };
}

/** `FL0021=warning` entries; the level may also be `off`. */
export function parseSeverityOverrides(entries: string[]): Map<string, SeverityOverride> {
  const overrides = new Map<string, SeverityOverride>();
  for (const entry of entries) {
    const [ruleId, level] = entry.split("=", 2).map((part) => part.trim());
    if (!ruleId || !level) {
      throw new Error(`Invalid severity override: ${entry} (expected RULE=level)`);
    }
    if (level !== "info" && level !== "warning" && level !== "error" && level !== "off") {
      throw new Error(`Unsupported severity for ${ruleId}: ${level}`);
    }
    overrides.set(ruleId, level);
  }
  return overrides;
}

export function parseLanguageVersion(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new Error(`Invalid language version: ${value}`);
  }
  return parsed;
}

export function isFileInScope(config: AnalyzerConfig, filePath: string): boolean {
  const absoluteFilePath = path.resolve(filePath);
  if (!isDescendantPath(config.rootDir, absoluteFilePath)) {
    return false;
  }

  const relativePath = toPosixPath(path.relative(config.rootDir, absoluteFilePath));
  const included = config.includeGlobs.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
  if (!included) {
    return false;
  }
  return !config.excludeGlobs.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}

export function isGeneratedSource(sourcePath: string, text: string): boolean {
  const fileName = path.posix.basename(toPosixPath(sourcePath));
  if (GENERATED_SOURCE_GLOBS.some((pattern) => minimatch(fileName, pattern, { dot: true, nocase: true }))) {
    return true;
  }
  const header = text.split("\n", GENERATED_HEADER_LINES).join("\n");
  return GENERATED_HEADER_PATTERN.test(header);
}

export function toPosixPath(value: string): string {
  return value.replace(/\\/g, "/");
}

export function toDisplayPath(filePath: string): string {
  const absoluteFilePath = path.resolve(filePath);
  const relative = path.relative(process.cwd(), absoluteFilePath);
  const display = relative.length > 0 && !relative.startsWith("..") ? relative : absoluteFilePath;
  return toPosixPath(display);
}

function pushArgValue(store: Map<string, string[]>, key: string, value: string): void {
  const existing = store.get(key);
  if (existing) {
    existing.push(value);
    return;
  }
  store.set(key, [value]);
}

function isDescendantPath(parentPath: string, childPath: string): boolean {
  const relative = path.relative(path.resolve(parentPath), path.resolve(childPath));
  return relative.length === 0 || (!relative.startsWith("..") && !path.isAbsolute(relative));
}
