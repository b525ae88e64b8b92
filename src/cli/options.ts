import { createAnalyzerConfig, getListArg, getSingleArg, parseFormat, type ParsedCliArgs } from "../core/config";
import { createLogger, logger, parseLogLevel, type Logger } from "../core/logger";
import type { AnalyzerConfig } from "../core/types";

/** Options both commands accept. */
export function configFromArgs(args: ParsedCliArgs): AnalyzerConfig {
  return createAnalyzerConfig({
    root: getSingleArg(args, "root"),
    include: getListArg(args, "include"),
    exclude: getListArg(args, "exclude"),
    format: parseFormat(getSingleArg(args, "format")),
    profile: getSingleArg(args, "profile"),
    disable: getListArg(args, "disable"),
    severity: getListArg(args, "severity"),
    languageVersion: getSingleArg(args, "language-version"),
    includeGenerated: args.flags.has("include-generated"),
  });
}

export function loggerFromArgs(args: ParsedCliArgs): Logger {
  const level = getSingleArg(args, "log-level");
  if (level !== undefined) {
    return createLogger({ level: parseLogLevel(level), json: process.env.NODE_ENV === "production" });
  }
  return args.flags.has("verbose") ? createLogger({ level: "debug" }) : logger;
}
