#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import { runFix } from "../core/analyzer";
import { getListArg, getSingleArg, parseCliArgs } from "../core/config";
import { renderFixText, toSerializableFixReport } from "../core/reporter";
import type { FixReport } from "../core/types";
import { configFromArgs, loggerFromArgs } from "./options";

function main(): void {
  try {
    const args = parseCliArgs(process.argv.slice(2));
    const config = configFromArgs(args);
    const outDir = getSingleArg(args, "out");

    const report = runFix(config, { logger: loggerFromArgs(args), rules: getListArg(args, "rules") });
    if (outDir) {
      writeOutputs(report, path.resolve(outDir));
    }

    if (config.format === "json") {
      process.stdout.write(`${JSON.stringify(toSerializableFixReport(report), null, 2)}\n`);
    } else {
      process.stdout.write(`${renderFixText(report, { includeOutput: !outDir })}\n`);
    }

    process.exitCode = report.ok ? 0 : 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`rulecheck-fix error: ${message}\n`);
    process.exitCode = 2;
  }
}

function writeOutputs(report: FixReport, outDir: string): void {
  for (const file of report.files) {
    const target = path.resolve(outDir, file.file);
    const relative = path.relative(outDir, target);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Refusing to write outside ${outDir}: ${file.file}`);
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, file.output, "utf8");
  }
}

main();
