#!/usr/bin/env node

import { runAudit } from "../core/analyzer";
import { parseCliArgs } from "../core/config";
import { renderAuditText, toSerializableAuditReport } from "../core/reporter";
import { configFromArgs, loggerFromArgs } from "./options";

function main(): void {
  try {
    const args = parseCliArgs(process.argv.slice(2));
    const config = configFromArgs(args);

    const report = runAudit(config, { logger: loggerFromArgs(args) });
    if (config.format === "json") {
      process.stdout.write(`${JSON.stringify(toSerializableAuditReport(report), null, 2)}\n`);
    } else {
      process.stdout.write(`${renderAuditText(report)}\n`);
    }

    process.exitCode = report.ok ? 0 : 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`rulecheck-audit error: ${message}\n`);
    process.exitCode = 2;
  }
}

main();
