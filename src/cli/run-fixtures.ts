#!/usr/bin/env node

import path from "node:path";
import { getSingleArg, parseCliArgs, parseFormat } from "../core/config";
import { renderFixtureText, runFixtures } from "../core/fixtures";
import { loggerFromArgs } from "./options";

function main(): void {
  try {
    const args = parseCliArgs(process.argv.slice(2));
    const fixtureRoot = path.resolve(process.cwd(), getSingleArg(args, "fixtures") ?? "fixtures");
    const format = parseFormat(getSingleArg(args, "format"));

    const results = runFixtures(fixtureRoot, { logger: loggerFromArgs(args) });
    const passed = results.filter((result) => result.ok).length;
    const failed = results.length - passed;

    if (format === "json") {
      const summary = { total: results.length, passed, failed };
      process.stdout.write(`${JSON.stringify({ ok: failed === 0, summary, results }, null, 2)}\n`);
    } else {
      process.stdout.write(`${renderFixtureText(results)}\n`);
    }

    process.exitCode = failed === 0 ? 0 : 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`run-fixtures error: ${message}\n`);
    process.exitCode = 2;
  }
}

main();
