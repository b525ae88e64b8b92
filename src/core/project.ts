import fs from "node:fs";
import path from "node:path";
import { isFileInScope } from "./config";
import { parseSnapshot, type LoadedDocument } from "./snapshot";
import type { AnalyzerConfig } from "./types";

export interface LoadedProject {
  documents: LoadedDocument[];
}

export function loadProject(config: AnalyzerConfig): LoadedProject {
  const snapshotPaths = listFiles(config.rootDir)
    .filter((filePath) => isFileInScope(config, filePath))
    .sort((left, right) => left.localeCompare(right));

  if (snapshotPaths.length === 0) {
    throw new Error(`No syntax snapshots found in scope for root: ${config.rootDir}`);
  }

  const documents = snapshotPaths.map((snapshotPath) =>
    parseSnapshot(readJson(snapshotPath), snapshotPath, { languageVersion: config.languageVersion }),
  );
  return { documents };
}

function readJson(filePath: string): unknown {
  const text = fs.readFileSync(filePath, "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid snapshot ${filePath}: ${message}`);
  }
}

function listFiles(rootDir: string): string[] {
  if (!fs.existsSync(rootDir)) {
    throw new Error(`Root directory does not exist: ${rootDir}`);
  }

  const files: string[] = [];
  const pending = [rootDir];
  while (pending.length > 0) {
    const directory = pending.pop();
    if (directory === undefined) {
      break;
    }
    for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== "node_modules") {
          pending.push(entryPath);
        }
      } else if (entry.isFile()) {
        files.push(entryPath);
      }
    }
  }
  return files;
}
