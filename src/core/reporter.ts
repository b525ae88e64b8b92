import { toDisplayPath } from "./config";
import type { AuditReport, FixReport } from "./types";

export function toSerializableAuditReport(report: AuditReport): AuditReport {
  return {
    ok: report.ok,
    summary: { ...report.summary },
    findings: report.findings.map((finding) => ({
      ...finding,
      file: toDisplayPath(finding.file),
    })),
    faults: report.faults.map((fault) => ({
      ...fault,
      file: toDisplayPath(fault.file),
    })),
  };
}

export function renderAuditText(report: AuditReport): string {
  const serializable = toSerializableAuditReport(report);
  const { summary } = serializable;
  const lines: string[] = [
    `Audit ${serializable.ok ? "PASS" : "FAIL"} (${plural(summary.findings, "finding")}, ${summary.fixable} fixable, ${plural(summary.faults, "fault")})`,
  ];

  for (const finding of serializable.findings) {
    lines.push(
      `- ${finding.rule} ${finding.severity} ${finding.file}:${finding.line}:${finding.column} ${finding.message}${finding.fixable ? " [fixable]" : ""}`,
    );
  }

  for (const fault of serializable.faults) {
    const location = fault.line === undefined ? fault.file : `${fault.file}:${fault.line}`;
    const node = fault.nodeKind ? ` at ${fault.nodeKind}` : "";
    lines.push(`! fault ${fault.rule} ${location}${node}: ${fault.message}`);
  }

  return lines.join("\n");
}

export function toSerializableFixReport(report: FixReport): FixReport {
  return {
    ...report,
    summary: { ...report.summary },
    files: report.files.map((file) => ({
      ...file,
      file: toDisplayPath(file.file),
    })),
  };
}

export interface FixTextOptions {
  /** Appends every rewritten source after its summary. */
  includeOutput?: boolean;
}

export function renderFixText(report: FixReport, options: FixTextOptions = {}): string {
  const serializable = toSerializableFixReport(report);
  const { summary } = serializable;
  const lines: string[] = [
    `Fix (${plural(summary.files, "file")}, ${summary.applied} applied, ${summary.skipped} skipped)`,
  ];

  for (const file of serializable.files) {
    lines.push(`- ${file.file}`);
    for (const applied of file.applied) {
      lines.push(`  applied ${applied}`);
    }
    for (const skipped of file.skipped) {
      lines.push(`  skipped ${skipped}`);
    }
    if (options.includeOutput) {
      lines.push(`--- ${file.file}`, file.output);
    }
  }

  return lines.join("\n");
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
