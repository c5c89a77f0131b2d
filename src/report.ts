// Report output for check results: console text, results.json and per-file CSV

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { hasFindings, toCsvRows, toRecords } from "./result.js";
import type { CheckResult, DiagnosticRecord } from "./model.js";

export const JSON_REPORT_FILENAME = "results.json";

export interface FlattenedResult {
  errors: string[];
  validator_results: DiagnosticRecord[];
}

export function flattenResult(result: CheckResult): FlattenedResult {
  return {
    errors: [...result.parseErrors],
    validator_results: toRecords(result),
  };
}

export function flattenResults(
  results: ReadonlyMap<string, CheckResult>
): Record<string, FlattenedResult> {
  const out: Record<string, FlattenedResult> = {};
  for (const [fileName, result] of results) {
    out[fileName] = flattenResult(result);
  }
  return out;
}

// --- Console ---

export function formatConsoleReport(fileName: string, result: CheckResult): string {
  if (!hasFindings(result)) {
    return `\n${fileName} is compliant.\n`;
  }

  if (result.parseErrors.length > 0) {
    const lines = [
      "",
      `${fileName} is not compliant, as it could not be parsed.`,
      "The following errors were found:",
      "",
    ];
    for (const error of result.parseErrors) {
      lines.push(`* ${error}`, "");
    }
    return lines.join("\n");
  }

  const lines = [
    "",
    `${fileName} successfully parsed, but was not compliant with validation standards.`,
    "The following validation issues were found:",
    "",
  ];
  for (const record of toRecords(result)) {
    lines.push(
      `* Message: ${record.message}`,
      `\ttype: ${record.element_type}`,
      `\tspdx_id: ${record.spdx_id || "None"}, parent id: ${record.parent_id}`,
      ""
    );
  }
  return lines.join("\n");
}

// --- CSV ---

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Serialize rows with RFC 4180 quoting and CRLF line endings. */
export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(csvField).join(",") + "\r\n").join("");
}

export function csvReportFileName(fileName: string): string {
  return `${fileName}_exceptions.csv`;
}

// --- Writers ---

/**
 * Write `<file>_exceptions.csv` for every result with findings.
 * Returns the paths written.
 */
export function writeCsvReports(
  results: ReadonlyMap<string, CheckResult>,
  outputDir: string
): string[] {
  const written: string[] = [];
  for (const [fileName, result] of results) {
    if (!hasFindings(result)) continue;
    const path = join(outputDir, csvReportFileName(fileName));
    writeFileSync(path, toCsv(toCsvRows(result)), "utf-8");
    written.push(path);
  }
  return written;
}

export function writeJsonReport(
  results: ReadonlyMap<string, CheckResult>,
  outputDir: string
): string {
  const path = join(outputDir, JSON_REPORT_FILENAME);
  writeFileSync(path, JSON.stringify(flattenResults(results), null, 4) + "\n", "utf-8");
  return path;
}
