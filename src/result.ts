// Check result aggregation and its derived views
// Pure projections, no I/O.

import type { CheckResult, Diagnostic, DiagnosticRecord } from "./model.js";

export const CSV_HEADER = ["spdx_id", "parent_id", "element_type", "message"] as const;

export function parseFailure(parseErrors: readonly string[]): CheckResult {
  return Object.freeze({
    diagnostics: Object.freeze([]),
    parseErrors: Object.freeze([...parseErrors]),
  });
}

/**
 * Success-path result. Specification diagnostics always come before
 * completeness diagnostics.
 */
export function checked(
  specificationDiagnostics: readonly Diagnostic[],
  completenessDiagnostics: readonly Diagnostic[]
): CheckResult {
  return Object.freeze({
    diagnostics: Object.freeze(
      [...specificationDiagnostics, ...completenessDiagnostics].map((d) => Object.freeze({ ...d }))
    ),
    parseErrors: Object.freeze([]),
  });
}

/** True when there is anything to report: parse errors or diagnostics. */
export function hasFindings(result: CheckResult): boolean {
  return result.diagnostics.length > 0 || result.parseErrors.length > 0;
}

export function toRecord(diagnostic: Diagnostic): DiagnosticRecord {
  return {
    spdx_id: diagnostic.spdxId ?? "",
    parent_id: diagnostic.parentId ?? "",
    element_type: diagnostic.elementType,
    message: diagnostic.message,
  };
}

export function toRecords(result: CheckResult): DiagnosticRecord[] {
  return result.diagnostics.map(toRecord);
}

/** Header row plus one row per diagnostic; newlines are stripped from messages. */
export function toCsvRows(result: CheckResult): string[][] {
  return [
    [...CSV_HEADER],
    ...toRecords(result).map((r) => [
      r.spdx_id,
      r.parent_id,
      r.element_type,
      r.message.replace(/[\r\n]/g, ""),
    ]),
  ];
}
