// Check entry point: parse, validate against SPDX 2.x, then run the
// completeness rules. A document that fails to parse gets no diagnostics.

import { checkCompleteness } from "./completeness.js";
import { deserialize, parseDict, SpdxParseError, type DocumentFormat } from "./parser.js";
import { checked, parseFailure } from "./result.js";
import { validateDocument } from "./validator.js";
import type { CheckResult, SpdxDocument } from "./model.js";

export interface CheckOptions {
  format?: DocumentFormat;
}

/** Validate and completeness-check an already parsed document. */
export function checkDocument(document: SpdxDocument): CheckResult {
  return checked(validateDocument(document), checkCompleteness(document));
}

/**
 * Check serialized SPDX document text (JSON by default, or YAML).
 * Deserialization and structural failures are returned as parse errors;
 * any other error propagates.
 */
export function checkSbom(text: string, options: CheckOptions = {}): CheckResult {
  let document: SpdxDocument;
  try {
    document = parseDict(deserialize(text, options.format ?? "json"));
  } catch (err) {
    if (err instanceof SpdxParseError) return parseFailure(err.messages);
    throw err;
  }
  return checkDocument(document);
}
