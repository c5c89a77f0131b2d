// Directory runner: checks every SPDX document directly inside a directory

import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { checkSbom } from "./check.js";
import { formatForPath } from "./parser.js";
import { parseFailure } from "./result.js";
import type { CheckResult } from "./model.js";

export const SPDX_EXTENSIONS: readonly string[] = Object.freeze([".spdx.json", ".spdx.yaml", ".spdx.yml"]);

export interface RunOptions {
  /** Receives one line per file parsed or skipped. */
  log?: (line: string) => void;
}

export function isSpdxFileName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return SPDX_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export function unrecognizedFileMessage(filePath: string): string {
  return (
    `File ${filePath} not recognized. Please ensure your files are SPDX JSON or YAML ` +
    `format and end with '.spdx.json', '.spdx.yaml' or '.spdx.yml'.`
  );
}

/**
 * Check each regular file in `dir` (not recursive), in name order.
 * Files without an SPDX extension get a parse-failure result.
 */
export function runDirectory(
  dir: string,
  options: RunOptions = {}
): Map<string, CheckResult> {
  const log = options.log ?? (() => {});
  const entries = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const results = new Map<string, CheckResult>();
  for (const fileName of entries) {
    const filePath = join(dir, fileName);
    if (!isSpdxFileName(fileName)) {
      const message = unrecognizedFileMessage(filePath);
      log(`warning: ${message}`);
      results.set(fileName, parseFailure([message]));
      continue;
    }
    log(`Parsing ${filePath}`);
    const text = readFileSync(filePath, "utf-8");
    results.set(fileName, checkSbom(text, { format: formatForPath(fileName) }));
  }
  return results;
}
