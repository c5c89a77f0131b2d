// sbom-check CLI
// Usage: sbom-check <spdx-dir> [--print-console] [--print-json] [--output-dir <dir>]

import { existsSync, statSync } from "node:fs";
import { parseArgs } from "node:util";
import { formatConsoleReport, writeCsvReports, writeJsonReport } from "./report.js";
import { runDirectory } from "./runner.js";
import { hasFindings } from "./result.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const USAGE = `Usage: sbom-check <spdx-dir> [options]

Checks every *.spdx.json / *.spdx.yaml file in <spdx-dir> against the SPDX
specification and the completeness rules, and writes <file>_exceptions.csv
for each document with findings.

Options:
  --print-console       Print results to stdout
  --print-json          Also write results.json
  --output-dir <dir>    Where report files go (default: current directory)
  --fail-on-findings    Exit with code 1 when any document has findings
  --quiet               Suppress progress messages
  --help, -h            Show this help
`;

class UsageError extends Error {}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        "print-console": { type: "boolean", default: false },
        "print-json": { type: "boolean", default: false },
        "output-dir": { type: "string", default: "." },
        "fail-on-findings": { type: "boolean", default: false },
        quiet: { type: "boolean", default: false },
        help: { type: "boolean", default: false, short: "h" },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Run the CLI with the given arguments (without the node/script prefix).
 * Returns the process exit code.
 */
export function runCli(argv: string[], io: CliIo = processIo): number {
  try {
    const { values, positionals } = parseCliArgs(argv);

    if (values.help) {
      io.stdout(USAGE);
      return 0;
    }

    const spdxDir = positionals[0];
    if (!spdxDir) throw new UsageError("missing <spdx-dir> argument");
    if (!existsSync(spdxDir) || !statSync(spdxDir).isDirectory()) {
      throw new UsageError(`directory not found: ${spdxDir}`);
    }
    const outputDir = values["output-dir"] ?? ".";
    if (!existsSync(outputDir) || !statSync(outputDir).isDirectory()) {
      throw new UsageError(`output directory not found: ${outputDir}`);
    }

    const log = values.quiet
      ? () => {}
      : (line: string) => io.stderr(`[sbom-check] ${line}\n`);

    const results = runDirectory(spdxDir, { log });

    if (values["print-console"]) {
      for (const [fileName, result] of results) {
        io.stdout(formatConsoleReport(fileName, result) + "\n");
      }
    }
    if (values["print-json"]) {
      log(`wrote ${writeJsonReport(results, outputDir)}`);
    }
    for (const path of writeCsvReports(results, outputDir)) {
      log(`wrote ${path}`);
    }

    const anyFindings = [...results.values()].some(hasFindings);
    return values["fail-on-findings"] && anyFindings ? 1 : 0;
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    io.stderr(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
