import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { copyFileSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { runCli, USAGE, type CliIo } from "../src/cli.js";

const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), "fixtures");

function captureIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

describe("runCli", () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "sbom-check-cli-"));
    inputDir = join(root, "in");
    outputDir = join(root, "out");
    mkdirSync(inputDir);
    mkdirSync(outputDir);
    for (const name of ["complete.spdx.json", "incomplete.spdx.json"]) {
      copyFileSync(join(FIXTURES_DIR, name), join(inputDir, name));
    }
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("prints usage with --help", () => {
    const io = captureIo();
    expect(runCli(["--help"], io)).toBe(0);
    expect(io.out).toEqual([USAGE]);
  });

  it("exits 2 without a directory", () => {
    const io = captureIo();
    expect(runCli([], io)).toBe(2);
    expect(io.err.join("")).toBe(`Error: missing <spdx-dir> argument\n\n${USAGE}`);
  });

  it("exits 2 on unknown options", () => {
    const io = captureIo();
    expect(runCli([inputDir, "--bogus"], io)).toBe(2);
    expect(io.err.join("").startsWith("Error: ")).toBe(true);
  });

  it("exits 2 when the directory does not exist", () => {
    const io = captureIo();
    const missing = join(root, "missing");
    expect(runCli([missing], io)).toBe(2);
    expect(io.err.join("")).toBe(`Error: directory not found: ${missing}\n\n${USAGE}`);
  });

  it("writes a CSV report for each document with findings", () => {
    const io = captureIo();
    expect(runCli([inputDir, "--output-dir", outputDir, "--quiet"], io)).toBe(0);
    expect(io.err).toEqual([]);
    expect(existsSync(join(outputDir, "complete.spdx.json_exceptions.csv"))).toBe(false);
    expect(existsSync(join(outputDir, "results.json"))).toBe(false);

    const csv = readFileSync(join(outputDir, "incomplete.spdx.json_exceptions.csv"), "utf-8");
    expect(csv).toBe(
      [
        "spdx_id,parent_id,element_type,message",
        ",,CREATION_INFO,*** completeness exception ***The Document has no name.",
        ",,CREATION_INFO,*** completeness exception ***The Document does not have a license list version.",
        "SPDXRef-Package-only,,PACKAGE,*** completeness exception ***The files have not been analyzed for this package.",
        ",,DOCUMENT,*** completeness exception ***The Document contains no files.",
        "",
      ].join("\r\n")
    );
  });

  it("writes results.json with --print-json", () => {
    const io = captureIo();
    expect(runCli([inputDir, "--output-dir", outputDir, "--print-json", "--quiet"], io)).toBe(0);
    const report = JSON.parse(readFileSync(join(outputDir, "results.json"), "utf-8"));
    expect(Object.keys(report)).toEqual(["complete.spdx.json", "incomplete.spdx.json"]);
    expect(report["complete.spdx.json"]).toEqual({ errors: [], validator_results: [] });
    expect(report["incomplete.spdx.json"].validator_results).toHaveLength(4);
  });

  it("prints the console report with --print-console", () => {
    const io = captureIo();
    runCli([inputDir, "--output-dir", outputDir, "--print-console", "--quiet"], io);
    expect(io.out).toHaveLength(2);
    expect(io.out[0]).toBe("\ncomplete.spdx.json is compliant.\n\n");
    expect(io.out[1].startsWith(
      "\nincomplete.spdx.json successfully parsed, but was not compliant with validation standards.\n"
    )).toBe(true);
  });

  it("logs progress to stderr unless --quiet", () => {
    const io = captureIo();
    runCli([inputDir, "--output-dir", outputDir], io);
    expect(io.err).toEqual([
      `[sbom-check] Parsing ${join(inputDir, "complete.spdx.json")}\n`,
      `[sbom-check] Parsing ${join(inputDir, "incomplete.spdx.json")}\n`,
      `[sbom-check] wrote ${join(outputDir, "incomplete.spdx.json_exceptions.csv")}\n`,
    ]);
  });

  it("exits 1 with --fail-on-findings when a document has findings", () => {
    const io = captureIo();
    expect(runCli([inputDir, "--output-dir", outputDir, "--fail-on-findings", "--quiet"], io)).toBe(1);
  });
});
