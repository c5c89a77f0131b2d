#!/usr/bin/env node
// sbom-check MCP server over stdio
// Usage: sbom-check-mcp [--quiet]

import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createSbomCheckServer } from "../server.js";

async function main(): Promise<void> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      quiet: { type: "boolean", default: false },
    },
    strict: false,
  });

  const log = values["quiet"]
    ? () => {}
    : (line: string) => {
        process.stderr.write(`[sbom-check-mcp] ${line}\n`);
      };

  const { server, rulesUri } = createSbomCheckServer({ log });
  await server.connect(new StdioServerTransport());
  log(`ready on stdio; rule catalog at ${rulesUri}`);
}

main().catch((err) => {
  process.stderr.write(
    `Fatal: ${err instanceof Error ? err.message : String(err)}\n`
  );
  process.exit(1);
});
