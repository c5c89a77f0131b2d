// sbom-check MCP server
// Exposes the SBOM check as a tool and the completeness rule catalog as a resource.

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { checkSbom } from "./check.js";
import {
  CHECK_SBOM_TOOL,
  CHECK_SBOM_TOOL_NAME,
  RULES_URI,
  buildRulesResource,
  errorToolResult,
  resultToToolResult,
  rulesToJson,
} from "./mapper.js";
import { hasFindings } from "./result.js";
import type { DocumentFormat } from "./parser.js";

export interface SbomCheckServerOptions {
  version?: string;
  /** Receives one line per tool call; defaults to silent. */
  log?: (line: string) => void;
}

export interface SbomCheckMcpServer {
  server: Server;
  rulesUri: string;
}

function toFormat(value: unknown): DocumentFormat | undefined | null {
  if (value === undefined) return undefined;
  return value === "json" || value === "yaml" ? value : null;
}

/**
 * Create an MCP Server offering the `check_sbom` tool and the rule catalog.
 */
export function createSbomCheckServer(
  options: SbomCheckServerOptions = {}
): SbomCheckMcpServer {
  const { version = "0.1.0", log = () => {} } = options;

  const server = new Server(
    { name: "sbom-check", version },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  // --- tools ---

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [CHECK_SBOM_TOOL],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    if (name !== CHECK_SBOM_TOOL_NAME) {
      throw new Error(`Unknown tool: ${name}`);
    }

    const document = args["document"];
    if (typeof document !== "string") {
      return errorToolResult("Argument 'document' must be a string");
    }
    const format = toFormat(args["format"]);
    if (format === null) {
      return errorToolResult("Argument 'format' must be 'json' or 'yaml'");
    }

    const result = checkSbom(document, { format });
    log(
      `check_sbom: ${result.parseErrors.length} parse error(s), ` +
        `${result.diagnostics.length} diagnostic(s)` +
        (hasFindings(result) ? "" : " (compliant)")
    );
    return resultToToolResult(result);
  });

  // --- resources ---

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [buildRulesResource()],
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    if (uri !== RULES_URI) {
      throw new Error(`Unknown resource URI: ${uri}`);
    }
    return {
      contents: [{ uri, mimeType: "application/json", text: rulesToJson() }],
    };
  });

  return { server, rulesUri: RULES_URI };
}
