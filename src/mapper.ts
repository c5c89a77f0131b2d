// Check results and rule catalog to MCP tool and resource shapes. Pure functions, no I/O.

import { COMPLETENESS_STAGES, type CompletenessStage } from "./completeness.js";
import { flattenResult } from "./report.js";
import { hasFindings } from "./result.js";
import type { CheckResult } from "./model.js";

export const RULES_URI = "sbom-check://rules";
export const CHECK_SBOM_TOOL_NAME = "check_sbom";

// Plain objects matching the MCP protocol schemas. Kept as type aliases:
// the SDK's result types are open-ended records.

export type McpToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, object>;
    required: string[];
  };
};

export type McpTextToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export type McpResourceMeta = {
  uri: string;
  name: string;
  title: string;
  description: string;
  mimeType: string;
};

export const CHECK_SBOM_TOOL: McpToolDefinition = {
  name: CHECK_SBOM_TOOL_NAME,
  description:
    "Check an SPDX SBOM document (JSON or YAML text) against the SPDX " +
    "specification and the completeness rules (suppliers, copyright text, " +
    "license evidence). Returns parse errors and diagnostics as JSON.",
  inputSchema: {
    type: "object",
    properties: {
      document: {
        type: "string",
        description: "The full SPDX document text",
      },
      format: {
        type: "string",
        enum: ["json", "yaml"],
        description: "Serialization of the document (default: json)",
      },
    },
    required: ["document"],
  },
};

export function resultToToolResult(result: CheckResult): McpTextToolResult {
  const payload = { has_findings: hasFindings(result), ...flattenResult(result) };
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}

export function errorToolResult(message: string): McpTextToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

// --- Rule catalog ---

export function buildRulesResource(): McpResourceMeta {
  return {
    uri: RULES_URI,
    name: "completeness-rules",
    title: "SBOM completeness rules",
    description:
      "Ordered completeness rule stages. A halting stage ends evaluation " +
      "when its precondition fails.",
    mimeType: "application/json",
  };
}

export function rulesToJson(
  stages: readonly CompletenessStage[] = COMPLETENESS_STAGES
): string {
  return JSON.stringify(
    stages.map((s, i) => ({ order: i + 1, id: s.id, description: s.description })),
    null,
    2
  );
}
