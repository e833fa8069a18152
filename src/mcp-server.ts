#!/usr/bin/env node
/**
 * MCP Server for discern
 *
 * Exposes pattern inference and pattern checking as MCP tools.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { inferPattern, validatePattern } from "./synthesis/index.js";

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required: string[];
  };
}

export type MCPToolResult = CallToolResult;

export interface MCPServerOptions {
  onInfer?: (input: { valid: string[]; invalid: string[] }) => void;
}

export interface MCPServerInstance {
  name: string;
  getTools(): MCPTool[];
  callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult>;
  start(): Promise<void>;
}

const STRING_LIST = { type: "array", items: { type: "string" } };

const INFER_PATTERN_TOOL: MCPTool = {
  name: "infer_pattern",
  description:
    "Infer one anchored regular expression that fully matches every valid " +
    "example and none of the invalid ones. Returns the pattern, or " +
    "'pattern not found' when no pattern of at most 20 characters separates them.",
  inputSchema: {
    type: "object",
    properties: {
      valid: { ...STRING_LIST, description: "Strings the pattern must match" },
      invalid: { ...STRING_LIST, description: "Strings the pattern must reject" },
    },
    required: ["valid", "invalid"],
  },
};

const CHECK_PATTERN_TOOL: MCPTool = {
  name: "check_pattern",
  description:
    "Check whether a pattern, used as a full match, accepts every valid " +
    "example and rejects every invalid one.",
  inputSchema: {
    type: "object",
    properties: {
      pattern: { type: "string", description: "Regular expression to check" },
      valid: { ...STRING_LIST, description: "Strings that must match" },
      invalid: { ...STRING_LIST, description: "Strings that must not match" },
    },
    required: ["pattern", "valid", "invalid"],
  },
};

const TOOLS = [INFER_PATTERN_TOOL, CHECK_PATTERN_TOOL];

function stringList(args: Record<string, unknown>, key: string): string[] {
  const value = args[key];
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new Error(`'${key}' must be an array of strings`);
  }
  return value;
}

function text(message: string, isError = false): MCPToolResult {
  return isError
    ? { content: [{ type: "text", text: message }], isError: true }
    : { content: [{ type: "text", text: message }] };
}

/**
 * Create an MCP server instance for testing or direct use
 */
export function createMCPServer(options: MCPServerOptions = {}): MCPServerInstance {
  return {
    name: "discern",

    getTools(): MCPTool[] {
      return TOOLS;
    },

    async callTool(
      name: string,
      args: Record<string, unknown>
    ): Promise<MCPToolResult> {
      try {
        switch (name) {
          case "infer_pattern": {
            const valid = stringList(args, "valid");
            const invalid = stringList(args, "invalid");
            options.onInfer?.({ valid, invalid });
            return text(inferPattern(valid, invalid));
          }

          case "check_pattern": {
            const { pattern } = args;
            if (typeof pattern !== "string") {
              throw new Error("'pattern' must be a string");
            }
            const discriminates = validatePattern(
              pattern,
              stringList(args, "valid"),
              stringList(args, "invalid")
            );
            return text(JSON.stringify({ discriminates }));
          }

          default:
            return text(`Unknown tool: ${name}`);
        }
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : String(err);
        return text(`Error: ${errorMessage}`, true);
      }
    },

    async start(): Promise<void> {
      const server = new Server(
        { name: "discern", version: "1.0.0" },
        { capabilities: { tools: {} } }
      );

      server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: TOOLS,
      }));

      server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return this.callTool(name, args || {});
      });

      const transport = new StdioServerTransport();
      await server.connect(transport);
    },
  };
}

// Main entry point - run server when executed directly
if (process.argv[1]?.endsWith("mcp-server.ts") || process.argv[1]?.endsWith("mcp-server.js") || process.argv[1]?.endsWith("discern-mcp")) {
  const server = createMCPServer();
  server.start().catch((err) => {
    console.error("Failed to start MCP server:", err);
    process.exit(1);
  });
}
