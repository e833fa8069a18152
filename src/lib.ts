/**
 * discern Library Entry Point
 *
 * This module exports the public API for programmatic use.
 */

// Inference
export * from "./synthesis/index.js";

// Case files
export {
  loadCases,
  parseCases,
  runCase,
  runCases,
  summarize,
  type PatternCase,
  type CaseReport,
  type CaseSummary,
} from "./cases.js";

// CLI
export { runCLI, parseArgs, type CLIOptions, type CLIOutput } from "./cli.js";

// MCP Server
export { createMCPServer, type MCPServerOptions, type MCPServerInstance, type MCPTool } from "./mcp-server.js";

// Config
export { loadConfig, DEFAULT_CONFIG, type Config } from "./config.js";
