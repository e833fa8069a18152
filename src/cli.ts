/**
 * discern command line
 *
 * Argument parsing and the two run modes: infer from inline examples, or
 * check a case file.
 */

import { resolve } from "node:path";
import { loadConfig, type Config, type OutputFormat } from "./config.js";
import { loadCases, runCases, summarize, type CaseReport } from "./cases.js";
import { synthesizePattern } from "./synthesis/index.js";

export interface CLIOptions {
  valid: string[];
  invalid: string[];
  casesFile: string;
  config: string;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

/** Where output goes; swapped out in tests */
export interface CLIOutput {
  out: (msg: string) => void;
  err: (msg: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_NOT_FOUND = 2;

export const USAGE = `
Usage: discern [options]

Infers one anchored pattern that fully matches every valid example and
none of the invalid ones.

Options:
  --valid <list>     Comma-separated strings the pattern must match
  --invalid <list>   Comma-separated strings the pattern must reject
  --cases <path>     Run a JSON case file and compare with expected patterns
  --config <path>    Path to config file (default: ./config.json)
  --json             Print JSON instead of text
  --verbose          Trace every strategy attempt
  --help             Show this help message

With neither --valid/--invalid nor --cases, the case file named in the
config (default: cases/scrolls.json) is run.

Examples:
  discern --valid abc,def --invalid 123,456
  discern --cases ./cases/scrolls.json --verbose
`;

function splitList(value: string | undefined): string[] {
  if (value === undefined || value === "") return [];
  return value.split(",");
}

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    valid: [],
    invalid: [],
    casesFile: "",
    config: "",
    json: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--valid") {
      options.valid = splitList(args[++i]);
    } else if (arg === "--invalid") {
      options.invalid = splitList(args[++i]);
    } else if (arg === "--cases") {
      options.casesFile = args[++i] ?? "";
    } else if (arg === "--config") {
      options.config = args[++i] ?? "";
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function formatReport(report: CaseReport): string {
  const lines = [
    `${report.name}: ${report.passed ? "PASSED" : "FAILED"}`,
    `   - Valid: ${JSON.stringify(report.valid)}`,
    `   - Invalid: ${JSON.stringify(report.invalid)}`,
    `   - Generated: ${report.generated}`,
  ];
  if (!report.passed) {
    lines.push(`   - Expected: ${report.expected.join(" | ")}`);
  }
  return lines.join("\n");
}

function inferMode(options: CLIOptions, format: OutputFormat, verbose: boolean, io: CLIOutput): number {
  if (options.valid.length === 0 || options.invalid.length === 0) {
    io.err("Error: --valid and --invalid must both be given.");
    return EXIT_ERROR;
  }

  const result = synthesizePattern(
    { valid: options.valid, invalid: options.invalid },
    { verbose, log: io.err }
  );

  if (format === "json") {
    io.out(JSON.stringify(result, null, 2));
  } else {
    io.out(result.pattern);
  }
  return result.success ? EXIT_OK : EXIT_NOT_FOUND;
}

async function casesMode(path: string, format: OutputFormat, verbose: boolean, io: CLIOutput): Promise<number> {
  const cases = await loadCases(resolve(path));
  const reports = runCases(cases, { verbose, log: io.err });
  const summary = summarize(reports);

  if (format === "json") {
    io.out(JSON.stringify({ reports, summary }, null, 2));
  } else {
    for (const report of reports) {
      io.out(formatReport(report));
    }
    io.out(`Summary: ${summary.passed}/${summary.total} cases passed`);
  }
  return summary.allPassed ? EXIT_OK : EXIT_ERROR;
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCLI(args: readonly string[], io: CLIOutput): Promise<number> {
  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    io.err("Use --help for more information.");
    return EXIT_ERROR;
  }

  if (options.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  let config: Config;
  try {
    config = await loadConfig(options.config || undefined);
  } catch (err) {
    io.err(`Error loading config: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_ERROR;
  }

  const format: OutputFormat = options.json ? "json" : config.output.format;
  const verbose = options.verbose || config.output.verbose;

  try {
    if (options.valid.length > 0 || options.invalid.length > 0) {
      return inferMode(options, format, verbose, io);
    }
    return await casesMode(options.casesFile || config.cases.path, format, verbose, io);
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_ERROR;
  }
}
