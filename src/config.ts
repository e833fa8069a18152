import { readFile } from "fs/promises";
import { resolve } from "path";
import { fileURLToPath } from "url";

/**
 * Configuration file types
 *
 * Inference itself has no knobs: the length bound and strategy order are
 * fixed. The config file only shapes how the CLI reports.
 */

export type OutputFormat = "text" | "json";

export interface OutputConfig {
  format: OutputFormat;
  verbose: boolean;
}

export interface CasesConfig {
  /** Case file run when the CLI gets no examples of its own (defaults to the bundled scrolls) */
  path: string;
}

export interface Config {
  output: OutputConfig;
  cases: CasesConfig;
}

export const DEFAULT_CONFIG: Config = {
  output: {
    format: "text",
    verbose: false,
  },
  cases: {
    path: fileURLToPath(new URL("../cases/scrolls.json", import.meta.url)),
  },
};

export async function loadConfig(configPath?: string): Promise<Config> {
  const path = configPath || resolve(process.cwd(), "config.json");

  try {
    const content = await readFile(path, "utf-8");
    const userConfig = JSON.parse(content) as Partial<Config>;

    // Deep merge with defaults
    const config: Config = {
      output: { ...DEFAULT_CONFIG.output, ...userConfig.output },
      cases: { ...DEFAULT_CONFIG.cases, ...userConfig.cases },
    };

    if (config.output.format !== "text" && config.output.format !== "json") {
      throw new Error(`Invalid output format '${String(config.output.format)}' in ${path}`);
    }
    return config;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      // Config file not found, use defaults
      return DEFAULT_CONFIG;
    }
    throw error;
  }
}
