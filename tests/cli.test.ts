import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import { parseArgs, runCLI, USAGE, type CLIOutput } from "../src/cli.js";

const SCROLLS = fileURLToPath(new URL("../cases/scrolls.json", import.meta.url));

function captureOutput(): CLIOutput & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (msg) => stdout.push(msg),
    err: (msg) => stderr.push(msg),
  };
}

describe("CLI", () => {
  describe("parseArgs", () => {
    it("should split comma-separated example lists", () => {
      const options = parseArgs(["--valid", "a,b", "--invalid", "c", "--json"]);
      expect(options.valid).toEqual(["a", "b"]);
      expect(options.invalid).toEqual(["c"]);
      expect(options.json).toBe(true);
      expect(options.verbose).toBe(false);
    });

    it("should read the cases and config paths", () => {
      const options = parseArgs(["--cases", "x.json", "--config", "c.json", "--verbose"]);
      expect(options.casesFile).toBe("x.json");
      expect(options.config).toBe("c.json");
      expect(options.verbose).toBe(true);
    });

    it("should reject unknown arguments", () => {
      expect(() => parseArgs(["--bogus"])).toThrow("Unknown argument: --bogus");
    });
  });

  describe("runCLI", () => {
    let testDir: string;
    let missingConfig: string;

    beforeEach(async () => {
      testDir = await mkdtemp(join(tmpdir(), "discern-cli-"));
      missingConfig = join(testDir, "none.json");
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it("should print the inferred pattern", async () => {
      const io = captureOutput();
      const code = await runCLI(["--valid", "abc,def", "--invalid", "123,456", "--config", missingConfig], io);

      expect(code).toBe(0);
      expect(io.stdout).toEqual(["^\\D+$"]);
      expect(io.stderr).toEqual([]);
    });

    it("should print the sentinel and exit 2 when nothing separates the sets", async () => {
      const io = captureOutput();
      const code = await runCLI(["--valid", "abc", "--invalid", "abc", "--config", missingConfig], io);

      expect(code).toBe(2);
      expect(io.stdout).toEqual(["pattern not found"]);
    });

    it("should print the traced result as JSON", async () => {
      const io = captureOutput();
      await runCLI(["--valid", "abc,def", "--invalid", "123", "--json", "--config", missingConfig], io);

      const result = JSON.parse(io.stdout[0]);
      expect(result.success).toBe(true);
      expect(result.pattern).toBe("^\\D+$");
      expect(result.strategy).toBe("char-class");
    });

    it("should require both example lists", async () => {
      const io = captureOutput();
      const code = await runCLI(["--valid", "abc", "--config", missingConfig], io);

      expect(code).toBe(1);
      expect(io.stderr).toEqual(["Error: --valid and --invalid must both be given."]);
    });

    it("should report unknown arguments", async () => {
      const io = captureOutput();
      const code = await runCLI(["--bogus"], io);

      expect(code).toBe(1);
      expect(io.stderr[0]).toBe("Error: Unknown argument: --bogus");
    });

    it("should print usage", async () => {
      const io = captureOutput();
      const code = await runCLI(["--help"], io);

      expect(code).toBe(0);
      expect(io.stdout).toEqual([USAGE]);
    });

    it("should run a case file and summarize", async () => {
      const io = captureOutput();
      const code = await runCLI(["--cases", SCROLLS, "--config", missingConfig], io);

      expect(code).toBe(0);
      expect(io.stdout[0]).toBe(
        [
          "Scroll 1: PASSED",
          '   - Valid: ["abc","def"]',
          '   - Invalid: ["123","456"]',
          "   - Generated: ^\\D+$",
        ].join("\n")
      );
      expect(io.stdout[io.stdout.length - 1]).toBe("Summary: 5/5 cases passed");
    });

    it("should run the bundled scrolls when given no examples", async () => {
      const io = captureOutput();
      const code = await runCLI(["--config", missingConfig], io);

      expect(code).toBe(0);
      expect(io.stdout[io.stdout.length - 1]).toBe("Summary: 5/5 cases passed");
    });

    it("should show the expected pattern for a failing case", async () => {
      const casesFile = join(testDir, "cases.json");
      await writeFile(
        casesFile,
        JSON.stringify({ cases: [{ name: "Odd one", valid: ["abc", "def"], invalid: ["123"], expected: "^x$" }] })
      );

      const io = captureOutput();
      const code = await runCLI(["--cases", casesFile, "--config", missingConfig], io);

      expect(code).toBe(1);
      expect(io.stdout).toEqual([
        [
          "Odd one: FAILED",
          '   - Valid: ["abc","def"]',
          '   - Invalid: ["123"]',
          "   - Generated: ^\\D+$",
          "   - Expected: ^x$",
        ].join("\n"),
        "Summary: 0/1 cases passed",
      ]);
    });

    it("should report a missing case file", async () => {
      const io = captureOutput();
      const code = await runCLI(["--cases", join(testDir, "nope.json"), "--config", missingConfig], io);

      expect(code).toBe(1);
      expect(io.stderr[0]).toMatch(/^Error: ENOENT/);
    });

    it("should take verbosity and format from the config file", async () => {
      const configFile = join(testDir, "config.json");
      await writeFile(configFile, JSON.stringify({ output: { verbose: true } }));

      const io = captureOutput();
      await runCLI(["--valid", "abc,def", "--invalid", "123,456", "--config", configFile], io);

      expect(io.stderr).toEqual(["[Inference] char-class: ^\\D+$ (accepted)"]);
      expect(io.stdout).toEqual(["^\\D+$"]);
    });

    it("should report a broken config file", async () => {
      const configFile = join(testDir, "config.json");
      await writeFile(configFile, JSON.stringify({ output: { format: "yaml" } }));

      const io = captureOutput();
      const code = await runCLI(["--valid", "a", "--invalid", "1", "--config", configFile], io);

      expect(code).toBe(1);
      expect(io.stderr[0]).toBe(`Error loading config: Invalid output format 'yaml' in ${configFile}`);
    });
  });
});
