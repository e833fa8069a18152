/**
 * Labeled example cases
 *
 * A case file is a JSON document listing example sets together with the
 * pattern (or patterns) the engine is expected to infer for them.
 */

import { readFile } from "node:fs/promises";
import {
  synthesizePattern,
  type InferenceOptions,
  type StrategyName,
} from "./synthesis/index.js";

export interface PatternCase {
  name: string;
  valid: string[];
  invalid: string[];
  /** One acceptable pattern, or several */
  expected: string | string[];
}

export interface CaseReport {
  name: string;
  valid: string[];
  invalid: string[];
  expected: string[];
  generated: string;
  strategy?: StrategyName;
  passed: boolean;
}

export interface CaseSummary {
  total: number;
  passed: number;
  failed: number;
  allPassed: boolean;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check the shape of a parsed case file and return its cases.
 */
export function parseCases(data: unknown): PatternCase[] {
  if (!isRecord(data) || !Array.isArray(data.cases)) {
    throw new Error("Case file must be an object with a 'cases' array");
  }

  return data.cases.map((entry: unknown, index: number): PatternCase => {
    if (!isRecord(entry)) {
      throw new Error(`Case #${index + 1} must be an object`);
    }
    const { name, valid, invalid, expected } = entry;
    const label = typeof name === "string" ? `'${name}'` : `#${index + 1}`;

    if (typeof name !== "string" || name.length === 0) {
      throw new Error(`Case ${label}: 'name' must be a non-empty string`);
    }
    if (!isStringArray(valid)) {
      throw new Error(`Case ${label}: 'valid' must be an array of strings`);
    }
    if (!isStringArray(invalid)) {
      throw new Error(`Case ${label}: 'invalid' must be an array of strings`);
    }
    if (typeof expected !== "string" && !isStringArray(expected)) {
      throw new Error(`Case ${label}: 'expected' must be a string or an array of strings`);
    }

    return { name, valid, invalid, expected };
  });
}

export async function loadCases(path: string): Promise<PatternCase[]> {
  const content = await readFile(path, "utf-8");

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new Error(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseCases(data);
}

export function runCase(patternCase: PatternCase, options?: InferenceOptions): CaseReport {
  const expected = typeof patternCase.expected === "string" ? [patternCase.expected] : patternCase.expected;
  const result = synthesizePattern(
    { valid: patternCase.valid, invalid: patternCase.invalid },
    options
  );

  return {
    name: patternCase.name,
    valid: patternCase.valid,
    invalid: patternCase.invalid,
    expected,
    generated: result.pattern,
    strategy: result.strategy,
    passed: expected.includes(result.pattern),
  };
}

export function runCases(cases: readonly PatternCase[], options?: InferenceOptions): CaseReport[] {
  return cases.map((c) => runCase(c, options));
}

export function summarize(reports: readonly CaseReport[]): CaseSummary {
  const passed = reports.filter((r) => r.passed).length;
  return {
    total: reports.length,
    passed,
    failed: reports.length - passed,
    allPassed: passed === reports.length,
  };
}
