/**
 * Pattern inference engine
 * Finds one anchored pattern that separates valid examples from invalid ones
 */

import { validatePattern } from "./oracle.js";
import { STRATEGIES, type StrategyName } from "./strategies.js";

export const PATTERN_NOT_FOUND = "pattern not found";

/** Longest pattern the engine will return, in code points */
export const MAX_PATTERN_LENGTH = 20;

export interface SynthesisInput {
  valid: readonly string[];
  invalid: readonly string[];
}

export type AttemptOutcome = "accepted" | "no-candidate" | "too-long" | "rejected-by-oracle";

export interface StrategyAttempt {
  strategy: StrategyName;
  candidate: string | null;
  outcome: AttemptOutcome;
}

export interface InferenceResult {
  success: boolean;
  /** The accepted pattern, or PATTERN_NOT_FOUND */
  pattern: string;
  strategy?: StrategyName;
  attempts: StrategyAttempt[];
}

export interface InferenceOptions {
  verbose?: boolean;
  /** Sink for verbose output (defaults to console.log) */
  log?: (msg: string) => void;
}

function patternLength(pattern: string): number {
  return [...pattern].length;
}

function judge(candidate: string | null, input: SynthesisInput): AttemptOutcome {
  if (!candidate) return "no-candidate";
  if (patternLength(candidate) > MAX_PATTERN_LENGTH) return "too-long";
  if (!validatePattern(candidate, input.valid, input.invalid)) return "rejected-by-oracle";
  return "accepted";
}

/**
 * Run every strategy in priority order and keep the first accepted candidate,
 * recording what each strategy proposed along the way.
 */
export function synthesizePattern(
  input: SynthesisInput,
  options: InferenceOptions = {}
): InferenceResult {
  const { verbose = false, log: sink = console.log } = options;
  const log = (msg: string) => {
    if (verbose) sink(msg);
  };

  const attempts: StrategyAttempt[] = [];

  if (input.valid.length === 0 || input.invalid.length === 0) {
    log("[Inference] Both example sets must be non-empty");
    return { success: false, pattern: PATTERN_NOT_FOUND, attempts };
  }

  for (const strategy of STRATEGIES) {
    const candidate = strategy.tryGenerate(input.valid, input.invalid);
    const outcome = judge(candidate, input);
    attempts.push({ strategy: strategy.name, candidate, outcome });
    log(`[Inference] ${strategy.name}: ${candidate ?? "-"} (${outcome})`);

    if (outcome === "accepted" && candidate) {
      return { success: true, pattern: candidate, strategy: strategy.name, attempts };
    }
  }

  log(`[Inference] No strategy separated ${input.valid.length} valid from ${input.invalid.length} invalid examples`);
  return { success: false, pattern: PATTERN_NOT_FOUND, attempts };
}

/**
 * Infer a pattern that fully matches every valid string and no invalid one.
 * Returns PATTERN_NOT_FOUND when no strategy finds one.
 */
export function inferPattern(
  valid: readonly string[],
  invalid: readonly string[],
  options?: InferenceOptions
): string {
  return synthesizePattern({ valid, invalid }, options).pattern;
}
