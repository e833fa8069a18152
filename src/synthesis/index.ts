/**
 * Synthesis Module Index
 * Exports all pattern-inference functionality
 */

// Oracle
export { fullMatch, validatePattern } from "./regex/oracle.js";

// Affixes
export { longestCommonPrefix, longestCommonSuffix } from "./regex/affix.js";

// Character classes
export {
  bestClass,
  classFragment,
  classify,
  escapeRegex,
  isAlphanumeric,
  literal,
  repeated,
  DEFAULT_CLASS_ORDER,
  type CharacterClass,
  type LiteralClass,
  type RepeatedClass,
  type RepeatedClassKind,
} from "./regex/char-class.js";

// Strategies
export {
  STRATEGIES,
  charClassStrategy,
  prefixStrategy,
  containsStrategy,
  suffixStrategy,
  structuralStrategy,
  findSeparators,
  splitOnSeparators,
  type Strategy,
  type StrategyName,
} from "./regex/strategies.js";

// Engine
export {
  inferPattern,
  synthesizePattern,
  PATTERN_NOT_FOUND,
  MAX_PATTERN_LENGTH,
  type AttemptOutcome,
  type InferenceOptions,
  type InferenceResult,
  type StrategyAttempt,
  type SynthesisInput,
} from "./regex/engine.js";
