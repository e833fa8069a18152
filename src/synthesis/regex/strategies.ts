/**
 * Candidate generators for pattern inference
 *
 * Each strategy looks at the labeled examples from one angle and proposes
 * at most one anchored pattern. A strategy only returns a candidate that
 * already passes the oracle.
 */

import { longestCommonPrefix, longestCommonSuffix } from "./affix.js";
import {
  type RepeatedClassKind,
  bestClass,
  classFragment,
  escapeRegex,
  isAlphanumeric,
  repeated,
} from "./char-class.js";
import { validatePattern } from "./oracle.js";

export type StrategyName = "char-class" | "prefix" | "contains" | "suffix" | "structural";

export interface Strategy {
  name: StrategyName;
  tryGenerate(valid: readonly string[], invalid: readonly string[]): string | null;
}

// ============================================================================
// Uniform Character Class
// ============================================================================

const UNIFORM_CLASS_ORDER: readonly RepeatedClassKind[] = [
  "digit",
  "nonDigit",
  "word",
  "nonWord",
  "lowercase",
  "uppercase",
  "letter",
];

export const charClassStrategy: Strategy = {
  name: "char-class",
  tryGenerate(valid, invalid) {
    for (const kind of UNIFORM_CLASS_ORDER) {
      const pattern = `^${classFragment(repeated(kind))}$`;
      if (validatePattern(pattern, valid, invalid)) {
        return pattern;
      }
    }
    return null;
  },
};

// ============================================================================
// Affixes
// ============================================================================

/**
 * A one-character affix is written as a set (`[a]`) followed or preceded by
 * `.+`; longer ones as an escaped literal with `.+`, or `.*` when some example
 * is nothing but the affix.
 */
function affixParts(affix: string, valid: readonly string[]): { fragment: string; rest: string } {
  const escaped = escapeRegex(affix);
  if (escaped.length === 1) {
    return { fragment: `[${escaped}]`, rest: ".+" };
  }
  const rest = valid.every((s) => s.length > affix.length) ? ".+" : ".*";
  return { fragment: escaped, rest };
}

export const prefixStrategy: Strategy = {
  name: "prefix",
  tryGenerate(valid, invalid) {
    const prefix = longestCommonPrefix(valid);
    if (!prefix) return null;

    const { fragment, rest } = affixParts(prefix, valid);
    const pattern = `^${fragment}${rest}$`;

    return validatePattern(pattern, valid, invalid) ? pattern : null;
  },
};

export const suffixStrategy: Strategy = {
  name: "suffix",
  tryGenerate(valid, invalid) {
    const suffix = longestCommonSuffix(valid);
    if (!suffix) return null;

    const { fragment, rest } = affixParts(suffix, valid);
    const pattern = `^${rest}${fragment}$`;

    return validatePattern(pattern, valid, invalid) ? pattern : null;
  },
};

// ============================================================================
// Distinguishing Character
// ============================================================================

export const containsStrategy: Strategy = {
  name: "contains",
  tryGenerate(valid, invalid) {
    if (valid.length === 0) return null;

    for (const char of new Set(valid[0])) {
      const distinguishes =
        valid.every((s) => s.includes(char)) && !invalid.some((s) => s.includes(char));
      if (!distinguishes) continue;

      // Separators are written as-is: `^.+-.+$`
      const middle = isAlphanumeric(char) ? escapeRegex(char) : char;
      const pattern = `^.+${middle}.+$`;
      if (validatePattern(pattern, valid, invalid)) {
        return pattern;
      }
    }
    return null;
  },
};

// ============================================================================
// Structural Decomposition
// ============================================================================

const CONTENT_CLASS_ORDER: readonly RepeatedClassKind[] = [
  "word",
  "nonDigit",
  "lowercase",
  "uppercase",
  "digit",
];

// Local part of an address: `user@` is usually letters before it is a word
const BEFORE_AT_CLASS_ORDER: readonly RepeatedClassKind[] = [
  "nonDigit",
  "word",
  "lowercase",
  "uppercase",
  "digit",
];

/**
 * Distinct non-alphanumeric characters of the strings, in code point order.
 */
export function findSeparators(strings: readonly string[]): string[] {
  const separators = new Set<string>();
  for (const s of strings) {
    for (const char of s) {
      if (!isAlphanumeric(char)) separators.add(char);
    }
  }
  return [...separators].sort((a, b) => (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0));
}

/**
 * Split on any separator, keeping the separators: even indexes hold content,
 * odd indexes hold separators.
 */
export function splitOnSeparators(str: string, separators: readonly string[]): string[] {
  const splitter = new RegExp(`(${separators.map(escapeRegex).join("|")})`);
  return str.split(splitter);
}

function contentFragment(slices: readonly string[], nextSeparator: string | undefined): string {
  const order = nextSeparator === "@" ? BEFORE_AT_CLASS_ORDER : CONTENT_CLASS_ORDER;
  return classFragment(bestClass(slices, order));
}

export const structuralStrategy: Strategy = {
  name: "structural",
  tryGenerate(valid, invalid) {
    if (valid.length === 0) return null;

    const separators = findSeparators(valid);
    if (separators.length === 0) return null;
    if (!valid.every((s) => separators.every((sep) => s.includes(sep)))) {
      return null;
    }

    // A single separator is often enough
    for (const sep of separators) {
      const pattern = `^.+${escapeRegex(sep)}.+$`;
      if (validatePattern(pattern, valid, invalid)) {
        return pattern;
      }
    }

    const parts = valid.map((s) => splitOnSeparators(s, separators));
    const partCount = parts[0].length;
    if (!parts.every((p) => p.length === partCount)) {
      return null;
    }

    const fragments: string[] = [];
    for (let i = 0; i < partCount; i++) {
      if (i % 2 === 1) {
        fragments.push(escapeRegex(parts[0][i]));
        continue;
      }

      const slices = parts.map((p) => p[i]);
      if (slices.some((slice) => slice.length === 0)) {
        return null;
      }
      fragments.push(contentFragment(slices, parts[0][i + 1]));
    }

    const pattern = `^${fragments.join("")}$`;
    return validatePattern(pattern, valid, invalid) ? pattern : null;
  },
};

// ============================================================================
// Priority
// ============================================================================

/**
 * Strategies in the order they are consulted. The first accepted candidate
 * wins, so this order decides between several discriminating patterns.
 */
export const STRATEGIES: readonly Strategy[] = [
  charClassStrategy,
  prefixStrategy,
  containsStrategy,
  suffixStrategy,
  structuralStrategy,
];
