/**
 * Character classes
 * Uniform classes over a set of strings, and their pattern fragments
 */

// ============================================================================
// Class Types
// ============================================================================

export type RepeatedClassKind =
  | "digit"
  | "nonDigit"
  | "word"
  | "nonWord"
  | "lowercase"
  | "uppercase"
  | "letter"
  | "wildcard";

export interface RepeatedClass {
  type: "repeated";
  kind: RepeatedClassKind;
}

export interface LiteralClass {
  type: "literal";
  char: string;
}

export type CharacterClass = RepeatedClass | LiteralClass;

// ============================================================================
// Fragments
// ============================================================================

const REGEX_SPECIAL_CHARS = /[.*+?^${}()|[\]\\]/g;

export function escapeRegex(str: string): string {
  return str.replace(REGEX_SPECIAL_CHARS, "\\$&");
}

const CLASS_ATOMS: Record<RepeatedClassKind, string> = {
  digit: "\\d",
  nonDigit: "\\D",
  word: "\\w",
  nonWord: "\\W",
  lowercase: "[a-z]",
  uppercase: "[A-Z]",
  letter: "[a-zA-Z]",
  wildcard: ".",
};

export function repeated(kind: RepeatedClassKind): RepeatedClass {
  return { type: "repeated", kind };
}

export function literal(char: string): LiteralClass {
  return { type: "literal", char };
}

/**
 * Render a class as a pattern fragment: `\d+`, `[a-z]+`, `.+`, or the
 * escaped character for a literal.
 */
export function classFragment(cls: CharacterClass): string {
  switch (cls.type) {
    case "literal":
      return escapeRegex(cls.char);
    case "repeated":
      return `${CLASS_ATOMS[cls.kind]}+`;
  }
}

// ============================================================================
// Classification
// ============================================================================

const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;

export function isAlphanumeric(char: string): boolean {
  return ALPHANUMERIC.test(char);
}

export const DEFAULT_CLASS_ORDER: readonly RepeatedClassKind[] = ["nonDigit", "digit", "word"];

function holdsForAll(kind: RepeatedClassKind, strings: readonly string[]): boolean {
  const regex = new RegExp(`^${CLASS_ATOMS[kind]}+$`);
  return strings.every((s) => regex.test(s));
}

/**
 * Classes that hold for every string, most specific first.
 *
 * A run of identical single characters yields the literal class ahead of
 * everything else. An empty input, or one containing an empty string, has no
 * uniform class; callers fall back to `wildcard`.
 */
export function classify(
  strings: readonly string[],
  order: readonly RepeatedClassKind[] = DEFAULT_CLASS_ORDER
): CharacterClass[] {
  if (strings.length === 0 || strings.some((s) => s.length === 0)) {
    return [];
  }

  const classes: CharacterClass[] = [];

  const first = strings[0];
  if ([...first].length === 1 && strings.every((s) => s === first)) {
    classes.push(literal(first));
  }

  for (const kind of order) {
    if (holdsForAll(kind, strings)) {
      classes.push(repeated(kind));
    }
  }

  return classes;
}

/**
 * Most specific class for the strings, or the wildcard when nothing holds.
 */
export function bestClass(
  strings: readonly string[],
  order: readonly RepeatedClassKind[] = DEFAULT_CLASS_ORDER
): CharacterClass {
  return classify(strings, order)[0] ?? repeated("wildcard");
}
