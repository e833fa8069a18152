/**
 * Full-match oracle for candidate patterns
 */

function compileFullMatch(pattern: string): RegExp | null {
  try {
    // Compiled bare first so the wrapping group cannot balance a stray `)`
    new RegExp(pattern);
    return new RegExp(`^(?:${pattern})$`);
  } catch {
    // Malformed candidate
    return null;
  }
}

/**
 * Whether `input` matches `pattern` from its first to its last character.
 * Malformed patterns never match.
 */
export function fullMatch(pattern: string, input: string): boolean {
  const regex = compileFullMatch(pattern);
  return regex !== null && regex.test(input);
}

/**
 * True iff every valid string fully matches and no invalid string does.
 */
export function validatePattern(
  pattern: string,
  valid: readonly string[],
  invalid: readonly string[]
): boolean {
  const regex = compileFullMatch(pattern);
  if (!regex) return false;

  if (!valid.every((s) => regex.test(s))) {
    return false;
  }
  return !invalid.some((s) => regex.test(s));
}
