/**
 * Common prefix / suffix analysis
 */

export function longestCommonPrefix(strings: readonly string[]): string {
  if (strings.length === 0) return "";

  // Shrunk by whole code points so a surrogate pair is never split
  let prefix = [...strings[0]];
  for (const s of strings.slice(1)) {
    while (!s.startsWith(prefix.join(""))) {
      prefix = prefix.slice(0, -1);
      if (prefix.length === 0) return "";
    }
  }
  return prefix.join("");
}

function reverse(str: string): string {
  return [...str].reverse().join("");
}

export function longestCommonSuffix(strings: readonly string[]): string {
  if (strings.length === 0) return "";
  return reverse(longestCommonPrefix(strings.map(reverse)));
}
