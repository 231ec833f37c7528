/**
 * @module hooks/deny-list
 * @description Destructive-command screen for PreToolUse.
 *
 * A case-insensitive substring scan, nothing more. A pattern starting
 * with `^` only matches at the start of the command. It does not parse
 * shell syntax, so quoting or aliasing can slip past it; it exists to
 * catch the obvious footguns before they run.
 */

/** Built-in patterns, always lowercase. */
export const DEFAULT_DENY_PATTERNS: readonly string[] = [
  "rm -rf",
  " rm -r ",
  "^rm ",
  "mkfs",
  "dd if=",
  "shutdown",
  "reboot",
  "sudo ",
  "git push",
  "git reset --hard",
];

/**
 * First pattern contained in `command`, ignoring case, or `null`.
 * Blank patterns never match.
 */
export function findDeniedPattern(
  command: string,
  patterns: Iterable<string>
): string | null {
  const haystack = command.toLowerCase();
  const head = haystack.trimStart();
  for (const pattern of patterns) {
    const anchored = pattern.startsWith("^");
    const needle = (anchored ? pattern.slice(1) : pattern).toLowerCase();
    if (needle.trim() === "") continue;
    if (anchored ? head.startsWith(needle) : haystack.includes(needle)) {
      return pattern;
    }
  }
  return null;
}
