/**
 * Argument parsing for the CLI.
 *
 * `--name value` sets a flag; a name in the boolean set, or one followed by
 * another flag or nothing, is a boolean flag.
 */

/** Flags that never take a value. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  "inputs",
  "bluetooth",
  "median-stats",
  "from-scratch",
  "no-upload",
  "json",
  "help",
  "h",
]);

export function parseArgs(
  argv: string[],
  booleanFlags: ReadonlySet<string> = BOOLEAN_FLAGS,
): {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
} {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (!booleanFlags.has(name) && next !== undefined && !next.startsWith("--")) {
        flags.set(name, next);
        i += 2;
      } else {
        // Boolean flag (no value)
        boolFlags.add(name);
        i += 1;
      }
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}
