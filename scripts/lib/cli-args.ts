/**
 * Positional argument parsing for the scripts.
 */

/**
 * Read positional argument `position` (0-based, after the script path) as
 * an integer. Missing or non-integer values throw with `usage` in the
 * message; `fallback` is used only when given and the argument is absent.
 */
export function intArg(
  argv: readonly string[],
  position: number,
  name: string,
  usage: string,
  fallback?: number,
): number {
  const raw = argv[position + 2];
  if (raw === undefined) {
    if (fallback !== undefined) return fallback;
    throw new Error(`missing <${name}>\nUsage: ${usage}`);
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`<${name}> must be an integer, got "${raw}"\nUsage: ${usage}`);
  }
  return value;
}
