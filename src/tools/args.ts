export type ParsedArgs = Record<string, string | boolean>;

/**
 * Parse `--key value` and bare `--flag` arguments (dependency-free).
 */
export function parseArgs(argv: readonly string[] = process.argv.slice(2)): ParsedArgs {
  const args: ParsedArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const key = arg.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      args[key] = next;
      i++;
    } else {
      args[key] = true;
    }
  }
  return args;
}

export function argString(args: ParsedArgs, key: string): string | undefined {
  const v = args[key];
  return typeof v === "string" ? v : undefined;
}

export function argFlag(args: ParsedArgs, key: string): boolean {
  const v = args[key];
  return v === true || v === "true";
}

export function argInt(args: ParsedArgs, key: string): number | undefined {
  const v = argString(args, key);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`--${key} must be an integer, got ${v}`);
  return n;
}
