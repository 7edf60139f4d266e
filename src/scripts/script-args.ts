export interface ScriptArgs {
  // Every value given for each long option, in order
  values: Map<string, string[]>;
  flags: Set<string>;
}

/**
 * Parse `--key value`, `--key=value` and `-k value` arguments.
 * Options named in `booleanFlags` take no value; short options are
 * mapped through `aliases`.
 */
export function parseArgs(
  argv: string[],
  booleanFlags: readonly string[] = [],
  aliases: Record<string, string> = {}
): ScriptArgs {
  const args: ScriptArgs = { values: new Map(), flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let key: string;
    let inline: string | undefined;

    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      key = eq === -1 ? arg.substring(2) : arg.substring(2, eq);
      inline = eq === -1 ? undefined : arg.substring(eq + 1);
    } else if (arg.startsWith("-") && arg.length > 1) {
      const short = arg.substring(1);
      key = aliases[short] ?? short;
    } else {
      continue;
    }

    if (booleanFlags.includes(key)) {
      args.flags.add(key);
      continue;
    }

    const value = inline ?? argv[++i];
    if (value === undefined) {
      args.flags.add(key);
      continue;
    }
    const existing = args.values.get(key) ?? [];
    existing.push(value);
    args.values.set(key, existing);
  }

  return args;
}

/**
 * Last value given for an option
 */
export function lastValue(args: ScriptArgs, key: string): string | undefined {
  const values = args.values.get(key);
  return values ? values[values.length - 1] : undefined;
}

/**
 * All values of a repeatable option, splitting comma lists
 */
export function listValue(args: ScriptArgs, key: string): string[] {
  return (args.values.get(key) ?? [])
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}
