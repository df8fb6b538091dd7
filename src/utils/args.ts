/**
 * Lightweight argument parser for the command line.
 *
 * Handles common patterns:
 * - Boolean flags: -q, --quiet
 * - Combined short flags: -qE (same as -q -E)
 * - Value options: -o FILE, -oFILE, --output=FILE, --output FILE
 * - Repeatable value options collected into a list: --exclude A --exclude B
 * - Positional arguments, and `--` to end option parsing
 * - Unknown option detection
 */

export type ArgType = "boolean" | "string" | "list";

export interface ArgDef {
  /** Short form without dash, e.g., "q" for -q */
  short?: string;
  /** Long form without dashes, e.g., "quiet" for --quiet */
  long?: string;
  type: ArgType;
}

type NamesOfType<T extends Record<string, ArgDef>, K extends ArgType> = {
  [N in keyof T]: T[N]["type"] extends K ? N : never;
}[keyof T] &
  string;

export interface ParsedArgs<T extends Record<string, ArgDef>> {
  flag(name: NamesOfType<T, "boolean">): boolean;
  /** Last value given, or undefined if the option was not set */
  value(name: NamesOfType<T, "string">): string | undefined;
  /** Every value given, in order */
  list(name: NamesOfType<T, "list">): string[];
  positional: string[];
}

export type ParseResult<T extends Record<string, ArgDef>> =
  | { ok: true; result: ParsedArgs<T> }
  | { ok: false; error: string };

function unknownOption(cmdName: string, option: string): string {
  // For single-char options, use "invalid option -- 'x'" format
  // For long options, use "unrecognized option '--xxx'" format
  return option.startsWith("--")
    ? `${cmdName}: unrecognized option '${option}'`
    : `${cmdName}: invalid option -- '${option.replace(/^-/, "")}'`;
}

/**
 * Parse command arguments according to the provided definitions.
 *
 * @example
 * const defs = {
 *   quiet: { short: "q", long: "quiet", type: "boolean" },
 *   exclude: { long: "exclude", type: "list" },
 * } satisfies Record<string, ArgDef>;
 * const parsed = parseArgs("folder-search", argv, defs);
 * if (!parsed.ok) return fail(parsed.error);
 * parsed.result.list("exclude");
 */
export function parseArgs<T extends Record<string, ArgDef>>(
  cmdName: string,
  args: string[],
  defs: T,
): ParseResult<T> {
  // Build lookup maps: map short/long options to {name, type}
  const shortToInfo = new Map<string, { name: string; type: ArgType }>();
  const longToInfo = new Map<string, { name: string; type: ArgType }>();

  for (const [name, def] of Object.entries(defs)) {
    const info = { name, type: def.type };
    if (def.short) shortToInfo.set(def.short, info);
    if (def.long) longToInfo.set(def.long, info);
  }

  const flags = new Set<string>();
  const values = new Map<string, string[]>();
  const positional: string[] = [];
  let stopParsing = false;

  const setValue = (name: string, value: string): void => {
    const existing = values.get(name);
    if (existing) {
      existing.push(value);
    } else {
      values.set(name, [value]);
    }
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      // Long option
      const eqIndex = arg.indexOf("=");
      const optName = eqIndex !== -1 ? arg.slice(2, eqIndex) : arg.slice(2);
      let optValue = eqIndex !== -1 ? arg.slice(eqIndex + 1) : undefined;

      const info = longToInfo.get(optName);
      if (!info) {
        return { ok: false, error: unknownOption(cmdName, arg) };
      }

      if (info.type === "boolean") {
        flags.add(info.name);
        continue;
      }
      if (optValue === undefined) {
        if (i + 1 >= args.length) {
          return {
            ok: false,
            error: `${cmdName}: option '--${optName}' requires an argument`,
          };
        }
        optValue = args[++i];
      }
      setValue(info.name, optValue);
    } else {
      // Short option(s)
      const chars = arg.slice(1);

      for (let j = 0; j < chars.length; j++) {
        const c = chars[j];
        const info = shortToInfo.get(c);

        if (!info) {
          return { ok: false, error: unknownOption(cmdName, `-${c}`) };
        }

        if (info.type === "boolean") {
          flags.add(info.name);
          continue;
        }
        // Value option - rest of string or next arg
        let optValue: string;
        if (j + 1 < chars.length) {
          optValue = chars.slice(j + 1);
        } else if (i + 1 < args.length) {
          optValue = args[++i];
        } else {
          return {
            ok: false,
            error: `${cmdName}: option requires an argument -- '${c}'`,
          };
        }
        setValue(info.name, optValue);
        break; // Rest of chars consumed as value
      }
    }
  }

  return {
    ok: true,
    result: {
      flag: (name) => flags.has(name),
      value: (name) => values.get(name)?.at(-1),
      list: (name) => [...(values.get(name) ?? [])],
      positional,
    },
  };
}
