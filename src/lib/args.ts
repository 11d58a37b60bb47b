/**
 * Flag parsing for subcommands.
 *
 *   --name value   --name=value   -n value   --force   --no-packages
 *
 * Declared flags only; anything else starting with "-" is a usage error.
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export type FlagType = "string" | "boolean" | "list";

export interface FlagSpec {
  name: string;
  type: FlagType;
  alias?: string;
  /** Boolean flags accept `--no-<name>` to set false. */
  negatable?: boolean;
}

export class Flags {
  private strings = new Map<string, string>();
  private booleans = new Map<string, boolean>();
  private lists = new Map<string, string[]>();

  constructor(readonly positionals: string[] = []) {}

  setString(name: string, value: string): void {
    this.strings.set(name, value);
  }

  setBoolean(name: string, value: boolean): void {
    this.booleans.set(name, value);
  }

  push(name: string, value: string): void {
    this.lists.set(name, [...(this.lists.get(name) ?? []), value]);
  }

  string(name: string): string | undefined {
    return this.strings.get(name);
  }

  /** A string flag that must be present. */
  require(name: string, hint?: string): string {
    const value = this.strings.get(name);
    if (value === undefined || value === "") {
      throw new UsageError(`--${name} is required${hint ? ` ${hint}` : ""}`);
    }
    return value;
  }

  /** `undefined` when neither `--name` nor `--no-name` was given. */
  boolean(name: string): boolean | undefined {
    return this.booleans.get(name);
  }

  list(name: string): string[] {
    return this.lists.get(name) ?? [];
  }

  has(name: string): boolean {
    return this.strings.has(name) || this.booleans.has(name) || this.lists.has(name);
  }
}

export function parseFlags(args: string[], specs: readonly FlagSpec[]): Flags {
  const byName = new Map<string, FlagSpec>();
  for (const spec of specs) {
    byName.set(`--${spec.name}`, spec);
    if (spec.alias) byName.set(`-${spec.alias}`, spec);
  }

  const flags = new Flags([]);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--") {
      flags.positionals.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      flags.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const key = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;
    const inline = key === arg ? undefined : arg.slice(eq + 1);

    const spec = byName.get(key);
    if (!spec) {
      const negated = key.startsWith("--no-") ? byName.get(`--${key.slice(5)}`) : undefined;
      if (negated?.type === "boolean" && negated.negatable && inline === undefined) {
        flags.setBoolean(negated.name, false);
        continue;
      }
      throw new UsageError(`Unknown option: ${key}`);
    }

    if (spec.type === "boolean") {
      if (inline !== undefined) throw new UsageError(`${key} does not take a value`);
      flags.setBoolean(spec.name, true);
      continue;
    }

    let value = inline;
    if (value === undefined) {
      if (i + 1 >= args.length) throw new UsageError(`${key} requires a value`);
      value = args[++i];
    }
    if (spec.type === "list") flags.push(spec.name, value);
    else flags.setString(spec.name, value);
  }
  return flags;
}

/** Parse `"1.0.0"` or `">=1.0.0,<2.0.0"` style input into one or more constraints. */
export function splitConstraint(value: string): string | string[] {
  const parts = value.split(",").map((p) => p.trim()).filter(Boolean);
  return parts.length > 1 ? parts : (parts[0] ?? "");
}
