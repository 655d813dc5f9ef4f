// packages/cli-utils/src/index.ts
//
// argv helpers shared by the harness CLIs. `--flag=value` is accepted as `--flag value`.

export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function normalizeArgv(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (const a of argv) {
    if (a.startsWith("--") && a.includes("=")) {
      const idx = a.indexOf("=");
      out.push(a.slice(0, idx));
      const val = a.slice(idx + 1);
      if (val.length) out.push(val);
    } else {
      out.push(a);
    }
  }
  return out;
}

export type ArgvHelpers = ReturnType<typeof makeArgvHelpers>;

/**
 * Builds flag readers over `argv` (a full `process.argv`: the first two entries are skipped
 * when checking for unknown options). Every error carries `helpText` and is a CliUsageError.
 */
export function makeArgvHelpers(argv: readonly string[], helpText: string) {
  const ARGV = normalizeArgv(argv);

  function usage(message: string): CliUsageError {
    return new CliUsageError(`${message}\n\n${helpText}`);
  }

  function hasFlag(...names: string[]): boolean {
    return names.some((n) => ARGV.includes(n));
  }

  function getArg(name: string): string | null {
    const idx = ARGV.indexOf(name);
    if (idx === -1) return null;
    const v = ARGV[idx + 1];
    if (!v || v.startsWith("--")) return null;
    return v;
  }

  function assertNoUnknownOptions(allowed: ReadonlySet<string>): void {
    for (const a of ARGV.slice(2)) {
      const isOption = a.startsWith("--") || /^-[a-zA-Z]$/.test(a);
      if (isOption && !allowed.has(a)) {
        throw usage(`Unknown option: ${a}`);
      }
    }
  }

  function assertHasValue(...flags: string[]): void {
    for (const flag of flags) {
      const idx = ARGV.indexOf(flag);
      if (idx === -1) continue;
      const next = ARGV[idx + 1];
      if (!next || next.startsWith("--")) {
        throw usage(`Missing value for ${flag}`);
      }
    }
  }

  function parseIntValue(name: string, raw: string): number {
    if (!/^-?\d+$/.test(raw.trim())) {
      throw usage(`Invalid integer for ${name}: ${raw}`);
    }
    return Number.parseInt(raw, 10);
  }

  function parseIntFlag(name: string, fallback: number, envValue?: string): number {
    const raw = getArg(name) ?? envValue;
    if (raw === undefined || raw === "") return fallback;
    return parseIntValue(name, raw);
  }

  function parsePositiveIntFlag(name: string, fallback: number, envValue?: string, max = Number.MAX_SAFE_INTEGER): number {
    const n = parseIntFlag(name, fallback, envValue);
    if (n < 1) throw usage(`${name} must be a positive integer, got ${n}`);
    if (n > max) throw usage(`${name} must be at most ${max}, got ${n}`);
    return n;
  }

  return { ARGV, hasFlag, getArg, assertNoUnknownOptions, assertHasValue, parseIntFlag, parsePositiveIntFlag };
}

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

/** Prints usage errors with their exit code, anything else with its stack and exit 1. */
export function reportFatal(err: unknown): number {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    return err.exitCode;
  }
  console.error(String(err instanceof Error ? err.stack : err));
  return 1;
}
