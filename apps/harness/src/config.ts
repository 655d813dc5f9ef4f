// apps/harness/src/config.ts
//
// Flag + environment resolution for the harness CLIs.

import { makeArgvHelpers, normalizeBaseUrl, CliUsageError } from "cli-utils";
import { DEFAULT_EXECUTE_PATH, MAX_TIMEOUT_MS, type ExecutorClientConfig } from "./executorClient";
import { DEFAULT_BUILDER_OPTIONS, isRuntimeName, SUPPORTED_RUNTIMES, type RequestBuilderOptions } from "./requestBuilder";

export type Env = Readonly<Record<string, string | undefined>>;

export type LoadTestConfig = {
  client: ExecutorClientConfig;
  requests: number;
  concurrency: number;
  messagePrefix: string;
  builder: RequestBuilderOptions;
  outJson: string | null;
  outCsv: string | null;
  allowFail: boolean;
  quiet: boolean;
};

export type SmokeConfig = {
  client: ExecutorClientConfig;
  message: string;
  builder: RequestBuilderOptions;
};

export const DEFAULT_BASE_URL = "http://localhost:3000";

export const LOAD_TEST_HELP = `
Usage:
  load-test [--baseUrl <url>] [--path <path>] [--requests <n>] [--concurrency <n>] [--timeoutMs <ms>]
            [--runtime <name>] [--runtimeVersion <v>] [--cpuTime <duration>] [--prefix <text>]
            [--maxBodyBytes <n>] [--outJson <file>] [--outCsv <file>] [--allowFail] [--quiet]

Options:
  --baseUrl          Execution API base URL (default: EXEC_BASE_URL or ${DEFAULT_BASE_URL})
  --path             Execute endpoint path (default: ${DEFAULT_EXECUTE_PATH})
  --requests, -n     Number of logical requests (default: 50)
  --concurrency, -c  Concurrent workers (default: 5)
  --timeoutMs        Client-side deadline per request, at most ${MAX_TIMEOUT_MS} (default: EXEC_TIMEOUT_MS or 15000)
  --runtime          Runtime of the generated program: ${SUPPORTED_RUNTIMES.join(", ")} (default: ${DEFAULT_BUILDER_OPTIONS.runtime})
  --runtimeVersion   Runtime version sent to the service (default: ${DEFAULT_BUILDER_OPTIONS.runtimeVersion})
  --cpuTime          Process time limit sent to the service (default: ${DEFAULT_BUILDER_OPTIONS.cpuTime})
  --prefix           Text put before each request number in the expected output (default: none)
  --maxBodyBytes     Largest response body accepted (default: EXEC_MAX_BODY_BYTES or 2000000)
  --outJson          Write summary and outcomes as JSON
  --outCsv           Write outcomes as CSV
  --allowFail        Exit 0 even when requests failed or mismatched
  --quiet            Only print flagged requests and the summary
  --help, -h         Show this help

Exit codes:
  0  every request succeeded with the expected output (or --allowFail)
  1  at least one request failed or mismatched, or a runtime error
  2  bad arguments / usage
`.trim();

export const SMOKE_HELP = `
Usage:
  smoke [--baseUrl <url>] [--path <path>] [--timeoutMs <ms>] [--message <text>] [--runtime <name>]

Sends one request and prints what the service answered.

Options:
  --baseUrl      Execution API base URL (default: EXEC_BASE_URL or ${DEFAULT_BASE_URL})
  --path         Execute endpoint path (default: ${DEFAULT_EXECUTE_PATH})
  --timeoutMs    Client-side deadline, at most ${MAX_TIMEOUT_MS} (default: EXEC_TIMEOUT_MS or 15000)
  --message      Text the generated program prints (default: "it works")
  --runtime      ${SUPPORTED_RUNTIMES.join(", ")} (default: ${DEFAULT_BUILDER_OPTIONS.runtime})
  --help, -h     Show this help
`.trim();

function resolveRuntime(raw: string | null, helpText: string): RequestBuilderOptions["runtime"] {
  if (raw === null) return DEFAULT_BUILDER_OPTIONS.runtime;
  if (!isRuntimeName(raw)) {
    throw new CliUsageError(`Unsupported runtime: ${raw} (supported: ${SUPPORTED_RUNTIMES.join(", ")})\n\n${helpText}`);
  }
  return raw;
}

export function resolveLoadTestConfig(argv: readonly string[], env: Env): LoadTestConfig {
  const h = makeArgvHelpers(argv, LOAD_TEST_HELP);
  h.assertNoUnknownOptions(
    new Set([
      "--baseUrl",
      "--path",
      "--requests",
      "-n",
      "--concurrency",
      "-c",
      "--timeoutMs",
      "--runtime",
      "--runtimeVersion",
      "--cpuTime",
      "--prefix",
      "--maxBodyBytes",
      "--outJson",
      "--outCsv",
      "--allowFail",
      "--quiet",
      "--help",
      "-h",
    ])
  );
  h.assertHasValue(
    "--baseUrl",
    "--path",
    "--requests",
    "-n",
    "--concurrency",
    "-c",
    "--timeoutMs",
    "--runtime",
    "--runtimeVersion",
    "--cpuTime",
    "--prefix",
    "--maxBodyBytes",
    "--outJson",
    "--outCsv"
  );

  const requestsFlag = h.getArg("-n") !== null ? "-n" : "--requests";
  const concurrencyFlag = h.getArg("-c") !== null ? "-c" : "--concurrency";

  return {
    client: {
      baseUrl: normalizeBaseUrl(h.getArg("--baseUrl") ?? env.EXEC_BASE_URL ?? DEFAULT_BASE_URL),
      path: h.getArg("--path") ?? DEFAULT_EXECUTE_PATH,
      timeoutMs: h.parsePositiveIntFlag("--timeoutMs", 15000, env.EXEC_TIMEOUT_MS, MAX_TIMEOUT_MS),
      maxBodyBytes: h.parsePositiveIntFlag("--maxBodyBytes", 2000000, env.EXEC_MAX_BODY_BYTES),
      bodySnippetBytes: 4000,
    },
    requests: h.parsePositiveIntFlag(requestsFlag, 50),
    concurrency: h.parsePositiveIntFlag(concurrencyFlag, 5),
    messagePrefix: h.getArg("--prefix") ?? "",
    builder: {
      ...DEFAULT_BUILDER_OPTIONS,
      runtime: resolveRuntime(h.getArg("--runtime"), LOAD_TEST_HELP),
      runtimeVersion: h.getArg("--runtimeVersion") ?? DEFAULT_BUILDER_OPTIONS.runtimeVersion,
      cpuTime: h.getArg("--cpuTime") ?? DEFAULT_BUILDER_OPTIONS.cpuTime,
    },
    outJson: h.getArg("--outJson"),
    outCsv: h.getArg("--outCsv"),
    allowFail: h.hasFlag("--allowFail"),
    quiet: h.hasFlag("--quiet"),
  };
}

export function resolveSmokeConfig(argv: readonly string[], env: Env): SmokeConfig {
  const h = makeArgvHelpers(argv, SMOKE_HELP);
  h.assertNoUnknownOptions(new Set(["--baseUrl", "--path", "--timeoutMs", "--message", "--runtime", "--help", "-h"]));
  h.assertHasValue("--baseUrl", "--path", "--timeoutMs", "--message", "--runtime");

  return {
    client: {
      baseUrl: normalizeBaseUrl(h.getArg("--baseUrl") ?? env.EXEC_BASE_URL ?? DEFAULT_BASE_URL),
      path: h.getArg("--path") ?? DEFAULT_EXECUTE_PATH,
      timeoutMs: h.parsePositiveIntFlag("--timeoutMs", 15000, env.EXEC_TIMEOUT_MS, MAX_TIMEOUT_MS),
      maxBodyBytes: 2000000,
      bodySnippetBytes: 4000,
    },
    message: h.getArg("--message") ?? "it works",
    builder: {
      ...DEFAULT_BUILDER_OPTIONS,
      runtime: resolveRuntime(h.getArg("--runtime"), SMOKE_HELP),
      newline: true,
    },
  };
}

export function wantsHelp(argv: readonly string[]): boolean {
  return makeArgvHelpers(argv, "").hasFlag("--help", "-h");
}
