// apps/harness/src/requestBuilder.ts
//
// Builds /api/v1/execute payloads whose program prints a given message.
// The message is embedded verbatim inside a string literal: quotes, backslashes and
// newlines in it are NOT escaped and will break the generated program.

import type { ExecutionRequest, RuntimeName } from "shared-types";

export type RequestBuilderOptions = {
  runtime: RuntimeName;
  runtimeVersion: string;
  /** CPU time limit forwarded to the service, e.g. "2s". */
  cpuTime: string;
  allowRead: boolean;
  /** Use the runtime's line-printing primitive (stdout then ends with "\n"). */
  newline: boolean;
};

type SourceTemplate = (message: string, newline: boolean) => string;

const TEMPLATES: Record<RuntimeName, SourceTemplate> = {
  go: (message, newline) =>
    `package main\nimport "fmt"\n\nfunc main() {\n\tfmt.${newline ? "Println" : "Print"}("${message}")\n}`,
  python3: (message, newline) => (newline ? `print("${message}")` : `print("${message}", end="")`),
};

export const SUPPORTED_RUNTIMES: readonly RuntimeName[] = ["go", "python3"];

export const DEFAULT_BUILDER_OPTIONS: RequestBuilderOptions = {
  runtime: "go",
  runtimeVersion: "3.12",
  cpuTime: "2s",
  allowRead: true,
  newline: false,
};

export function isRuntimeName(v: string): v is RuntimeName {
  return SUPPORTED_RUNTIMES.some((r) => r === v);
}

export function parseRuntimeName(v: string): RuntimeName {
  if (!isRuntimeName(v)) {
    throw new Error(`Unsupported runtime: ${v} (supported: ${SUPPORTED_RUNTIMES.join(", ")})`);
  }
  return v;
}

/** Message (and expected stdout) of logical request `index`. */
export function messageForIndex(index: number, prefix = ""): string {
  return `${prefix}${index}`;
}

/** The stdout a correct execution of the built request produces. */
export function expectedStdout(message: string, newline: boolean): string {
  return newline ? `${message}\n` : message;
}

export function buildExecutionRequest(message: string, options: Partial<RequestBuilderOptions> = {}): ExecutionRequest {
  const opts = { ...DEFAULT_BUILDER_OPTIONS, ...options };
  const template = TEMPLATES[parseRuntimeName(opts.runtime)];

  return {
    runtime: { name: opts.runtime, version: opts.runtimeVersion },
    project: { entry: template(message, opts.newline) },
    process: {
      time: opts.cpuTime,
      permissions: { read: opts.allowRead },
    },
  };
}
