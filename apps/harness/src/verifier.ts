// apps/harness/src/verifier.ts
//
// Exact-match output check. Nothing is trimmed or normalised: "7\n" does not match "7".
// A stdout that is not a string never matches, even when it prints the same (1 vs "1").

import type { ExecutionResponse } from "shared-types";

/**
 * Stdout as reported: the string itself, a non-string value as its JSON text,
 * or null when the response carries none.
 */
export function extractStdout(response: ExecutionResponse): string | null {
  const stdout = response.output?.run?.stdout;
  if (stdout === undefined) return null;
  return typeof stdout === "string" ? stdout : JSON.stringify(stdout);
}

export function verify(expected: string | number, response: ExecutionResponse): boolean {
  const stdout = response.output?.run?.stdout;
  return typeof stdout === "string" && stdout === String(expected);
}

export function describeMismatch(expected: string | number, response: ExecutionResponse): string {
  const stdout = response.output?.run?.stdout;
  const want = JSON.stringify(String(expected));
  if (stdout === undefined) return `expected ${want}, got no stdout`;
  if (typeof stdout === "string") return `expected ${want}, got ${JSON.stringify(stdout)}`;
  if (stdout === null) return `expected ${want}, got null`;
  return `expected ${want}, got ${typeof stdout} ${JSON.stringify(stdout)}`;
}
