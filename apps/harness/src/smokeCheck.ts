// apps/harness/src/smokeCheck.ts
//
// One-shot "are you ok" request against the execution API.

import type { ExecutorClient } from "./executorClient";
import { buildExecutionRequest, type RequestBuilderOptions } from "./requestBuilder";
import { extractStdout } from "./verifier";

export type SmokeResult = { ok: boolean; line: string };

export async function runSmokeCheck(
  client: Pick<ExecutorClient, "execute">,
  message: string,
  builder: Partial<RequestBuilderOptions> = { newline: true }
): Promise<SmokeResult> {
  const result = await client.execute(buildExecutionRequest(message, builder));

  if (result.ok) {
    return { ok: true, line: `Request was successful. Output: ${extractStdout(result.response) ?? ""}` };
  }

  const f = result.failure;
  if (f.kind === "execution_failed") {
    const status = f.service_status ?? `HTTP ${f.http_status ?? "?"}`;
    return { ok: false, line: `Request failed. Status: ${status}` };
  }
  return { ok: false, line: `Error executing request: ${f.message}` };
}
