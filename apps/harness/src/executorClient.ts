// apps/harness/src/executorClient.ts
//
// Single-attempt HTTP client for POST /api/v1/execute.
// Never throws for per-request problems: every failure comes back as an ExecutorFailure.

import Ajv from "ajv";
import { TextDecoder } from "node:util";
import type { ExecutionRequest, ExecutionResponse, ExecutorFailure, NetErrorKind } from "shared-types";

export const DEFAULT_EXECUTE_PATH = "/api/v1/execute";

export type ExecutorClientConfig = {
  baseUrl: string;
  path: string;
  /** Deadline for the whole exchange, body included. */
  timeoutMs: number;
  maxBodyBytes: number;
  bodySnippetBytes: number;
};

export type ExecutorDeps = {
  fetchImpl?: typeof fetch;
  now?: () => number;
};

export type ExecuteResult =
  | { ok: true; response: ExecutionResponse; http_status: number; latency_ms: number }
  | { ok: false; failure: ExecutorFailure; latency_ms: number };

export interface ExecutorClient {
  readonly url: string;
  execute(request: ExecutionRequest): Promise<ExecuteResult>;
}

const responseSchema = {
  type: "object",
  required: ["status"],
  properties: {
    status: { type: "string" },
    output: {
      type: "object",
      properties: {
        compile: { $ref: "#/definitions/processResult" },
        run: { $ref: "#/definitions/processResult" },
      },
    },
  },
  definitions: {
    processResult: {
      type: "object",
      properties: {
        stdout: {},
        stderr: { type: "string" },
        output: { type: "string" },
        time: { type: "number" },
        memory: { type: "number" },
        exit_code: { type: "integer" },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateResponse = ajv.compile<ExecutionResponse>(responseSchema);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function errorCode(e: unknown): string {
  if (e instanceof Error && isRecord(e.cause) && typeof e.cause.code === "string") return e.cause.code;
  if (isRecord(e) && typeof e.code === "string") return e.code;
  return "";
}

export function inferNetErrorKind(e: unknown): NetErrorKind {
  const name = e instanceof Error ? e.name : "";
  const msg = e instanceof Error ? e.message : String(e ?? "");
  const s = `${name} ${msg} ${errorCode(e)}`.toLowerCase();

  if (name === "AbortError" || name === "TimeoutError" || s.includes("etimedout")) return "timeout";
  if (s.includes("enotfound") || s.includes("eai_again") || s.includes("dns")) return "dns";
  if (s.includes("cert") || s.includes("tls") || s.includes("ssl") || s.includes("handshake")) return "tls";
  if (s.includes("econnrefused") || s.includes("connection refused")) return "conn_refused";
  if (s.includes("econnreset") || s.includes("connection reset")) return "conn_reset";
  if (s.includes("socket hang up") || s.includes("und_err_socket")) return "socket_hang_up";
  if (s.includes("proxy")) return "proxy";

  return "unknown";
}

function describeError(e: unknown): string {
  if (!(e instanceof Error)) return String(e);
  const code = errorCode(e);
  return code ? `${e.name}: ${e.message} (${code})` : `${e.name}: ${e.message}`;
}

type BodyRead = { text: string; truncated: boolean };

async function readBodyCapped(res: Response, maxBytes: number): Promise<BodyRead> {
  const body = res.body;
  if (!body) return { text: "", truncated: false };

  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  let truncated = false;

  try {
    for (;;) {
      const { value, done } = await reader.read();
      if (done) break;
      if (!value) continue;

      if (total + value.byteLength <= maxBytes) {
        chunks.push(value);
        total += value.byteLength;
      } else {
        truncated = true;
        break;
      }
    }
  } finally {
    if (truncated) {
      await reader.cancel().catch(() => undefined);
    }
  }

  const merged = new Uint8Array(total);
  let off = 0;
  for (const c of chunks) {
    merged.set(c, off);
    off += c.byteLength;
  }
  return { text: new TextDecoder("utf-8", { fatal: false }).decode(merged), truncated };
}

type Classified = { ok: true; response: ExecutionResponse } | { ok: false; failure: ExecutorFailure };

/**
 * Maps an HTTP status and a fully read body onto the failure taxonomy.
 * A non-200 answer is an execution failure even when its body is not JSON.
 */
export function classifyResponse(httpStatus: number, text: string, bodySnippetBytes = 4000): Classified {
  const snippet = text.slice(0, Math.max(0, bodySnippetBytes));
  const httpOk = httpStatus === 200;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    if (!httpOk) {
      return {
        ok: false,
        failure: { kind: "execution_failed", message: `HTTP ${httpStatus}`, http_status: httpStatus, body_snippet: snippet },
      };
    }
    return {
      ok: false,
      failure: {
        kind: "protocol",
        message: `invalid JSON body: ${e instanceof Error ? e.message : String(e)}`,
        http_status: httpStatus,
        body_snippet: snippet,
      },
    };
  }

  if (!validateResponse(parsed)) {
    if (!httpOk) {
      return {
        ok: false,
        failure: { kind: "execution_failed", message: `HTTP ${httpStatus}`, http_status: httpStatus, body_snippet: snippet },
      };
    }
    return {
      ok: false,
      failure: {
        kind: "protocol",
        message: `unexpected response shape: ${ajv.errorsText(validateResponse.errors)}`,
        http_status: httpStatus,
        body_snippet: snippet,
      },
    };
  }

  if (!httpOk || parsed.status !== "successful") {
    return {
      ok: false,
      failure: {
        kind: "execution_failed",
        message: httpOk ? `service status: ${parsed.status}` : `HTTP ${httpStatus}, service status: ${parsed.status}`,
        http_status: httpStatus,
        service_status: parsed.status,
      },
    };
  }

  if (parsed.output?.run?.stdout === undefined) {
    return {
      ok: false,
      failure: {
        kind: "protocol",
        message: "successful response without output.run.stdout",
        http_status: httpStatus,
        service_status: parsed.status,
        body_snippet: snippet,
      },
    };
  }

  return { ok: true, response: parsed };
}

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2147483647;

export function createExecutorClient(cfg: ExecutorClientConfig, deps: ExecutorDeps = {}): ExecutorClient {
  if (!Number.isInteger(cfg.timeoutMs) || cfg.timeoutMs < 1 || cfg.timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`timeoutMs must be an integer in 1..${MAX_TIMEOUT_MS}, got ${cfg.timeoutMs}`);
  }
  const fetchImpl = deps.fetchImpl ?? fetch;
  const now = deps.now ?? (() => performance.now());
  const url = `${cfg.baseUrl}${cfg.path}`;

  async function execute(request: ExecutionRequest): Promise<ExecuteResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), cfg.timeoutMs);
    const started = now();

    try {
      let res: Response;
      let body: BodyRead;
      try {
        res = await fetchImpl(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(request),
          signal: controller.signal,
        });
        body = await readBodyCapped(res, cfg.maxBodyBytes);
      } catch (e) {
        const latency = now() - started;
        const timedOut = controller.signal.aborted;
        return {
          ok: false,
          latency_ms: latency,
          failure: {
            kind: "transport",
            net_error_kind: timedOut ? "timeout" : inferNetErrorKind(e),
            message: timedOut ? `request timed out after ${cfg.timeoutMs}ms` : describeError(e),
          },
        };
      }

      const latency = now() - started;

      if (body.truncated) {
        return {
          ok: false,
          latency_ms: latency,
          failure: {
            kind: "protocol",
            message: `response body exceeded maxBodyBytes=${cfg.maxBodyBytes}`,
            http_status: res.status,
            body_snippet: body.text.slice(0, Math.max(0, cfg.bodySnippetBytes)),
          },
        };
      }

      const classified = classifyResponse(res.status, body.text, cfg.bodySnippetBytes);
      if (!classified.ok) return { ok: false, latency_ms: latency, failure: classified.failure };
      return { ok: true, latency_ms: latency, http_status: res.status, response: classified.response };
    } finally {
      clearTimeout(timer);
    }
  }

  return { url, execute };
}
