// apps/harness/src/pool.ts
//
// Bounded worker pool. Requests are handed out in index order 1..N; completion order is free.
// Each worker writes only its own pre-allocated slot, so results need no locking.

import type { ErrorKind, OutcomeStatus, RequestOutcome } from "shared-types";
import type { ExecuteResult, ExecutorClient } from "./executorClient";
import {
  buildExecutionRequest,
  expectedStdout,
  messageForIndex,
  parseRuntimeName,
  type RequestBuilderOptions,
} from "./requestBuilder";
import { describeMismatch, extractStdout, verify } from "./verifier";

/**
 * Calls `fn` for every item with at most `concurrency` calls in flight. Workers claim items
 * from one shared iterator, so they start in item order. `onSettled` sees each result in
 * completion order; the returned array is in item order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<R>,
  onSettled?: (result: R, idx: number) => void
): Promise<R[]> {
  const slots: R[] = new Array(items.length);
  const queue = items.entries();

  async function drain(): Promise<void> {
    for (const [idx, item] of queue) {
      const result = await fn(item, idx);
      slots[idx] = result;
      onSettled?.(result, idx);
    }
  }

  const workers = Math.min(Math.max(1, Math.floor(concurrency)), items.length);
  await Promise.all(Array.from({ length: workers }, () => drain()));
  return slots;
}

export type LoadTestOptions = {
  requests: number;
  concurrency: number;
  messagePrefix?: string;
  builder?: Partial<RequestBuilderOptions>;
};

export type LoadTestDeps = {
  client: Pick<ExecutorClient, "execute">;
  now?: () => number;
  /** Called once per request, in completion order. */
  onOutcome?: (outcome: RequestOutcome) => void;
};

export type LoadTestRun = {
  /** Index order: `outcomes[i - 1].index === i`. */
  outcomes: RequestOutcome[];
  /** Request indices in the order they completed. */
  completion_order: number[];
  wall_ms: number;
};

const STATUS_FOR_KIND: Record<ErrorKind, OutcomeStatus> = {
  transport: "transport_error",
  execution_failed: "execution_failed",
  protocol: "protocol_error",
};

export function toOutcome(index: number, expected: string, result: ExecuteResult): RequestOutcome {
  if (!result.ok) {
    const f = result.failure;
    return {
      index,
      expected,
      observed: null,
      elapsed_ms: result.latency_ms,
      status: STATUS_FOR_KIND[f.kind],
      ok: false,
      error_kind: f.kind,
      error: f.message,
      ...(f.net_error_kind !== undefined ? { net_error_kind: f.net_error_kind } : {}),
      ...(f.http_status !== undefined ? { http_status: f.http_status } : {}),
      ...(f.service_status !== undefined ? { service_status: f.service_status } : {}),
    };
  }

  const observed = extractStdout(result.response);
  const match = verify(expected, result.response);
  return {
    index,
    expected,
    observed,
    elapsed_ms: result.latency_ms,
    status: match ? "ok" : "mismatch",
    ok: match,
    http_status: result.http_status,
    service_status: result.response.status,
    ...(match ? {} : { error: describeMismatch(expected, result.response) }),
  };
}

function assertPositiveInt(name: string, v: number): void {
  if (!Number.isInteger(v) || v < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${v}`);
  }
}

/**
 * Runs `requests` logical requests through `concurrency` workers and resolves once every
 * one of them has an outcome. Per-request failures never reject.
 */
export async function runLoadTest(opts: LoadTestOptions, deps: LoadTestDeps): Promise<LoadTestRun> {
  assertPositiveInt("requests", opts.requests);
  assertPositiveInt("concurrency", opts.concurrency);
  if (opts.builder?.runtime !== undefined) parseRuntimeName(opts.builder.runtime);

  const now = deps.now ?? (() => performance.now());
  const prefix = opts.messagePrefix ?? "";
  const newline = opts.builder?.newline ?? false;

  const indices = Array.from({ length: opts.requests }, (_, i) => i + 1);
  const completionOrder: number[] = [];

  async function runOne(index: number): Promise<RequestOutcome> {
    const message = messageForIndex(index, prefix);
    const expected = expectedStdout(message, newline);
    const started = now();

    let result: ExecuteResult;
    try {
      result = await deps.client.execute(buildExecutionRequest(message, opts.builder));
    } catch (e) {
      result = {
        ok: false,
        latency_ms: now() - started,
        failure: { kind: "transport", message: e instanceof Error ? `${e.name}: ${e.message}` : String(e) },
      };
    }
    return toOutcome(index, expected, result);
  }

  function settled(outcome: RequestOutcome): void {
    completionOrder.push(outcome.index);
    deps.onOutcome?.(outcome);
  }

  const wallStarted = now();
  const outcomes = await runWithConcurrency(indices, opts.concurrency, runOne, settled);
  const wallMs = now() - wallStarted;

  return { outcomes, completion_order: completionOrder, wall_ms: wallMs };
}
