// apps/harness/src/aggregate.ts
//
// Summary statistics over a finished run. Failed requests count toward latency too.

import type { RequestOutcome, RunSummary } from "shared-types";

/** Nearest-rank percentile on a copy of `arr`; 0 for an empty set. */
export function percentile(arr: readonly number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length);
  const idx = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[idx] ?? 0;
}

export function summarize(outcomes: readonly RequestOutcome[], wallMs: number): RunSummary {
  const durations = outcomes.map((o) => o.elapsed_ms);
  const total = outcomes.length;
  const count = (status: RequestOutcome["status"]) => outcomes.filter((o) => o.status === status).length;

  return {
    total,
    wall_ms: wallMs,
    mean_ms: total ? durations.reduce((a, b) => a + b, 0) / total : 0,
    min_ms: durations.reduce((a, b) => Math.min(a, b), durations[0] ?? 0),
    max_ms: durations.reduce((a, b) => Math.max(a, b), durations[0] ?? 0),
    p50_ms: percentile(durations, 50),
    p95_ms: percentile(durations, 95),
    p99_ms: percentile(durations, 99),
    ok: count("ok"),
    mismatches: count("mismatch"),
    transport_errors: count("transport_error"),
    execution_failures: count("execution_failed"),
    protocol_errors: count("protocol_error"),
    flagged: outcomes
      .filter((o) => !o.ok)
      .map((o) => o.index)
      .sort((a, b) => a - b),
  };
}
