import { describe, it, expect } from "vitest";
import type { OutcomeStatus, RequestOutcome } from "shared-types";
import { percentile, summarize } from "./aggregate";

function mk(index: number, elapsed_ms: number, status: OutcomeStatus = "ok"): RequestOutcome {
  return {
    index,
    expected: String(index),
    observed: status === "ok" ? String(index) : null,
    elapsed_ms,
    status,
    ok: status === "ok",
  };
}

describe("percentile", () => {
  it("uses the nearest rank", () => {
    expect(percentile([40, 10, 30, 20], 50)).toBe(20);
    expect(percentile([40, 10, 30, 20], 95)).toBe(40);
    expect(percentile([5], 99)).toBe(5);
  });

  it("is 0 for an empty set", () => {
    expect(percentile([], 95)).toBe(0);
  });
});

describe("summarize", () => {
  it("includes failed requests in latency statistics", () => {
    const outcomes = [mk(3, 20), mk(1, 10), mk(4, 40, "transport_error"), mk(2, 30, "mismatch")];
    expect(summarize(outcomes, 55)).toEqual({
      total: 4,
      wall_ms: 55,
      mean_ms: 25,
      min_ms: 10,
      max_ms: 40,
      p50_ms: 20,
      p95_ms: 40,
      p99_ms: 40,
      ok: 2,
      mismatches: 1,
      transport_errors: 1,
      execution_failures: 0,
      protocol_errors: 0,
      flagged: [2, 4],
    });
  });

  it("computes the arithmetic mean of fractional durations", () => {
    const s = summarize([mk(1, 0.1), mk(2, 0.2), mk(3, 0.3)], 0.6);
    expect(s.mean_ms).toBeCloseTo(0.2, 12);
    expect(s.min_ms).toBe(0.1);
    expect(s.max_ms).toBe(0.3);
  });

  it("counts every failure class", () => {
    const s = summarize(
      [mk(1, 1, "execution_failed"), mk(2, 1, "protocol_error"), mk(3, 1, "execution_failed"), mk(4, 1)],
      4
    );
    expect(s.execution_failures).toBe(2);
    expect(s.protocol_errors).toBe(1);
    expect(s.ok).toBe(1);
    expect(s.flagged).toEqual([1, 2, 3]);
  });

  it("keeps a zero-latency success distinct from failures", () => {
    const s = summarize([mk(1, 0)], 0);
    expect(s.ok).toBe(1);
    expect(s.min_ms).toBe(0);
    expect(s.flagged).toEqual([]);
  });

  it("returns zeros for no outcomes", () => {
    const s = summarize([], 0);
    expect(s.total).toBe(0);
    expect(s.mean_ms).toBe(0);
    expect(s.min_ms).toBe(0);
    expect(s.max_ms).toBe(0);
  });
});
