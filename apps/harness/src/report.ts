// apps/harness/src/report.ts
//
// Human-readable and machine-readable renderings of a run.

import type { RequestOutcome, RunSummary } from "shared-types";

export const FLAG_MARKER = "[!] ";

export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

export function formatOutcomeLine(o: RequestOutcome): string {
  const prefix = o.ok ? "" : FLAG_MARKER;
  const time = `time: ${formatSeconds(o.elapsed_ms)} seconds`;

  if (o.status === "ok" || o.status === "mismatch") {
    return (
      `${prefix}Request ${o.index}: status: ${o.service_status ?? "?"}, ` +
      `output: ${JSON.stringify(o.observed)} (expected: ${JSON.stringify(o.expected)}), ${time}`
    );
  }
  return `${prefix}Request ${o.index}: ${o.status}: ${o.error ?? "unknown error"}, ${time}`;
}

export function formatSummary(s: RunSummary, workers: number): string {
  const lines = [
    `Total elapsed time for ${s.total} requests with ${workers} workers: ${formatSeconds(s.wall_ms)} seconds`,
    `Mean time: ${formatSeconds(s.mean_ms)} seconds, Max time: ${formatSeconds(s.max_ms)} seconds, ` +
      `Min time: ${formatSeconds(s.min_ms)} seconds`,
    `p50: ${formatSeconds(s.p50_ms)} seconds, p95: ${formatSeconds(s.p95_ms)} seconds, p99: ${formatSeconds(s.p99_ms)} seconds`,
    `OK: ${s.ok}, mismatches: ${s.mismatches}, transport errors: ${s.transport_errors}, ` +
      `execution failures: ${s.execution_failures}, protocol errors: ${s.protocol_errors}`,
  ];
  if (s.flagged.length) lines.push(`${FLAG_MARKER}Flagged requests: ${s.flagged.join(", ")}`);
  return lines.join("\n");
}

function csvCell(v: string | number | boolean | null | undefined): string {
  if (v === null || v === undefined) return "";
  const s = String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function renderCsv(outcomes: readonly RequestOutcome[]): string {
  const header = "index,status,ok,elapsed_ms,http_status,service_status,expected,observed,error\n";
  const rows = outcomes
    .map((o) =>
      [
        o.index,
        o.status,
        o.ok ? "1" : "0",
        Math.round(o.elapsed_ms),
        o.http_status,
        o.service_status,
        o.expected,
        o.observed,
        o.error,
      ]
        .map(csvCell)
        .join(",")
    )
    .join("\n");
  return header + rows + "\n";
}

export type JsonReport = {
  target: string;
  requests: number;
  concurrency: number;
  timeout_ms: number;
  started_at: number;
  summary: RunSummary;
  completion_order: number[];
  outcomes: readonly RequestOutcome[];
};

export function toJsonReport(report: JsonReport): string {
  return JSON.stringify(report, null, 2);
}
