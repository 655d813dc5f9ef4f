// apps/harness/src/load-test.ts
//
// Load test for the execution API: N requests over W workers, each checked for the exact
// stdout it should produce, then latency statistics.
//
// Usage:
//   tsx src/load-test.ts --baseUrl http://localhost:3000 --requests 50 --concurrency 5
//   tsx src/load-test.ts -n 200 -c 20 --outJson /tmp/load.json --outCsv /tmp/load.csv
//
// Notes:
// - One attempt per request, no retries.
// - If the execution API is not running, every request is reported as a transport error.

import { writeFile } from "node:fs/promises";
import path from "node:path";
import { reportFatal } from "cli-utils";
import { summarize } from "./aggregate";
import { LOAD_TEST_HELP, resolveLoadTestConfig, wantsHelp } from "./config";
import { createExecutorClient } from "./executorClient";
import { runLoadTest } from "./pool";
import { formatOutcomeLine, formatSummary, renderCsv, toJsonReport } from "./report";

async function main(): Promise<number> {
  if (wantsHelp(process.argv)) {
    console.log(LOAD_TEST_HELP);
    return 0;
  }

  const cfg = resolveLoadTestConfig(process.argv, process.env);
  const client = createExecutorClient(cfg.client);

  console.log("Load test started");
  console.log("target:", client.url);
  console.log("requests:", cfg.requests);
  console.log("concurrency:", cfg.concurrency);
  console.log("timeoutMs:", cfg.client.timeoutMs);
  console.log("runtime:", `${cfg.builder.runtime} ${cfg.builder.runtimeVersion}`);

  const startedAt = Date.now();
  const run = await runLoadTest(
    {
      requests: cfg.requests,
      concurrency: cfg.concurrency,
      messagePrefix: cfg.messagePrefix,
      builder: cfg.builder,
    },
    {
      client,
      onOutcome: (o) => {
        if (!cfg.quiet || !o.ok) console.log(formatOutcomeLine(o));
      },
    }
  );

  const summary = summarize(run.outcomes, run.wall_ms);
  console.log("");
  console.log(formatSummary(summary, cfg.concurrency));

  if (cfg.outJson) {
    const outJson = path.resolve(cfg.outJson);
    const json = toJsonReport({
      target: client.url,
      requests: cfg.requests,
      concurrency: cfg.concurrency,
      timeout_ms: cfg.client.timeoutMs,
      started_at: startedAt,
      summary,
      completion_order: run.completion_order,
      outcomes: run.outcomes,
    });
    await writeFile(outJson, json, "utf-8");
    console.log("Wrote JSON:", outJson);
  }
  if (cfg.outCsv) {
    const outCsv = path.resolve(cfg.outCsv);
    await writeFile(outCsv, renderCsv(run.outcomes), "utf-8");
    console.log("Wrote CSV:", outCsv);
  }

  if (summary.flagged.length > 0 && !cfg.allowFail) {
    console.error(`FAIL: ${summary.flagged.length} request(s) failed or mismatched.`);
    return 1;
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.exitCode = reportFatal(err);
  }
);
