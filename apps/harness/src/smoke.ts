// apps/harness/src/smoke.ts
//
// Usage:
//   tsx src/smoke.ts --baseUrl http://localhost:3000 --message "it works"

import { reportFatal } from "cli-utils";
import { resolveSmokeConfig, SMOKE_HELP, wantsHelp } from "./config";
import { createExecutorClient } from "./executorClient";
import { runSmokeCheck } from "./smokeCheck";

async function main(): Promise<number> {
  if (wantsHelp(process.argv)) {
    console.log(SMOKE_HELP);
    return 0;
  }

  const cfg = resolveSmokeConfig(process.argv, process.env);
  const client = createExecutorClient(cfg.client);

  console.log("Smoke check:", client.url);
  const res = await runSmokeCheck(client, cfg.message, cfg.builder);
  console.log(res.line);
  return res.ok ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.exitCode = reportFatal(err);
  }
);
