// apps/runtime-env/src/index.ts
//
// Usage:
//   tsx src/index.ts [--repoRoot <path>] [--template runtimes/template.nix] [--runtimes runtimes] [--out runtimes/default.nix]

import path from "node:path";
import { makeArgvHelpers, reportFatal } from "cli-utils";
import { generateRuntimeEnv } from "./runtimeEnv";

const HELP_TEXT = `
Usage:
  runtime-env [--repoRoot <path>] [--template <file>] [--runtimes <dir>] [--out <file>]

Options:
  --repoRoot   Paths are resolved from here (default: INIT_CWD or cwd)
  --template   Nix template with a single %s marker (default: runtimes/template.nix)
  --runtimes   Directory of runtime *.yaml descriptors (default: runtimes)
  --out        Generated file (default: runtimes/default.nix)
  --help, -h   Show this help
`.trim();

async function main(): Promise<void> {
  const h = makeArgvHelpers(process.argv, HELP_TEXT);
  if (h.hasFlag("--help", "-h")) {
    console.log(HELP_TEXT);
    return;
  }
  h.assertNoUnknownOptions(new Set(["--repoRoot", "--template", "--runtimes", "--out", "--help", "-h"]));
  h.assertHasValue("--repoRoot", "--template", "--runtimes", "--out");

  const repoRoot = h.getArg("--repoRoot") ?? process.env.INIT_CWD ?? process.cwd();
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.resolve(repoRoot, p));

  const result = await generateRuntimeEnv({
    templatePath: resolve(h.getArg("--template") ?? "runtimes/template.nix"),
    runtimesDir: resolve(h.getArg("--runtimes") ?? "runtimes"),
    outputPath: resolve(h.getArg("--out") ?? "runtimes/default.nix"),
  });

  console.log("descriptors:", result.descriptors.join(", ") || "(none)");
  console.log("packages:", result.packages.length);
  console.log(`Generated ${path.relative(repoRoot, result.outputPath) || result.outputPath}`);
}

main().catch((err: unknown) => {
  process.exitCode = reportFatal(err);
});
