// apps/runtime-env/src/runtimeEnv.ts
//
// Merges the `nix_pkgs` lists of every runtime descriptor into the worker's nix template.

import { readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import * as yaml from "yaml";

export const TEMPLATE_MARKER = "%s";
export const PACKAGE_SEPARATOR = "\n    ";

export type RuntimeEnvOptions = {
  templatePath: string;
  runtimesDir: string;
  outputPath: string;
};

export type RuntimeEnvResult = {
  outputPath: string;
  descriptors: string[];
  packages: string[];
  content: string;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Reads `nix_pkgs` from one descriptor. A missing list means no packages. */
export function parseNixPkgs(source: string, fileName: string): string[] {
  const doc: unknown = yaml.parse(source);
  if (doc === null || doc === undefined) return [];
  if (!isRecord(doc)) throw new Error(`${fileName}: expected a mapping at the top level`);

  const pkgs = doc.nix_pkgs;
  if (pkgs === undefined || pkgs === null) return [];
  if (!Array.isArray(pkgs) || !pkgs.every((p): p is string => typeof p === "string")) {
    throw new Error(`${fileName}: nix_pkgs must be a list of strings`);
  }
  return pkgs;
}

/** Replaces the first marker of `template` with the packages, one per line. */
export function renderTemplate(template: string, packages: readonly string[]): string {
  const at = template.indexOf(TEMPLATE_MARKER);
  if (at === -1) throw new Error(`template has no ${TEMPLATE_MARKER} marker`);
  return template.slice(0, at) + packages.join(PACKAGE_SEPARATOR) + template.slice(at + TEMPLATE_MARKER.length);
}

export async function generateRuntimeEnv(opts: RuntimeEnvOptions): Promise<RuntimeEnvResult> {
  const template = await readFile(opts.templatePath, "utf-8");

  const entries = await readdir(opts.runtimesDir, { withFileTypes: true });
  const descriptors = entries
    .filter((e) => e.isFile() && e.name.endsWith(".yaml"))
    .map((e) => e.name)
    .sort();

  const packages: string[] = [];
  for (const name of descriptors) {
    const source = await readFile(path.join(opts.runtimesDir, name), "utf-8");
    packages.push(...parseNixPkgs(source, name));
  }

  const content = renderTemplate(template, packages);
  await writeFile(opts.outputPath, content, "utf-8");

  return { outputPath: opts.outputPath, descriptors, packages, content };
}
