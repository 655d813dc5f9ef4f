import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile, mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { generateRuntimeEnv, parseNixPkgs, renderTemplate } from "./runtimeEnv";

const TEMPLATE = "let\n  myPackages = [\n    pkgs.gnumake\n    %s\n  ];\nin\n";

describe("parseNixPkgs", () => {
  it("reads the package list", () => {
    expect(parseNixPkgs("name: go\nnix_pkgs:\n  - pkgs.go\n  - pkgs.gopls\n", "go.yaml")).toEqual(["pkgs.go", "pkgs.gopls"]);
  });

  it("treats a missing list or empty file as no packages", () => {
    expect(parseNixPkgs("name: bash\n", "bash.yaml")).toEqual([]);
    expect(parseNixPkgs("", "empty.yaml")).toEqual([]);
  });

  it("rejects a non-list value", () => {
    expect(() => parseNixPkgs("nix_pkgs: pkgs.go\n", "go.yaml")).toThrow("go.yaml: nix_pkgs must be a list of strings");
  });
});

describe("renderTemplate", () => {
  it("replaces only the first marker", () => {
    expect(renderTemplate("[%s] %s", ["a", "b"])).toBe("[a\n    b] %s");
  });

  it("requires a marker", () => {
    expect(() => renderTemplate("no marker", ["a"])).toThrow("template has no %s marker");
  });
});

describe("generateRuntimeEnv", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "runtime-env-"));
    await mkdir(path.join(dir, "runtimes"));
    await writeFile(path.join(dir, "template.nix"), TEMPLATE, "utf-8");
    await writeFile(path.join(dir, "runtimes", "python3.yaml"), "nix_pkgs:\n  - pkgs.python312\n", "utf-8");
    await writeFile(path.join(dir, "runtimes", "go.yaml"), "nix_pkgs:\n  - pkgs.go\n", "utf-8");
    await writeFile(path.join(dir, "runtimes", "notes.txt"), "nix_pkgs:\n  - pkgs.ignored\n", "utf-8");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("merges every descriptor in name order and writes the result", async () => {
    const out = path.join(dir, "default.nix");
    const result = await generateRuntimeEnv({
      templatePath: path.join(dir, "template.nix"),
      runtimesDir: path.join(dir, "runtimes"),
      outputPath: out,
    });

    const expected = "let\n  myPackages = [\n    pkgs.gnumake\n    pkgs.go\n    pkgs.python312\n  ];\nin\n";
    expect(result.descriptors).toEqual(["go.yaml", "python3.yaml"]);
    expect(result.packages).toEqual(["pkgs.go", "pkgs.python312"]);
    expect(result.content).toBe(expected);
    expect(await readFile(out, "utf-8")).toBe(expected);
  });
});
