import { describe, it, expect } from "vitest";
import { buildExecutionRequest, expectedStdout, messageForIndex, parseRuntimeName } from "./requestBuilder";

describe("buildExecutionRequest", () => {
  it("builds the default go payload", () => {
    expect(buildExecutionRequest("7")).toEqual({
      runtime: { name: "go", version: "3.12" },
      project: { entry: 'package main\nimport "fmt"\n\nfunc main() {\n\tfmt.Print("7")\n}' },
      process: { time: "2s", permissions: { read: true } },
    });
  });

  it("uses Println for the newline variant", () => {
    const req = buildExecutionRequest("it works", { newline: true });
    expect(req.project.entry).toBe('package main\nimport "fmt"\n\nfunc main() {\n\tfmt.Println("it works")\n}');
  });

  it("supports python3", () => {
    expect(buildExecutionRequest("hi", { runtime: "python3", runtimeVersion: "3.12" }).project.entry).toBe(
      'print("hi", end="")'
    );
    expect(buildExecutionRequest("hi", { runtime: "python3", newline: true }).project.entry).toBe('print("hi")');
  });

  it("forwards limits and permissions", () => {
    const req = buildExecutionRequest("1", { cpuTime: "500ms", allowRead: false, runtimeVersion: "1.22" });
    expect(req.runtime.version).toBe("1.22");
    expect(req.process).toEqual({ time: "500ms", permissions: { read: false } });
  });

  it("embeds the message verbatim, without escaping", () => {
    const req = buildExecutionRequest('a"b');
    expect(req.project.entry).toContain('fmt.Print("a"b")');
  });

  it("serializes to the wire field names", () => {
    const wire = JSON.parse(JSON.stringify(buildExecutionRequest("5")));
    expect(wire.runtime.name).toBe("go");
    expect(wire.project.entry).toContain('"5"');
    expect(wire.process.time).toBe("2s");
    expect(wire.process.permissions.read).toBe(true);
  });
});

describe("request helpers", () => {
  it("maps an index to its message", () => {
    expect(messageForIndex(3)).toBe("3");
    expect(messageForIndex(3, "req-")).toBe("req-3");
  });

  it("expects a trailing newline only for the newline variant", () => {
    expect(expectedStdout("x", false)).toBe("x");
    expect(expectedStdout("x", true)).toBe("x\n");
  });

  it("rejects unknown runtimes", () => {
    expect(parseRuntimeName("python3")).toBe("python3");
    expect(() => parseRuntimeName("ruby")).toThrow("Unsupported runtime: ruby (supported: go, python3)");
  });
});
