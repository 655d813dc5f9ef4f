// packages/shared-types/src/outcome.test.ts
//
// Shape checks for the outcome and response contracts.

import { describe, it, expect } from "vitest";
import type { ExecutionResponse, RequestOutcome } from "./index";

describe("RequestOutcome type", () => {
    it("successful outcome carries no error fields", () => {
        const outcome: RequestOutcome = {
            index: 1,
            expected: "1",
            observed: "1",
            elapsed_ms: 0,
            status: "ok",
            ok: true,
            http_status: 200,
            service_status: "successful",
        };
        expect(outcome.error_kind).toBeUndefined();
        expect(outcome.error).toBeUndefined();
    });

    it("transport failure is distinct from a zero-latency success", () => {
        const outcome: RequestOutcome = {
            index: 2,
            expected: "2",
            observed: null,
            elapsed_ms: 0,
            status: "transport_error",
            ok: false,
            error_kind: "transport",
            net_error_kind: "conn_refused",
            error: "fetch failed",
        };
        expect(outcome.ok).toBe(false);
        expect(outcome.status).toBe("transport_error");
        expect(outcome.observed).toBeNull();
    });
});

describe("ExecutionResponse type", () => {
    it("accepts unknown status strings and extra fields", () => {
        const resp: ExecutionResponse = {
            status: "queued",
            worker: "w-1",
        };
        expect(resp.status).toBe("queued");
        expect(resp.output).toBeUndefined();
        expect(resp["worker"]).toBe("w-1");
    });

    it("exposes run stdout under output.run", () => {
        const resp: ExecutionResponse = {
            status: "successful",
            output: { compile: { stdout: "", exit_code: 0 }, run: { stdout: "7", exit_code: 0, time: 12 } },
        };
        expect(resp.output?.run?.stdout).toBe("7");
        expect(resp.output?.compile?.exit_code).toBe(0);
    });
});
