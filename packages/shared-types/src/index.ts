// packages/shared-types/src/index.ts
//
// Canonical contract types shared by the harness and its CLIs.
// NO runtime logic — only types.

/* ------------------------------------------------------------------ */
/*  Execution API contract                                             */
/* ------------------------------------------------------------------ */

export type RuntimeName = "go" | "python3";

export type Permissions = {
    read: boolean;
    write?: boolean;
    network?: boolean;
};

/** Body of `POST /api/v1/execute`. One instance per logical request. */
export type ExecutionRequest = {
    readonly runtime: { readonly name: string; readonly version: string };
    readonly project: { readonly entry: string };
    readonly process: {
        /** CPU time limit as a duration string, e.g. "2s". */
        readonly time: string;
        readonly permissions: Readonly<Permissions>;
    };
};

/** Status strings the service is known to report. Anything else is still accepted. */
export type ExecutionStatus = "successful" | "error" | "failed";

export type ProcessResult = {
    /** A string from a well-behaved service; any other JSON value is kept as reported. */
    stdout?: unknown;
    stderr?: string;
    output?: string;
    /** ms */
    time?: number;
    /** bytes */
    memory?: number;
    exit_code?: number;
};

export type ExecutionResponse = {
    status: ExecutionStatus | (string & {});
    output?: {
        compile?: ProcessResult;
        run?: ProcessResult;
    };
    [key: string]: unknown;
};

/* ------------------------------------------------------------------ */
/*  Failures                                                           */
/* ------------------------------------------------------------------ */

export type ErrorKind = "transport" | "execution_failed" | "protocol";

export type NetErrorKind =
    | "dns"
    | "tls"
    | "conn_refused"
    | "conn_reset"
    | "socket_hang_up"
    | "proxy"
    | "timeout"
    | "unknown";

export type ExecutorFailure = {
    kind: ErrorKind;
    message: string;
    net_error_kind?: NetErrorKind;
    http_status?: number;
    /** Status string reported by the service, when the body carried one. */
    service_status?: string;
    body_snippet?: string;
};

/* ------------------------------------------------------------------ */
/*  Outcomes & summary                                                 */
/* ------------------------------------------------------------------ */

export type OutcomeStatus = "ok" | "mismatch" | "transport_error" | "execution_failed" | "protocol_error";

/** Result of one logical request. Written once by the worker that ran it. */
export type RequestOutcome = {
    readonly index: number;
    readonly expected: string;
    /** Captured stdout (a non-string value as its JSON text), or null when there was none. */
    readonly observed: string | null;
    /** Time until the response was read, or until the failure surfaced. */
    readonly elapsed_ms: number;
    readonly status: OutcomeStatus;
    /** HTTP, service status and content all matched. */
    readonly ok: boolean;
    readonly service_status?: string;
    readonly http_status?: number;
    readonly error_kind?: ErrorKind;
    readonly net_error_kind?: NetErrorKind;
    readonly error?: string;
};

export type RunSummary = {
    total: number;
    wall_ms: number;
    mean_ms: number;
    min_ms: number;
    max_ms: number;
    p50_ms: number;
    p95_ms: number;
    p99_ms: number;
    ok: number;
    mismatches: number;
    transport_errors: number;
    execution_failures: number;
    protocol_errors: number;
    /** Indices of every outcome that is not ok, ascending. */
    flagged: number[];
};
