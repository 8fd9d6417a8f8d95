/**
 * Every expected way a request can fail. Each variant maps to exactly one response.
 */
export type Failure =
  | { readonly kind: "configuration-missing"; readonly path: string }
  | { readonly kind: "configuration-invalid"; readonly reason: string }
  | { readonly kind: "malformed-request"; readonly reason: string }
  | { readonly kind: "validation"; readonly field: string }
  | { readonly kind: "unknown-project"; readonly project: string }
  | { readonly kind: "unknown-target"; readonly project: string; readonly target: string }
  | { readonly kind: "unknown-task"; readonly project: string; readonly target: string; readonly task: string }
  | { readonly kind: "ambiguous-target"; readonly target: string; readonly candidates: readonly string[] }
  | { readonly kind: "write-failure"; readonly reason: string }
  | { readonly kind: "not-found"; readonly path: string }
  | { readonly kind: "method-not-allowed"; readonly method: string; readonly allowed: readonly string[] };

export type Outcome<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly failure: Failure };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(failure: Failure): Outcome<T> {
  return { ok: false, failure };
}

export function malformed<T = never>(reason: string): Outcome<T> {
  return fail({ kind: "malformed-request", reason });
}

export function missingField<T = never>(field: string): Outcome<T> {
  return fail({ kind: "validation", field });
}

/**
 * Human-readable description of a failure.
 *
 * Used verbatim as the response body for validation and resolution failures, and
 * for log lines otherwise.
 *
 * @param failure - Failure to describe.
 * @returns One-line description.
 */
export function describeFailure(failure: Failure): string {
  switch (failure.kind) {
    case "configuration-missing":
      return `Configuration file not found: ${failure.path}`;
    case "configuration-invalid":
      return `Invalid configuration: ${failure.reason}`;
    case "malformed-request":
      return `Malformed request: ${failure.reason}`;
    case "validation":
      return `Missing required field: ${failure.field}`;
    case "unknown-project":
      return `Unknown project: ${failure.project}`;
    case "unknown-target":
      return `Unknown target "${failure.target}" for project ${failure.project}`;
    case "unknown-task":
      return `Unknown task "${failure.task}" for target "${failure.target}" in project ${failure.project}`;
    case "ambiguous-target":
      return `Ambiguous target "${failure.target}" matches: ${failure.candidates.join(", ")}`;
    case "write-failure":
      return `Job file write failed: ${failure.reason}`;
    case "not-found":
      return `No endpoint at ${failure.path}`;
    case "method-not-allowed":
      return `Method ${failure.method} not allowed; expected ${failure.allowed.join(", ")}`;
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
