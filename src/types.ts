/**
 * JSON value as produced by `JSON.parse`, used for request payloads without `any`.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

/**
 * Target name (a branch, or `branch/task`) to shell build command, for one project.
 */
export type TargetTable = ReadonlyMap<string, string>;

/**
 * Project identifier (`owner/repo`) to its targets.
 *
 * Invariant: the reserved settings group `_` is never a key.
 */
export type ProjectTable = ReadonlyMap<string, TargetTable>;

/**
 * The three wire formats a build request can arrive in.
 */
export type PayloadShape = "comprehensive" | "lightweight" | "adhoc";

export const PAYLOAD_SHAPES: readonly PayloadShape[] = ["comprehensive", "lightweight", "adhoc"];

/**
 * Process-wide values read from the `_` group of the configuration file.
 *
 * @property spool - Directory the executor watches for job files.
 * @property notifications - Default notification mode copied into each job.
 * @property mode - Execution mode for the executor (`normal` or `dry-run`).
 * @property mailto - Recipient for build notifications, possibly empty.
 * @property routes - Extra ingestion endpoints declared by this deployment.
 */
export interface Settings {
  readonly spool: string;
  readonly notifications: string;
  readonly mode: string;
  readonly mailto: string;
  readonly routes: ReadonlyMap<string, PayloadShape>;
}

export interface BridgeConfig {
  readonly projects: ProjectTable;
  readonly settings: Settings;
}

/**
 * One parsed inbound request. Lives for a single connection.
 *
 * @property headers - Lower-cased header names; the last occurrence of a name wins.
 * @property body - Exactly `content-length` bytes.
 */
export interface IncomingRequest {
  readonly method: string;
  readonly path: string;
  readonly protocolVersion: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
}

/**
 * Canonical build request, independent of the wire shape it arrived in.
 *
 * Invariant: `project` and `target` are non-empty once normalization succeeds.
 */
export interface JobRecord {
  readonly scm: string;
  readonly repositoryUrl: string;
  readonly project: string;
  readonly target: string;
  readonly task: string;
  readonly commit: string;
  readonly viewUrl: string;
  readonly notifications: string;
  readonly commitMessages: ReadonlyMap<string, string>;
}

/**
 * Job record bound to exactly one configured target.
 *
 * @property matchedTargetKey - Configuration key that matched, e.g. `release-2024` for target `release`.
 */
export interface ResolvedJob extends JobRecord {
  readonly buildCommand: string;
  readonly matchedTargetKey: string;
}
