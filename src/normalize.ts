import { Outcome, malformed, missingField, succeed } from "./errors.js";
import { JobRecord, JsonObject, JsonValue, PayloadShape, Settings } from "./types.js";

const HEADS_PREFIX = "refs/heads/";

export type Normalizer = (payload: JsonObject, settings: Settings) => Outcome<JobRecord>;

function isRecord(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: JsonValue | undefined): string {
  return typeof value === "string" ? value : "";
}

/**
 * Name of the first field, in the given order, that is not a non-empty string.
 */
function firstMissing(fields: ReadonlyArray<readonly [string, JsonValue | undefined]>): string | undefined {
  return fields.find(([, value]) => text(value) === "")?.[0];
}

/**
 * Drop the first occurrence of `refs/heads/` from a ref.
 *
 * @param ref - Full ref or bare branch name.
 * @returns Branch name, e.g. `release/2024` for `refs/heads/release/2024`.
 */
export function stripHeadsPrefix(ref: string): string {
  return ref.replace(HEADS_PREFIX, "");
}

/**
 * Push-event webhook: nested repository object, full ref, optional commit list.
 */
const normalizeComprehensive: Normalizer = (payload, settings) => {
  const repository: JsonObject = isRecord(payload.repository) ? payload.repository : {};
  const missing = firstMissing([
    ["repository.ssh_url", repository.ssh_url],
    ["repository.full_name", repository.full_name],
    ["ref", payload.ref]
  ]);
  if (missing) {
    return missingField(missing);
  }

  const commits = Array.isArray(payload.commits) ? payload.commits.filter(isRecord) : [];
  const commitMessages = new Map<string, string>();
  for (const entry of commits) {
    commitMessages.set(text(entry.id), text(entry.message));
  }

  return succeed({
    scm: "git",
    repositoryUrl: text(repository.ssh_url),
    project: text(repository.full_name),
    target: stripHeadsPrefix(text(payload.ref)),
    task: "",
    commit: text(payload.after),
    viewUrl: text(payload.compare_url) || text(commits[0]?.url),
    notifications: settings.notifications,
    commitMessages
  });
};

/**
 * Flat body sent by scripts and simple integrations.
 */
const normalizeLightweight: Normalizer = (payload, settings) => {
  const missing = firstMissing([
    ["scm", payload.scm],
    ["repositoryUrl", payload.repositoryUrl],
    ["project", payload.project],
    ["target", payload.target]
  ]);
  if (missing) {
    return missingField(missing);
  }

  const commit = text(payload.commit);
  const commitMessages = new Map<string, string>();
  if (typeof payload.message === "string") {
    commitMessages.set(commit, payload.message);
  }

  return succeed({
    scm: text(payload.scm),
    repositoryUrl: text(payload.repositoryUrl),
    project: text(payload.project),
    target: text(payload.target),
    task: text(payload.task),
    commit,
    viewUrl: text(payload.viewUrl),
    notifications: text(payload.notifications) || settings.notifications,
    commitMessages
  });
};

/**
 * Command-only body from the standalone ingestion path. `branch` is already bare.
 */
const normalizeAdhoc: Normalizer = (payload, settings) => {
  const missing = firstMissing([
    ["scm", payload.scm],
    ["repositoryUrl", payload.repositoryUrl],
    ["repositoryName", payload.repositoryName],
    ["commit", payload.commit],
    ["branch", payload.branch]
  ]);
  if (missing) {
    return missingField(missing);
  }

  return succeed({
    scm: text(payload.scm),
    repositoryUrl: text(payload.repositoryUrl),
    project: text(payload.repositoryName),
    target: text(payload.branch),
    task: "",
    commit: text(payload.commit),
    viewUrl: text(payload.viewUrl),
    notifications: settings.notifications,
    commitMessages: new Map()
  });
};

const NORMALIZERS: Readonly<Record<PayloadShape, Normalizer>> = {
  comprehensive: normalizeComprehensive,
  lightweight: normalizeLightweight,
  adhoc: normalizeAdhoc
};

/**
 * Turn a decoded request body into a job record.
 *
 * Required fields are checked in a fixed order per shape; the first missing one is reported.
 *
 * @param shape - Wire format selected by the endpoint.
 * @param payload - Decoded JSON body.
 * @param settings - Defaults for fields the payload does not carry.
 * @returns Job record, `validation` naming the missing field, or `malformed-request` for a non-object body.
 */
export function normalizePayload(shape: PayloadShape, payload: JsonValue, settings: Settings): Outcome<JobRecord> {
  if (!isRecord(payload)) {
    return malformed("payload is not a JSON object");
  }
  return NORMALIZERS[shape](payload, settings);
}
