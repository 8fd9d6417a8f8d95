import ini from "ini";
import { ResolvedJob, Settings } from "./types.js";

const JOB_SECTION = "job";
const JOB_EXTENSION = "ini";
const MESSAGE_KEY_PREFIX = "message-";

export const JOB_FIELDS = [
  "scm",
  "project",
  "repositoryUrl",
  "commit",
  "task",
  "target",
  "buildCommand",
  "viewUrl",
  "mailto",
  "mode",
  "notifications"
] as const;

export type JobField = (typeof JOB_FIELDS)[number];

/**
 * Job file as the executor sees it. `target` is the configuration key that matched.
 */
export type JobFileContents = { readonly [field in JobField]: string } & {
  readonly commitMessages: ReadonlyMap<string, string>;
};

// Anything an INI reader could take for a delimiter, comment, quote, section or line break.
const NEEDS_QUOTING = /[\r\n\u2028\u2029=;#"'\\[\]]/;

/**
 * Escape a value for the job file. Plain values stay readable; anything else is written as
 * a JSON string literal, which INI readers unquote.
 */
export function encodeValue(value: string): string {
  if (value === "") {
    return value;
  }
  if (!NEEDS_QUOTING.test(value) && value === value.trim()) {
    return value;
  }
  // JSON.stringify leaves U+2028/U+2029 raw, and a regex `.` stops at them.
  return JSON.stringify(value).replace(/\u2028/g, "\\u2028").replace(/\u2029/g, "\\u2029");
}

// Unpaired UTF-16 surrogates, which JSON accepts and encodeURIComponent rejects.
const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

/**
 * Job file key for a commit message. Lone surrogates in the id become U+FFFD.
 */
export function messageKey(commitId: string): string {
  return `${MESSAGE_KEY_PREFIX}${encodeURIComponent(commitId.replace(LONE_SURROGATE, "\ufffd"))}`;
}

function line(key: string, value: string): string {
  const encoded = encodeValue(value);
  return encoded ? `${key} = ${encoded}` : `${key} =`;
}

/**
 * Serialize a resolved job to the INI document the executor picks up.
 *
 * Invariant: no payload text can add keys or sections; commit ids are percent-encoded in keys
 * and values are quoted whenever they contain INI syntax.
 *
 * @param job - Resolved job.
 * @param settings - Source of `mailto` and `mode`.
 * @returns Document text ending with a newline.
 */
export function encodeJobFile(job: ResolvedJob, settings: Settings): string {
  const values: { readonly [field in JobField]: string } = {
    scm: job.scm,
    project: job.project,
    repositoryUrl: job.repositoryUrl,
    commit: job.commit,
    task: job.task,
    target: job.matchedTargetKey,
    buildCommand: job.buildCommand,
    viewUrl: job.viewUrl,
    mailto: settings.mailto,
    mode: settings.mode,
    notifications: job.notifications
  };
  const lines = [`[${JOB_SECTION}]`, ...JOB_FIELDS.map(field => line(field, values[field]))];
  for (const [commitId, message] of job.commitMessages) {
    lines.push(line(messageKey(commitId), message));
  }
  return `${lines.join("\n")}\n`;
}

function fieldText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  // `ini` decodes bare true/false/null; the job file only ever holds text.
  return value === undefined ? "" : String(value);
}

/**
 * Read a job file back. Inverse of {@link encodeJobFile}.
 *
 * @param text - Job file document.
 * @returns Field values and commit messages; absent fields read as empty strings.
 * @throws Error if the document has no job section.
 */
export function parseJobFile(text: string): JobFileContents {
  const section: unknown = ini.parse(text)[JOB_SECTION];
  if (typeof section !== "object" || section === null) {
    throw new Error(`Job file has no [${JOB_SECTION}] section`);
  }
  const entries = new Map(Object.entries(section));
  const commitMessages = new Map<string, string>();
  for (const [key, value] of entries) {
    if (key.startsWith(MESSAGE_KEY_PREFIX)) {
      commitMessages.set(decodeURIComponent(key.slice(MESSAGE_KEY_PREFIX.length)), fieldText(value));
    }
  }
  const field = (name: JobField): string => fieldText(entries.get(name));
  return {
    scm: field("scm"),
    project: field("project"),
    repositoryUrl: field("repositoryUrl"),
    commit: field("commit"),
    task: field("task"),
    target: field("target"),
    buildCommand: field("buildCommand"),
    viewUrl: field("viewUrl"),
    mailto: field("mailto"),
    mode: field("mode"),
    notifications: field("notifications"),
    commitMessages
  };
}

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Job file name from local wall-clock time at one-second resolution.
 *
 * @param now - Time of acceptance.
 * @param attempt - Collision counter; 0 gives the plain name, N appends `-N`.
 * @returns Name like `20240506-070809.ini` or `20240506-070809-1.ini`.
 */
export function jobFileName(now: Date, attempt = 0): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return attempt > 0 ? `${stamp}-${attempt}.${JOB_EXTENSION}` : `${stamp}.${JOB_EXTENSION}`;
}
