import path from "node:path";
import fs from "fs-extra";
import { Outcome, errorMessage, fail, succeed } from "./errors.js";
import { debug, info } from "./logger.js";
import { encodeJobFile, jobFileName } from "./job-file.js";
import { ResolvedJob, Settings } from "./types.js";

/**
 * Suffixes tried before giving up when several jobs land in the same second.
 */
const MAX_NAME_ATTEMPTS = 100;

export interface EmitOptions {
  readonly now?: () => Date;
  readonly maxAttempts?: number;
}

function isAlreadyExists(cause: unknown): boolean {
  return cause instanceof Error && "code" in cause && cause.code === "EEXIST";
}

/**
 * Write a job file into the spool directory with exclusive create.
 *
 * The name carries the acceptance second; an existing file is never overwritten, the next
 * free `-N` suffix is used instead.
 *
 * @param job - Fully resolved job.
 * @param settings - Spool location plus job-wide settings.
 * @param options - Clock and attempt limit.
 * @returns Path of the written file, or `write-failure`.
 */
export async function emitJob(job: ResolvedJob, settings: Settings, options: EmitOptions = {}): Promise<Outcome<string>> {
  const now = (options.now ?? (() => new Date()))();
  const maxAttempts = options.maxAttempts ?? MAX_NAME_ATTEMPTS;
  const content = encodeJobFile(job, settings);

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const target = path.join(settings.spool, jobFileName(now, attempt));
    try {
      await fs.writeFile(target, content, { encoding: "utf8", flag: "wx" });
      info(`Queued ${job.project} ${job.matchedTargetKey} as ${path.basename(target)}.`);
      return succeed(target);
    } catch (cause) {
      if (isAlreadyExists(cause)) {
        debug(`Job file ${target} exists, trying next suffix.`);
        continue;
      }
      return fail({ kind: "write-failure", reason: errorMessage(cause) });
    }
  }
  return fail({ kind: "write-failure", reason: `no free job file name after ${maxAttempts} attempts` });
}
