import { Outcome, fail, missingField, succeed } from "./errors.js";
import { debug } from "./logger.js";
import { JobRecord, ProjectTable, ResolvedJob } from "./types.js";

export interface Resolution {
  readonly matchedTargetKey: string;
  readonly buildCommand: string;
}

/**
 * Find the single configured key a request refers to.
 *
 * A key is a candidate when it starts with `target`. A non-empty `task` narrows candidates to
 * keys starting with `{target}/{task}`. Overlapping prefixes are a configuration error and are
 * reported, never ranked.
 *
 * @param projects - Configured project table.
 * @param project - Repository full name.
 * @param target - Requested branch or ref name.
 * @param task - Optional sub-selector, empty for none.
 * @returns The matched key and command, or the resolution failure.
 */
export function resolveTarget(projects: ProjectTable, project: string, target: string, task = ""): Outcome<Resolution> {
  const targets = projects.get(project);
  if (!targets) {
    return fail({ kind: "unknown-project", project });
  }

  let candidates = [...targets.keys()].filter(key => key.startsWith(target));
  if (candidates.length === 0) {
    return fail({ kind: "unknown-target", project, target });
  }

  if (task) {
    const taskPrefix = `${target}/${task}`;
    candidates = candidates.filter(key => key.startsWith(taskPrefix));
    if (candidates.length === 0) {
      return fail({ kind: "unknown-task", project, target, task });
    }
  }

  if (candidates.length > 1) {
    debug(`Target ${target} in ${project} matches ${candidates.length} keys.`);
    return fail({ kind: "ambiguous-target", target, candidates });
  }

  const [matchedTargetKey] = candidates;
  const buildCommand = targets.get(matchedTargetKey) ?? "";
  return succeed({ matchedTargetKey, buildCommand });
}

/**
 * Bind a normalized job record to its configured build command.
 */
export function resolveJob(record: JobRecord, projects: ProjectTable): Outcome<ResolvedJob> {
  if (!record.project) {
    return missingField("project");
  }
  if (!record.target) {
    return missingField("target");
  }
  const resolution = resolveTarget(projects, record.project, record.target, record.task);
  if (!resolution.ok) {
    return resolution;
  }
  return succeed({ ...record, ...resolution.value });
}
