/**
 * Task-name gate: runs before any gateway or argument validation.
 */

import { GradleTaskRejectedError } from "@gradle-mcp/errors";
import {
  CLEAN_KEYWORD,
  PROJECT_SEGMENT_PATTERN,
  ROOT_PROJECT,
  TASK_NAME_PATTERN,
} from "./constants.js";

/**
 * True when the last segment of a task path starts or ends with "clean",
 * case-insensitively (`clean`, `cleanTest`, `:app:clean`, `deepClean`).
 *
 * Gradle also resolves abbreviations (`cle` → `clean`, `cB` → `cleanBuild`),
 * so a segment whose first camel-case word is a prefix of "clean" counts too.
 * This rejects a few abbreviations of other `c…` tasks, such as `cJ`.
 */
export function isCleaningTask(task: string): boolean {
  const segments = task.split(":");
  const segment = segments[segments.length - 1] ?? "";
  const last = segment.toLowerCase();
  if (last.startsWith(CLEAN_KEYWORD) || last.endsWith(CLEAN_KEYWORD)) return true;

  const firstWord = (segment.split(/(?=[A-Z])/)[0] ?? "").toLowerCase();
  return firstWord.length > 0 && CLEAN_KEYWORD.startsWith(firstWord);
}

/**
 * @throws {GradleTaskRejectedError} for malformed names and cleaning tasks
 */
export function assertRunnableTask(task: string): void {
  if (task.trim().length === 0) {
    throw new GradleTaskRejectedError(task, "Task name must not be empty.");
  }
  if (task.startsWith("-")) {
    throw new GradleTaskRejectedError(
      task,
      `Task '${task}' looks like a command-line option. Pass options through args instead.`,
    );
  }
  if (!TASK_NAME_PATTERN.test(task)) {
    throw new GradleTaskRejectedError(
      task,
      `Task '${task}' contains characters that are not allowed in a task path.`,
    );
  }
  if (isCleaningTask(task)) {
    throw new GradleTaskRejectedError(
      task,
      `Task '${task}' is a cleaning task and cannot be run via run_task. ` +
        "Please use the clean tool instead.",
    );
  }
}

/**
 * Normalizes a project path. `undefined`, `""` and `":"` mean the root project.
 *
 * @throws {GradleTaskRejectedError} for paths that are not `:`-separated names
 */
export function normalizeProjectPath(project?: string): string {
  if (project === undefined || project === "" || project === ROOT_PROJECT) {
    return ROOT_PROJECT;
  }

  const body = project.startsWith(":") ? project.slice(1) : project;
  const segments = body.split(":");
  if (!segments.every((segment) => PROJECT_SEGMENT_PATTERN.test(segment))) {
    throw new GradleTaskRejectedError(project, `Invalid project path '${project}'.`);
  }
  return `:${segments.join(":")}`;
}

export function isRootProject(project: string): boolean {
  return project === ROOT_PROJECT;
}

/**
 * Prefixes a task with its project path; root tasks stay unqualified.
 */
export function qualifyTask(project: string, task: string): string {
  return isRootProject(project) ? task : `${project}:${task}`;
}
