/**
 * Project and task discovery: `gradlew projects -q` and `gradlew tasks --all`.
 */

import { GradleCommandFailedError } from "@gradle-mcp/errors";
import { ROOT_PROJECT } from "./constants.js";
import { spawnGradle } from "./runner.js";
import { qualifyTask } from "./task-gate.js";
import type { GradleProject, GradleTask, ProcessOutput, ResolvedGradleConfig } from "./types.js";

const PROJECT_LINE_PATTERN = /Project '([^']+)'/;
const TASK_WITH_DESCRIPTION_PATTERN = /^([A-Za-z_][\w.:-]*)\s+-\s+(.+)$/;
const TASK_ONLY_PATTERN = /^[A-Za-z_][\w.:-]*$/;
const GROUP_HEADER_SUFFIX = " tasks";
const RULES_HEADER = "Rules";

/**
 * Parses `projects -q` output. The root project is reported once as `:`,
 * followed by every `Project ':x'` line.
 */
export function parseProjectsOutput(output: string, projectRoot: string): GradleProject[] {
  const projects: GradleProject[] = [];
  let rootAdded = false;

  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trim();

    if (line.includes("Root project")) {
      if (!rootAdded) {
        projects.push({ name: ROOT_PROJECT, path: projectRoot, description: "Root project" });
        rootAdded = true;
      }
      continue;
    }

    const match = PROJECT_LINE_PATTERN.exec(line);
    if (match?.[1] && match[1] !== ROOT_PROJECT) {
      projects.push({ name: match[1], path: projectRoot });
    }
  }

  return projects;
}

function isGroupHeader(line: string): boolean {
  const first = line[0];
  return (
    line.endsWith(GROUP_HEADER_SUFFIX) &&
    first !== undefined &&
    first >= "A" &&
    first <= "Z"
  );
}

/**
 * Parses `tasks --all` output into tasks grouped under their section header.
 */
export function parseTasksOutput(output: string, project: string): GradleTask[] {
  const tasks: GradleTask[] = [];
  let group: string | null = null;

  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.length === 0) continue;

    if (isGroupHeader(line)) {
      group = line.slice(0, -GROUP_HEADER_SUFFIX.length).trim();
      continue;
    }

    // Task rules are patterns, not tasks
    if (line === RULES_HEADER) {
      group = null;
      continue;
    }

    // Separators and rule descriptions
    if (line.startsWith("-") || line.includes("Pattern:")) continue;

    if (line.includes("To see all tasks") || line.startsWith("BUILD")) break;

    if (group === null) continue;

    const described = TASK_WITH_DESCRIPTION_PATTERN.exec(line);
    if (described?.[1] && described[2]) {
      tasks.push({ name: described[1], project, description: described[2], group });
    } else if (TASK_ONLY_PATTERN.test(line)) {
      tasks.push({ name: line, project, description: "", group });
    }
  }

  return tasks;
}

/**
 * Runs a discovery command to completion.
 *
 * @throws {GradleCommandFailedError} on a failing exit status
 */
export async function runDiscoveryCommand(
  config: ResolvedGradleConfig,
  args: readonly string[],
  signal?: AbortSignal,
): Promise<ProcessOutput> {
  const proc = await spawnGradle({
    executable: config.wrapperPath,
    args,
    cwd: config.projectRoot,
    killGraceMs: config.killGraceMs,
    ...(config.env ? { env: config.env } : {}),
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
    ...(signal ? { signal } : {}),
  });
  const output = await proc.completion;
  if (output.status.code !== 0) {
    throw new GradleCommandFailedError(args.join(" "), output.status.code, output.stderr);
  }
  return output;
}

export async function listProjects(
  config: ResolvedGradleConfig,
  signal?: AbortSignal,
): Promise<GradleProject[]> {
  const output = await runDiscoveryCommand(config, ["projects", "-q"], signal);
  return parseProjectsOutput(output.stdout, config.projectRoot);
}

/**
 * @param project normalized project path (`:` for the root)
 */
export async function listTasks(
  config: ResolvedGradleConfig,
  project: string,
  signal?: AbortSignal,
): Promise<GradleTask[]> {
  const output = await runDiscoveryCommand(config, [qualifyTask(project, "tasks"), "--all"], signal);
  return parseTasksOutput(output.stdout, project);
}
