/**
 * MCP server exposing the Gradle wrapper as four tools:
 * list_projects, list_project_tasks, run_task and clean.
 */

import { getErrorMessage } from "@gradle-mcp/errors";
import type { GradleWrapper, ProgressSink, RunOptions, TaskResult } from "@gradle-mcp/gradle";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { createRequestLogger, type RequestLogger, type ToolExtra } from "./logging.js";
import { errorResult, jsonResult } from "./results.js";

export const SERVER_NAME = "gradle-mcp";
export const SERVER_VERSION = "0.1.0";

/** The wrapper operations the tools call */
export type GradleOperations = Pick<GradleWrapper, "listProjects" | "listTasks" | "runTask" | "clean">;

export interface GradleMcpServerOptions {
  /**
   * Called once per tool call. Configuration problems thrown here are
   * returned to the client as tool errors.
   */
  readonly resolveWrapper: () => GradleOperations | Promise<GradleOperations>;
  readonly name?: string;
  readonly version?: string;
}

const projectParam = z
  .string()
  .optional()
  .describe("Project path (e.g. ':app'). Omit, or pass '' or ':', for the root project.");

/**
 * Progress sink forwarding to `notifications/progress` when the request
 * carries a progress token.
 */
export function progressSinkFor(extra: ToolExtra): ProgressSink | undefined {
  const progressToken = extra._meta?.progressToken;
  if (progressToken === undefined) return undefined;
  return {
    report: (progress, total) =>
      extra.sendNotification({
        method: "notifications/progress",
        params: { progressToken, progress, total },
      }),
  };
}

function runOptionsFor(extra: ToolExtra, log: RequestLogger): RunOptions {
  const progress = progressSinkFor(extra);
  return {
    ...(progress ? { progress } : {}),
    onStdoutLine: (line) => log.info(line),
    signal: extra.signal,
  };
}

function logOutcome(log: RequestLogger, label: string, result: TaskResult): void {
  if (result.success) {
    log.info(`${label} completed successfully`);
  } else {
    log.error(`${label} failed: ${result.error ?? "unknown error"}`);
  }
}

export function createGradleMcpServer(options: GradleMcpServerOptions): McpServer {
  const server = new McpServer(
    { name: options.name ?? SERVER_NAME, version: options.version ?? SERVER_VERSION },
    { capabilities: { logging: {} } },
  );

  server.tool("list_projects", "List all Gradle projects in the workspace.", async (extra) => {
    const log = createRequestLogger(server.server, extra);
    try {
      log.info("Listing all Gradle projects");
      const wrapper = await options.resolveWrapper();
      const projects = await wrapper.listProjects(extra.signal);
      log.info(`Found ${projects.length} projects: ${projects.map((p) => p.name).join(", ")}`);
      return jsonResult(projects);
    } catch (error) {
      log.error(`Failed to list projects: ${getErrorMessage(error)}`);
      return errorResult(error);
    }
  });

  server.tool(
    "list_project_tasks",
    "List all tasks available in a Gradle project.",
    { project: projectParam },
    async ({ project }, extra) => {
      const log = createRequestLogger(server.server, extra);
      try {
        log.info(`Listing tasks for project: ${project || "root"}`);
        const wrapper = await options.resolveWrapper();
        const tasks = await wrapper.listTasks(project, extra.signal);
        log.info(`Found ${tasks.length} tasks`);
        return jsonResult(tasks);
      } catch (error) {
        log.error(`Failed to list tasks: ${getErrorMessage(error)}`);
        return errorResult(error);
      }
    },
  );

  server.tool(
    "run_task",
    "Run a Gradle task. Cleaning tasks (clean, cleanBuild, ...) and abbreviations of them (cle, cB) " +
      "are refused; use the clean tool.",
    {
      task: z
        .string()
        .describe("Task to run, e.g. 'build' for the root project or ':app:test' for a subproject."),
      args: z
        .array(z.string())
        .optional()
        .describe("Additional Gradle arguments from the safe allow-list, e.g. ['-x', 'test']."),
    },
    async ({ task, args }, extra) => {
      const log = createRequestLogger(server.server, extra);
      try {
        log.info(`Running task: ${task}${args?.length ? ` with args: ${args.join(" ")}` : ""}`);
        const wrapper = await options.resolveWrapper();
        const result = await wrapper.runTask(task, args ?? [], runOptionsFor(extra, log));
        logOutcome(log, `Task ${task}`, result);
        return jsonResult(result);
      } catch (error) {
        log.error(`Failed to run task ${task}: ${getErrorMessage(error)}`);
        return errorResult(error);
      }
    },
  );

  server.tool(
    "clean",
    "Clean build artifacts for a Gradle project. The only way to run cleaning tasks.",
    { project: projectParam },
    async ({ project }, extra) => {
      const log = createRequestLogger(server.server, extra);
      const label = `Clean of project ${project || "root"}`;
      try {
        log.info(`Cleaning project: ${project || "root"}`);
        const wrapper = await options.resolveWrapper();
        const result = await wrapper.clean(project, runOptionsFor(extra, log));
        logOutcome(log, label, result);
        return jsonResult(result);
      } catch (error) {
        log.error(`${label} failed: ${getErrorMessage(error)}`);
        return errorResult(error);
      }
    },
  );

  return server;
}
