import { GradleWrapperNotFoundError } from "@gradle-mcp/errors";
import { GradleWrapper } from "@gradle-mcp/gradle";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CallToolResultSchema,
  type LoggingLevel,
  LoggingMessageNotificationSchema,
  type Progress,
} from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createGradleMcpServer, type GradleMcpServerOptions } from "../../server.js";
import { createFakeGradle, PROJECTS, SUCCESS, TASKS } from "../helpers/fake-gradle.js";

/**
 * Full round-trip: SDK Client → InMemoryTransport → Gradle MCP server → fake wrapper.
 */

interface Connected {
  readonly client: Client;
  readonly server: McpServer;
}

async function connect(options: GradleMcpServerOptions): Promise<Connected> {
  const server = createGradleMcpServer(options);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);
  return { client, server };
}

async function callTool(
  client: Client,
  name: string,
  args: Record<string, unknown> = {},
  onprogress?: (progress: Progress) => void,
) {
  const raw = await client.callTool(
    { name, arguments: args },
    undefined,
    onprogress ? { onprogress } : undefined,
  );
  const result = CallToolResultSchema.parse(raw);
  const first = result.content[0];
  const text = first?.type === "text" ? first.text : "null";
  const body: unknown = JSON.parse(text);
  return { isError: result.isError === true, body };
}

describe("Gradle MCP server", () => {
  let connected: Connected | undefined;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    await connected?.client.close();
    await connected?.server.close();
    connected = undefined;
    vi.restoreAllMocks();
  });

  it("lists the four tools", async () => {
    connected = await connect({ resolveWrapper: () => createFakeGradle() });

    const { tools } = await connected.client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      "clean",
      "list_project_tasks",
      "list_projects",
      "run_task",
    ]);
  });

  it("declares the logging capability", async () => {
    connected = await connect({ resolveWrapper: () => createFakeGradle() });

    expect(connected.client.getServerCapabilities()?.logging).toEqual({});
  });

  describe("log messages", () => {
    function collectLevels(client: Client): LoggingLevel[] {
      const levels: LoggingLevel[] = [];
      client.setNotificationHandler(LoggingMessageNotificationSchema, (notification) => {
        levels.push(notification.params.level);
      });
      return levels;
    }

    it("sends each output line at info level", async () => {
      connected = await connect({ resolveWrapper: () => createFakeGradle([25, 75]) });
      const levels = collectLevels(connected.client);

      await callTool(connected.client, "run_task", { task: "build" });

      await vi.waitFor(() => {
        expect(levels.length).toBeGreaterThan(0);
      });
      expect(levels.every((level) => level === "info")).toBe(true);
    });

    it("honors the level the client sets", async () => {
      connected = await connect({ resolveWrapper: () => createFakeGradle([25, 75]) });
      const levels = collectLevels(connected.client);
      await connected.client.setLoggingLevel("error");

      const { body } = await callTool(connected.client, "run_task", { task: "build" });

      expect(body).toEqual(SUCCESS);
      expect(levels).toEqual([]);
    });
  });

  describe("list_projects", () => {
    it("returns the projects as JSON", async () => {
      connected = await connect({ resolveWrapper: () => createFakeGradle() });

      const { isError, body } = await callTool(connected.client, "list_projects");

      expect(isError).toBe(false);
      expect(body).toEqual(PROJECTS);
    });

    it("reports configuration failures as tool errors", async () => {
      connected = await connect({
        resolveWrapper: () => {
          throw new GradleWrapperNotFoundError("/work/shop/gradlew", "Set GRADLE_WRAPPER.");
        },
      });

      const { isError, body } = await callTool(connected.client, "list_projects");

      expect(isError).toBe(true);
      expect(body).toEqual({
        code: "GRADLE_WRAPPER_NOT_FOUND",
        message: "Gradle wrapper not found at /work/shop/gradlew. Set GRADLE_WRAPPER.",
      });
    });

    it("wraps unexpected errors as INTERNAL_ERROR", async () => {
      const gradle = createFakeGradle();
      gradle.listProjects.mockRejectedValueOnce(new Error("disk on fire"));
      connected = await connect({ resolveWrapper: () => gradle });

      const { isError, body } = await callTool(connected.client, "list_projects");

      expect(isError).toBe(true);
      expect(body).toEqual({ code: "INTERNAL_ERROR", message: "disk on fire" });
    });
  });

  describe("list_project_tasks", () => {
    it("passes the project through", async () => {
      const gradle = createFakeGradle();
      connected = await connect({ resolveWrapper: () => gradle });

      const { body } = await callTool(connected.client, "list_project_tasks", { project: ":api" });

      expect(body).toEqual(TASKS);
      expect(gradle.listTasks).toHaveBeenCalledWith(":api", expect.any(AbortSignal));
    });

    it("lists root tasks when no project is given", async () => {
      const gradle = createFakeGradle();
      connected = await connect({ resolveWrapper: () => gradle });

      await callTool(connected.client, "list_project_tasks");

      expect(gradle.listTasks).toHaveBeenCalledWith(undefined, expect.any(AbortSignal));
    });
  });

  describe("run_task", () => {
    it("returns the task result", async () => {
      const gradle = createFakeGradle();
      connected = await connect({ resolveWrapper: () => gradle });

      const { isError, body } = await callTool(connected.client, "run_task", {
        task: "build",
        args: ["--info"],
      });

      expect(isError).toBe(false);
      expect(body).toEqual(SUCCESS);
      expect(gradle.runTask).toHaveBeenCalledWith("build", ["--info"], expect.any(Object));
    });

    it("forwards progress notifications when a token is present", async () => {
      connected = await connect({ resolveWrapper: () => createFakeGradle([25, 75]) });
      const seen: Array<[number, number | undefined]> = [];

      await callTool(connected.client, "run_task", { task: "build" }, ({ progress, total }) => {
        seen.push([progress, total]);
      });

      expect(seen).toEqual([
        [25, 100],
        [75, 100],
      ]);
    });

    it("refuses cleaning tasks with a tool error", async () => {
      const wrapper = new GradleWrapper({
        projectRoot: "/work/shop",
        wrapperPath: "/work/shop/gradlew",
        runFlags: ["--no-build-cache"],
        killGraceMs: 5000,
      });
      connected = await connect({ resolveWrapper: () => wrapper });

      const { isError, body } = await callTool(connected.client, "run_task", { task: "cleanTest" });

      expect(isError).toBe(true);
      expect(body).toEqual({
        code: "GRADLE_TASK_REJECTED",
        message:
          "Task 'cleanTest' is a cleaning task and cannot be run via run_task. Please use the clean tool instead.",
      });
    });

    it("returns rejected arguments as a failed result", async () => {
      const wrapper = new GradleWrapper({
        projectRoot: "/work/shop",
        wrapperPath: "/work/shop/gradlew",
        runFlags: ["--no-build-cache"],
        killGraceMs: 5000,
      });
      connected = await connect({ resolveWrapper: () => wrapper });

      const { isError, body } = await callTool(connected.client, "run_task", {
        task: "build",
        args: ["-Pversion=1"],
      });

      expect(isError).toBe(false);
      expect(body).toEqual({
        success: false,
        error:
          "Argument '-Pversion=1' is not allowed due to security concerns. " +
          "It could enable arbitrary code execution or unauthorized file access.",
        stdout: "",
        stderr: "",
      });
    });
  });

  describe("clean", () => {
    it("cleans the requested project", async () => {
      const gradle = createFakeGradle();
      connected = await connect({ resolveWrapper: () => gradle });

      const { body } = await callTool(connected.client, "clean", { project: ":api" });

      expect(body).toEqual(SUCCESS);
      expect(gradle.clean).toHaveBeenCalledWith(":api", expect.any(Object));
    });

    it("forwards progress for clean as well", async () => {
      connected = await connect({ resolveWrapper: () => createFakeGradle([50]) });
      const seen: number[] = [];

      await callTool(connected.client, "clean", {}, ({ progress }) => {
        seen.push(progress);
      });

      expect(seen).toEqual([50]);
    });
  });
});
