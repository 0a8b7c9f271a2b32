import { spawn } from "node:child_process";
import { GradleSpawnFailedError } from "@gradle-mcp/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { spawnGradle } from "../../runner.js";
import type { ProcessInvocation } from "../../types.js";
import { type ChildScript, FakeChildProcess, spawnError } from "../helpers/fake-child.js";

vi.mock("node:child_process", () => ({ spawn: vi.fn() }));

const mockedSpawn = vi.mocked(spawn);

function useChild(script: ChildScript): FakeChildProcess {
  const child = new FakeChildProcess(script);
  mockedSpawn.mockImplementationOnce(() => child.asChildProcess());
  return child;
}

function invocation(overrides?: Partial<ProcessInvocation>): ProcessInvocation {
  return {
    executable: "/work/app/gradlew",
    args: ["build", "--no-build-cache"],
    cwd: "/work/app",
    ...overrides,
  };
}

describe("spawnGradle", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("spawns the wrapper directly with piped output", async () => {
    useChild({ code: 0 });

    const proc = await spawnGradle(invocation());
    await proc.completion;

    expect(mockedSpawn).toHaveBeenCalledWith(
      "/work/app/gradlew",
      ["build", "--no-build-cache"],
      expect.objectContaining({ cwd: "/work/app", stdio: ["ignore", "pipe", "pipe"] }),
    );
    expect(mockedSpawn.mock.calls[0]?.[2]).not.toHaveProperty("shell");
  });

  it("merges extra environment over the parent environment", async () => {
    useChild({ code: 0 });

    const proc = await spawnGradle(invocation({ env: { JAVA_HOME: "/opt/jdk" } }));
    await proc.completion;

    const options = mockedSpawn.mock.calls[0]?.[2];
    expect(options?.env?.JAVA_HOME).toBe("/opt/jdk");
  });

  it("collects stdout and stderr independently", async () => {
    useChild({
      stdout: ["> Task :compileJava", "BUILD SUCCESSFUL in 2s"],
      stderr: ["warning: deprecated API"],
      code: 0,
    });

    const proc = await spawnGradle(invocation());
    const output = await proc.completion;

    expect(proc.pid).toBe(4242);
    expect(output.stdout).toBe("> Task :compileJava\nBUILD SUCCESSFUL in 2s");
    expect(output.stderr).toBe("warning: deprecated API");
    expect(output.status).toMatchObject({
      code: 0,
      signal: null,
      timedOut: false,
      cancelled: false,
    });
    expect(output.status.durationMs).toBeGreaterThanOrEqual(0);
    expect(output.streamErrors).toEqual([]);
  });

  it("hands each line to the observers as it is read", async () => {
    useChild({ stdout: ["one", "two"], stderr: ["err"], code: 0 });
    const seenOut: string[] = [];
    const seenErr: string[] = [];

    const proc = await spawnGradle(
      invocation({
        onStdoutLine: (line) => seenOut.push(line),
        onStderrLine: (line) => seenErr.push(line),
      }),
    );
    await proc.completion;

    expect(seenOut).toEqual(["one", "two"]);
    expect(seenErr).toEqual(["err"]);
  });

  it("keeps reading when an observer throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    useChild({ stdout: ["a", "b"], code: 0 });

    const proc = await spawnGradle(
      invocation({
        onStdoutLine: () => {
          throw new Error("observer broke");
        },
      }),
    );
    const output = await proc.completion;

    expect(output.stdout).toBe("a\nb");
    expect(warn).toHaveBeenCalledWith("[gradle] stdout observer threw: observer broke");
  });

  it("reports a non-zero exit as status, not as an error", async () => {
    useChild({ stderr: ["FAILURE: Build failed with an exception."], code: 1 });

    const proc = await spawnGradle(invocation());
    const output = await proc.completion;

    expect(output.status.code).toBe(1);
    expect(output.stderr).toBe("FAILURE: Build failed with an exception.");
  });

  it("rejects with GradleSpawnFailedError when the wrapper is missing", async () => {
    useChild({ spawnError: spawnError("ENOENT", "spawn /work/app/gradlew ENOENT") });

    const promise = spawnGradle(invocation());

    await expect(promise).rejects.toBeInstanceOf(GradleSpawnFailedError);
    await expect(promise).rejects.toThrow(
      "Failed to start Gradle at /work/app/gradlew: spawn /work/app/gradlew ENOENT",
    );
  });

  it("rejects when spawn throws synchronously", async () => {
    mockedSpawn.mockImplementationOnce(() => {
      throw new TypeError("invalid argument");
    });

    await expect(spawnGradle(invocation())).rejects.toThrow(
      "Failed to start Gradle at /work/app/gradlew: invalid argument",
    );
  });

  it("sends SIGTERM on cancel and reports cancellation", async () => {
    const child = useChild({ stdout: ["> Task :test"], exitOn: ["SIGTERM"] });

    const proc = await spawnGradle(invocation());
    proc.cancel();
    const output = await proc.completion;

    expect(child.kill).toHaveBeenCalledTimes(1);
    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
    expect(output.status).toMatchObject({
      code: null,
      signal: "SIGTERM",
      cancelled: true,
      timedOut: false,
    });
  });

  it("escalates to SIGKILL after the grace period", async () => {
    const child = useChild({ exitOn: ["SIGKILL"] });

    const proc = await spawnGradle(invocation({ killGraceMs: 10 }));
    proc.cancel();
    const output = await proc.completion;

    expect(child.kill.mock.calls).toEqual([["SIGTERM"], ["SIGKILL"]]);
    expect(output.status.signal).toBe("SIGKILL");
  });

  it("marks the run as timed out when the timeout fires", async () => {
    const child = useChild({ exitOn: ["SIGTERM"] });

    const proc = await spawnGradle(invocation({ timeoutMs: 10 }));
    const output = await proc.completion;

    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
    expect(output.status.timedOut).toBe(true);
    expect(output.status.cancelled).toBe(false);
  });

  it("kills immediately when the caller signal is already aborted", async () => {
    const child = useChild({ exitOn: ["SIGTERM"] });
    const controller = new AbortController();
    controller.abort();

    const proc = await spawnGradle(invocation({ signal: controller.signal }));
    const output = await proc.completion;

    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
    expect(output.status.cancelled).toBe(true);
  });

  it("records a stream read failure once and still completes", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const child = useChild({});

    const proc = await spawnGradle(invocation());
    child.stdout.destroy(new Error("EPIPE"));
    child.exit(1, null);
    const output = await proc.completion;

    expect(output.streamErrors).toHaveLength(1);
    expect(output.streamErrors[0]?.message).toBe("Failed to read Gradle stdout: EPIPE");
    expect(output.streamErrors[0]?.stream).toBe("stdout");
    expect(error).toHaveBeenCalledWith("[gradle] Failed to read Gradle stdout: EPIPE");
    expect(output.status.code).toBe(1);
  });
});
