/**
 * ProcessRunner: spawns the Gradle wrapper and reads its output line by line.
 *
 * No shell is involved: the argument vector goes to the OS as-is. A non-zero
 * exit is not an error here; callers inspect the {@link ExitStatus}.
 */

import { type ChildProcessByStdio, spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import {
  GradleSpawnFailedError,
  GradleStreamReadError,
  getErrorMessage,
} from "@gradle-mcp/errors";
import { DEFAULT_KILL_GRACE_MS, LOG_PREFIX } from "./constants.js";
import type { ExitStatus, LineObserver, ProcessInvocation, ProcessOutput } from "./types.js";

/**
 * A running Gradle process.
 */
export interface GradleProcess {
  readonly pid: number | undefined;
  /** Settles after the process closed and both output streams are drained */
  readonly completion: Promise<ProcessOutput>;
  /** SIGTERM, then SIGKILL after the grace period */
  cancel(): void;
}

interface LineCollector {
  readonly lines: string[];
  readonly done: Promise<void>;
}

function collectLines(
  stream: Readable,
  name: "stdout" | "stderr",
  observer: LineObserver | undefined,
  onError: (error: GradleStreamReadError) => void,
): LineCollector {
  const lines: string[] = [];
  const reader = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });

  reader.on("line", (line) => {
    lines.push(line);
    if (!observer) return;
    try {
      observer(line);
    } catch (error) {
      console.warn(`${LOG_PREFIX} ${name} observer threw: ${getErrorMessage(error)}`);
    }
  });

  const done = new Promise<void>((resolve) => {
    let reported = false;
    const fail = (error: Error) => {
      if (!reported) {
        reported = true;
        onError(new GradleStreamReadError(name, error));
      }
      resolve();
    };
    reader.on("close", () => resolve());
    reader.on("error", fail);
    stream.on("error", fail);
  });

  return { lines, done };
}

/**
 * Starts Gradle. Resolves once the OS reports the process running.
 *
 * @throws {GradleSpawnFailedError} when the executable cannot be started
 */
export function spawnGradle(invocation: ProcessInvocation): Promise<GradleProcess> {
  const { executable } = invocation;
  const killGraceMs = invocation.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  const start = performance.now();

  // Compose abort signals: own cancel + timeout + caller signal
  const controller = new AbortController();
  const timeoutSignal =
    invocation.timeoutMs !== undefined ? AbortSignal.timeout(invocation.timeoutMs) : undefined;
  const combinedSignal = AbortSignal.any([
    controller.signal,
    ...(timeoutSignal ? [timeoutSignal] : []),
    ...(invocation.signal ? [invocation.signal] : []),
  ]);

  return new Promise<GradleProcess>((resolve, reject) => {
    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawnChild(invocation);
    } catch (error) {
      reject(
        new GradleSpawnFailedError(
          executable,
          getErrorMessage(error),
          error instanceof Error ? error : undefined,
        ),
      );
      return;
    }

    const streamErrors: GradleStreamReadError[] = [];
    const recordStreamError = (error: GradleStreamReadError) => {
      streamErrors.push(error);
      console.error(`${LOG_PREFIX} ${error.message}`);
    };

    const stdout = collectLines(child.stdout, "stdout", invocation.onStdoutLine, recordStreamError);
    const stderr = collectLines(child.stderr, "stderr", invocation.onStderrLine, recordStreamError);

    let spawned = false;
    let aborted = false;
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const onAbort = () => {
      if (aborted) return;
      aborted = true;
      timedOut = timeoutSignal?.aborted ?? false;

      // SIGTERM first
      child.kill("SIGTERM");

      // SIGKILL after grace period
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill("SIGKILL");
        }
      }, killGraceMs);
      killTimer.unref();
    };

    const closed = new Promise<{ code: number | null; signal: NodeJS.Signals | null }>(
      (resolveClose) => {
        child.on("close", (code, signal) => {
          combinedSignal.removeEventListener("abort", onAbort);
          if (killTimer) clearTimeout(killTimer);
          resolveClose({ code, signal });
        });
      },
    );

    child.on("error", (error) => {
      if (!spawned) {
        combinedSignal.removeEventListener("abort", onAbort);
        reject(new GradleSpawnFailedError(executable, error.message, error));
        return;
      }
      console.error(`${LOG_PREFIX} Gradle process error (pid ${child.pid}): ${error.message}`);
    });

    child.on("spawn", () => {
      spawned = true;

      const completion = Promise.all([closed, stdout.done, stderr.done]).then(
        ([{ code, signal }]): ProcessOutput => {
          const status: ExitStatus = {
            code,
            signal,
            timedOut,
            cancelled: aborted && !timedOut,
            durationMs: Math.round(performance.now() - start),
          };
          return {
            stdout: stdout.lines.join("\n"),
            stderr: stderr.lines.join("\n"),
            status,
            streamErrors,
          };
        },
      );

      if (combinedSignal.aborted) {
        onAbort();
      } else {
        combinedSignal.addEventListener("abort", onAbort, { once: true });
      }

      resolve({
        pid: child.pid,
        completion,
        cancel: () => controller.abort(),
      });
    });
  });
}

function spawnChild(invocation: ProcessInvocation): ChildProcessByStdio<null, Readable, Readable> {
  return spawn(invocation.executable, [...invocation.args], {
    cwd: invocation.cwd,
    ...(invocation.env ? { env: { ...process.env, ...invocation.env } } : {}),
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });
}
