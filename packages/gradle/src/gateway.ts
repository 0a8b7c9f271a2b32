/**
 * TaskGateway: one Gradle invocation from validation to structured result.
 *
 *   pending → validating → rejected
 *                        → spawning → failed (spawn failure)
 *                                   → running → exited → succeeded
 *                                                      → reconstructing → failed
 */

import {
  GradleArgumentRejectedError,
  GradleGatewayReusedError,
  InternalError,
  getErrorMessage,
} from "@gradle-mcp/errors";
import { DEFAULT_TASK_FAILURE_MESSAGE, LOG_PREFIX } from "./constants.js";
import { reconstructFailure } from "./failure.js";
import { ProgressExtractor } from "./progress.js";
import { type GradleProcess, spawnGradle } from "./runner.js";
import { validateArguments } from "./validator.js";
import type {
  ExitStatus,
  GatewayState,
  LineObserver,
  ProgressSink,
  ResolvedGradleConfig,
  SafetyPolicy,
  TaskResult,
} from "./types.js";

export const GATEWAY_TRANSITIONS: Readonly<Record<GatewayState, readonly GatewayState[]>> = {
  pending: ["validating"],
  validating: ["rejected", "spawning"],
  rejected: [],
  spawning: ["running", "failed"],
  running: ["exited"],
  exited: ["succeeded", "reconstructing"],
  succeeded: [],
  reconstructing: ["failed"],
  failed: [],
};

export interface TaskGatewayOptions {
  readonly config: ResolvedGradleConfig;
  /** Positional task paths, already checked by the task-name gate */
  readonly tasks: readonly string[];
  /** Caller-supplied arguments, validated against the safety policy */
  readonly args?: readonly string[];
  readonly defaultErrorMessage?: string;
  readonly progress?: ProgressSink;
  readonly onStdoutLine?: LineObserver;
  readonly signal?: AbortSignal;
  readonly policy?: SafetyPolicy;
}

function freezeResult(success: boolean, error: string | null, stdout: string, stderr: string): TaskResult {
  return Object.freeze({ success, error, stdout, stderr });
}

/**
 * Builds the argument vector passed to the wrapper: tasks, fixed run flags,
 * then the validated caller arguments.
 */
export function buildCommandLine(
  config: ResolvedGradleConfig,
  tasks: readonly string[],
  args: readonly string[],
): string[] {
  return [
    ...tasks,
    ...config.runFlags,
    ...(config.console !== undefined ? [`--console=${config.console}`] : []),
    ...args,
  ];
}

function abortReason(status: ExitStatus, config: ResolvedGradleConfig): string | undefined {
  if (status.timedOut) {
    return `Gradle timed out after ${config.timeoutMs ?? 0}ms.`;
  }
  if (status.cancelled) {
    return "Gradle run was cancelled.";
  }
  return undefined;
}

export class TaskGateway {
  private currentState: GatewayState = "pending";
  private readonly visited: GatewayState[] = ["pending"];

  constructor(private readonly options: TaskGatewayOptions) {}

  get state(): GatewayState {
    return this.currentState;
  }

  /** Every state entered so far, in order */
  get history(): readonly GatewayState[] {
    return this.visited;
  }

  /**
   * Runs the invocation. A gateway executes once.
   *
   * @throws {GradleGatewayReusedError} on a second call
   */
  async execute(): Promise<TaskResult> {
    if (this.currentState !== "pending") {
      throw new GradleGatewayReusedError(this.currentState);
    }

    const { config, tasks, policy } = this.options;
    const args = this.options.args ?? [];

    this.transition("validating");
    try {
      validateArguments(args, policy);
    } catch (error) {
      if (error instanceof GradleArgumentRejectedError) {
        this.transition("rejected");
        return freezeResult(false, error.message, "", "");
      }
      throw error;
    }

    this.transition("spawning");
    const extractor = this.options.progress ? new ProgressExtractor(this.options.progress) : undefined;
    const onStdoutLine = this.options.onStdoutLine;

    let proc: GradleProcess;
    try {
      proc = await spawnGradle({
        executable: config.wrapperPath,
        args: buildCommandLine(config, tasks, args),
        cwd: config.projectRoot,
        killGraceMs: config.killGraceMs,
        ...(config.env ? { env: config.env } : {}),
        ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
        ...(this.options.signal ? { signal: this.options.signal } : {}),
        onStdoutLine: (line) => {
          extractor?.observe(line);
          onStdoutLine?.(line);
        },
      });
    } catch (error) {
      this.transition("failed");
      const message = getErrorMessage(error);
      console.error(`${LOG_PREFIX} ${message}`);
      return freezeResult(false, message, "", "");
    }

    this.transition("running");
    const output = await proc.completion;
    this.transition("exited");

    if (extractor && extractor.dropped > 0) {
      console.warn(`${LOG_PREFIX} Dropped ${extractor.dropped} progress updates (sink too slow)`);
    }

    const { stdout, stderr, status } = output;
    const reason = abortReason(status, config);
    if (status.code === 0 && reason === undefined) {
      this.transition("succeeded");
      return freezeResult(true, null, stdout, stderr);
    }

    this.transition("reconstructing");
    const reconstructed = reconstructFailure(
      stdout,
      stderr,
      this.options.defaultErrorMessage ?? DEFAULT_TASK_FAILURE_MESSAGE,
    );
    this.transition("failed");
    return freezeResult(
      false,
      reason !== undefined ? `${reason}\n${reconstructed}` : reconstructed,
      stdout,
      stderr,
    );
  }

  private transition(next: GatewayState): void {
    if (!GATEWAY_TRANSITIONS[this.currentState].includes(next)) {
      throw new InternalError(`Illegal task gateway transition ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
    this.visited.push(next);
  }
}
