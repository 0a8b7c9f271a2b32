/**
 * GradleWrapper: the operations exposed to callers, bound to one project.
 */

import { CLEAN_KEYWORD, DEFAULT_CLEAN_FAILURE_MESSAGE, DEFAULT_TASK_FAILURE_MESSAGE } from "./constants.js";
import { listProjects, listTasks } from "./discovery.js";
import { TaskGateway } from "./gateway.js";
import { assertRunnableTask, normalizeProjectPath, qualifyTask } from "./task-gate.js";
import type {
  GradleProject,
  GradleTask,
  LineObserver,
  ProgressSink,
  ResolvedGradleConfig,
  TaskResult,
} from "./types.js";

export interface RunOptions {
  readonly progress?: ProgressSink;
  readonly onStdoutLine?: LineObserver;
  readonly signal?: AbortSignal;
}

export class GradleWrapper {
  constructor(readonly config: ResolvedGradleConfig) {}

  get projectRoot(): string {
    return this.config.projectRoot;
  }

  listProjects(signal?: AbortSignal): Promise<GradleProject[]> {
    return listProjects(this.config, signal);
  }

  /**
   * @throws {GradleTaskRejectedError} for a malformed project path
   */
  listTasks(project?: string, signal?: AbortSignal): Promise<GradleTask[]> {
    return listTasks(this.config, normalizeProjectPath(project), signal);
  }

  /**
   * Runs a task. Rejected arguments and build failures come back as a
   * failed {@link TaskResult}; a rejected task name throws.
   *
   * @throws {GradleTaskRejectedError} for cleaning tasks and malformed names
   */
  runTask(task: string, args: readonly string[] = [], options: RunOptions = {}): Promise<TaskResult> {
    assertRunnableTask(task);
    const gateway = new TaskGateway({
      config: this.config,
      tasks: [task],
      args,
      defaultErrorMessage: DEFAULT_TASK_FAILURE_MESSAGE,
      ...options,
    });
    return gateway.execute();
  }

  /**
   * Runs `clean` for the root project or `<project>:clean`.
   *
   * @throws {GradleTaskRejectedError} for a malformed project path
   */
  clean(project?: string, options: RunOptions = {}): Promise<TaskResult> {
    const path = normalizeProjectPath(project);
    const gateway = new TaskGateway({
      config: this.config,
      tasks: [qualifyTask(path, CLEAN_KEYWORD)],
      defaultErrorMessage: DEFAULT_CLEAN_FAILURE_MESSAGE,
      ...options,
    });
    return gateway.execute();
  }
}
