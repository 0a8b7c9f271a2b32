/**
 * @gradle-mcp/gradle
 *
 * Safe, structured access to a project's Gradle wrapper.
 *
 * Provides:
 * - Allow-list / deny-list validation of caller arguments
 * - Child process spawning with line-by-line stdout/stderr reading
 * - Progress extraction from Gradle's console output
 * - Root-cause reconstruction for failed builds
 * - Project and task discovery
 */

// Config
export {
  defaultWrapperName,
  type GradleConfig,
  GradleConfigSchema,
  loadGradleConfigFromEnv,
  type ResolveGradleConfigOptions,
  resolveGradleConfig,
} from "./config.js";
// Constants
export {
  CONSOLE_MODES,
  DANGEROUS_OPTIONS,
  DEFAULT_CLEAN_FAILURE_MESSAGE,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_RUN_FLAGS,
  DEFAULT_TASK_FAILURE_MESSAGE,
  FAILURE_CONTEXT_LINES,
  PACKAGE_NAME,
  ROOT_PROJECT,
  SAFE_OPTIONS,
} from "./constants.js";
// Discovery
export {
  listProjects,
  listTasks,
  parseProjectsOutput,
  parseTasksOutput,
  runDiscoveryCommand,
} from "./discovery.js";
// Failure reconstruction
export { reconstructFailure } from "./failure.js";
// Gateway
export {
  buildCommandLine,
  GATEWAY_TRANSITIONS,
  TaskGateway,
  type TaskGatewayOptions,
} from "./gateway.js";
// Policy
export { createSafetyPolicy, SAFETY_POLICY } from "./policy.js";
// Progress
export { parseProgress, ProgressExtractor, type ProgressExtractorOptions } from "./progress.js";
// Runner
export { type GradleProcess, spawnGradle } from "./runner.js";
// Task gate
export {
  assertRunnableTask,
  isCleaningTask,
  isRootProject,
  normalizeProjectPath,
  qualifyTask,
} from "./task-gate.js";
// Types
export type {
  ArgumentClassification,
  ArgumentForm,
  ConsoleMode,
  ExitStatus,
  GatewayState,
  GradleProject,
  GradleTask,
  LineObserver,
  OptionSpec,
  ProcessInvocation,
  ProcessOutput,
  ProgressSink,
  ResolvedGradleConfig,
  SafetyPolicy,
  TaskResult,
} from "./types.js";
// Validator
export {
  ArgumentValidator,
  classifyArgument,
  parseArgumentForm,
  validateArguments,
} from "./validator.js";
// Wrapper
export { GradleWrapper, type RunOptions } from "./wrapper.js";
