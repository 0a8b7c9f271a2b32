import { GradleMcpError } from "./base.js";
import { type ErrorDomain, getCatalogEntry } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all Gradle errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for errors raised while driving the Gradle wrapper.
 *
 * Enables generic catch: `if (e instanceof GradleError)`
 * while specific subclasses allow precise handling.
 */
export abstract class GradleError extends GradleMcpError {}

/**
 * How a rejected argument was classified by the safety policy.
 */
export type RejectedArgumentClassification = "dangerous" | "unrecognized";

// ---------------------------------------------------------------------------
// Argument rejected: dangerous or not allow-listed
// ---------------------------------------------------------------------------

/**
 * Thrown when a caller-supplied argument is dangerous or unrecognized.
 * No process is spawned once this is raised.
 */
export class GradleArgumentRejectedError extends GradleError {
  override readonly _tag = "PermissionError" as const;
  override readonly code = "GRADLE_ARGUMENT_REJECTED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly argument: string;
  readonly classification: RejectedArgumentClassification;

  constructor(argument: string, classification: RejectedArgumentClassification, reason: string) {
    super(reason);
    const entry = getCatalogEntry("GRADLE_ARGUMENT_REJECTED");
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.argument = argument;
    this.classification = classification;
  }
}

// ---------------------------------------------------------------------------
// Task rejected: cleaning task or malformed name
// ---------------------------------------------------------------------------

/**
 * Thrown when a task name or project path cannot be run through the
 * requested operation.
 */
export class GradleTaskRejectedError extends GradleError {
  override readonly _tag = "ValidationError" as const;
  override readonly code = "GRADLE_TASK_REJECTED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly task: string;

  constructor(task: string, message: string) {
    super(message);
    const entry = getCatalogEntry("GRADLE_TASK_REJECTED");
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.task = task;
  }
}

// ---------------------------------------------------------------------------
// Spawn failed: executable missing or not executable
// ---------------------------------------------------------------------------

/**
 * Thrown when the wrapper process cannot be started.
 */
export class GradleSpawnFailedError extends GradleError {
  override readonly _tag = "ExternalError" as const;
  override readonly code = "GRADLE_SPAWN_FAILED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly executable: string;

  constructor(executable: string, reason: string, cause?: Error) {
    super(
      `Failed to start Gradle at ${executable}: ${reason}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = getCatalogEntry("GRADLE_SPAWN_FAILED");
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.executable = executable;
  }
}

// ---------------------------------------------------------------------------
// Stream read failed: I/O error on stdout or stderr
// ---------------------------------------------------------------------------

export class GradleStreamReadError extends GradleError {
  override readonly _tag = "ExternalError" as const;
  override readonly code = "GRADLE_STREAM_READ_FAILED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly stream: "stdout" | "stderr";

  constructor(stream: "stdout" | "stderr", cause: Error) {
    super(`Failed to read Gradle ${stream}: ${cause.message}`, undefined, undefined, { cause });
    const entry = getCatalogEntry("GRADLE_STREAM_READ_FAILED");
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.stream = stream;
  }
}

// ---------------------------------------------------------------------------
// Command failed: discovery command exited non-zero
// ---------------------------------------------------------------------------

/**
 * Thrown when a discovery command (`projects`, `tasks`) exits with a
 * failing status. Task runs never throw this; they return a failed result.
 */
export class GradleCommandFailedError extends GradleError {
  override readonly _tag = "ExternalError" as const;
  override readonly code = "GRADLE_COMMAND_FAILED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(`Gradle command '${command}' failed (exit code ${exitCode ?? "none"}): ${stderr.trim()}`);
    const entry = getCatalogEntry("GRADLE_COMMAND_FAILED");
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

// ---------------------------------------------------------------------------
// Wrapper not found
// ---------------------------------------------------------------------------

export class GradleWrapperNotFoundError extends GradleError {
  override readonly _tag = "NotFoundError" as const;
  override readonly code = "GRADLE_WRAPPER_NOT_FOUND" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly path: string;

  constructor(path: string, hint: string) {
    super(`Gradle wrapper not found at ${path}. ${hint}`);
    const entry = getCatalogEntry("GRADLE_WRAPPER_NOT_FOUND");
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Gateway reused
// ---------------------------------------------------------------------------

/**
 * Thrown when `execute()` is called on a task gateway that already ran.
 */
export class GradleGatewayReusedError extends GradleError {
  override readonly _tag = "ConflictError" as const;
  override readonly code = "GRADLE_GATEWAY_REUSED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly state: string;

  constructor(state: string) {
    super(`Task gateway already executed (state: ${state})`);
    const entry = getCatalogEntry("GRADLE_GATEWAY_REUSED");
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.state = state;
  }
}
