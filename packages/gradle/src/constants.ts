/**
 * Constants for @gradle-mcp/gradle
 */

import type { OptionSpec } from "./types.js";

export const PACKAGE_NAME = "@gradle-mcp/gradle";

export const LOG_PREFIX = "[gradle]";

// ---------------------------------------------------------------------------
// Safe options: forwarded verbatim
// ---------------------------------------------------------------------------

export const SAFE_OPTIONS: readonly OptionSpec[] = [
  // Logging
  { long: "--debug", short: "-d", takesValue: false },
  { long: "--info", short: "-i", takesValue: false },
  { long: "--warn", short: "-w", takesValue: false },
  { long: "--quiet", short: "-q", takesValue: false },
  { long: "--stacktrace", short: "-s", takesValue: false },
  { long: "--full-stacktrace", short: "-S", takesValue: false },
  { long: "--scan", takesValue: false },
  { long: "--no-scan", takesValue: false },

  // Performance
  { long: "--build-cache", takesValue: false },
  { long: "--no-build-cache", takesValue: false },
  { long: "--configure-on-demand", takesValue: false },
  { long: "--no-configure-on-demand", takesValue: false },
  { long: "--max-workers", takesValue: true },
  { long: "--parallel", takesValue: false },
  { long: "--no-parallel", takesValue: false },

  // Execution
  { long: "--continue", takesValue: false },
  { long: "--dry-run", short: "-m", takesValue: false },
  { long: "--refresh-dependencies", takesValue: false },
  { long: "--rerun-tasks", takesValue: false },
  { long: "--profile", takesValue: false },
  { long: "--exclude-task", short: "-x", takesValue: true },

  // Daemon
  { long: "--daemon", takesValue: false },
  { long: "--no-daemon", takesValue: false },
  { long: "--foreground", takesValue: false },
  { long: "--stop", takesValue: false },
  { long: "--status", takesValue: false },
];

// ---------------------------------------------------------------------------
// Dangerous options: arbitrary code execution or file system escape
// ---------------------------------------------------------------------------

export const DANGEROUS_OPTIONS: readonly OptionSpec[] = [
  { long: "--init-script", short: "-I", takesValue: true },
  { long: "--project-prop", short: "-P", takesValue: true },
  { long: "--system-prop", short: "-D", takesValue: true },
  { long: "--settings-file", short: "-c", takesValue: true },
  { long: "--build-file", short: "-b", takesValue: true },
  { long: "--gradle-user-home", short: "-g", takesValue: true },
  { long: "--project-dir", short: "-p", takesValue: true },
  { long: "--include-build", takesValue: true },
  { long: "--write-verification-metadata", takesValue: true },
  { long: "--project-cache-dir", takesValue: true },
];

// ---------------------------------------------------------------------------
// Task names
// ---------------------------------------------------------------------------

export const CLEAN_KEYWORD = "clean";

export const TASK_NAME_PATTERN = /^[A-Za-z0-9_.:-]+$/;

export const PROJECT_SEGMENT_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const ROOT_PROJECT = ":";

// ---------------------------------------------------------------------------
// Process + output handling
// ---------------------------------------------------------------------------

export const DEFAULT_RUN_FLAGS: readonly string[] = ["--no-build-cache"];

export const CONSOLE_MODES = ["plain", "auto", "rich", "verbose"] as const;

export const DEFAULT_KILL_GRACE_MS = 5_000;

/** First integer directly followed by `%`, not the tail of a decimal */
export const PROGRESS_PATTERN = /(?<![\d.])(\d+)%/;

export const PROGRESS_TOTAL = 100;

export const DEFAULT_MAX_PENDING_PROGRESS = 16;

export const FAILURE_CONTEXT_LINES = 100;

export const FAILURE_MARKERS: readonly string[] = ["FAILURE:", "BUILD FAILED"];

export const DEFAULT_TASK_FAILURE_MESSAGE = "Task failed";

export const DEFAULT_CLEAN_FAILURE_MESSAGE = "Clean failed";
