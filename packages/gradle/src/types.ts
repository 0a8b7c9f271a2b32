/**
 * Core type definitions for @gradle-mcp/gradle
 */

import type { GradleStreamReadError } from "@gradle-mcp/errors";
import type { CONSOLE_MODES } from "./constants.js";

// ---------------------------------------------------------------------------
// Safety policy
// ---------------------------------------------------------------------------

export interface OptionSpec {
  readonly long: string;
  readonly short?: string;
  readonly takesValue: boolean;
}

/**
 * Frozen lookup tables built once from the option lists.
 * `safe` and `dangerous` are disjoint; anything in neither is unrecognized.
 */
export interface SafetyPolicy {
  readonly safe: ReadonlySet<string>;
  readonly dangerous: ReadonlySet<string>;
  readonly valueOptions: ReadonlySet<string>;
  readonly fusedPrefixes: ReadonlySet<string>;
}

export type ArgumentClassification = "safe" | "dangerous" | "unrecognized";

/**
 * The syntactic shapes a single caller token can take.
 */
export type ArgumentForm =
  | { readonly kind: "long"; readonly token: string; readonly name: string }
  | {
      readonly kind: "long-inline";
      readonly token: string;
      readonly name: string;
      readonly value: string;
    }
  | { readonly kind: "short"; readonly token: string; readonly name: string }
  | {
      readonly kind: "fused";
      readonly token: string;
      readonly name: string;
      readonly value: string;
    }
  | { readonly kind: "bare"; readonly token: string };

// ---------------------------------------------------------------------------
// Process execution
// ---------------------------------------------------------------------------

export type LineObserver = (line: string) => void;

export interface ProcessInvocation {
  readonly executable: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env?: Readonly<Record<string, string>>;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
  readonly killGraceMs?: number;
  readonly onStdoutLine?: LineObserver;
  readonly onStderrLine?: LineObserver;
}

export interface ExitStatus {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  readonly cancelled: boolean;
  readonly durationMs: number;
}

export interface ProcessOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly status: ExitStatus;
  readonly streamErrors: readonly GradleStreamReadError[];
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

/**
 * Receives progress signals. May return a promise; it is never awaited by
 * the output reader.
 */
export interface ProgressSink {
  report(progress: number, total: number): void | Promise<void>;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface TaskResult {
  readonly success: boolean;
  readonly error: string | null;
  readonly stdout: string;
  readonly stderr: string;
}

export type GatewayState =
  | "pending"
  | "validating"
  | "rejected"
  | "spawning"
  | "running"
  | "exited"
  | "succeeded"
  | "reconstructing"
  | "failed";

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export interface GradleProject {
  readonly name: string;
  readonly path: string;
  readonly description?: string;
}

export interface GradleTask {
  readonly name: string;
  readonly project: string;
  readonly description: string;
  readonly group: string | null;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type ConsoleMode = (typeof CONSOLE_MODES)[number];

export interface ResolvedGradleConfig {
  readonly projectRoot: string;
  readonly wrapperPath: string;
  readonly runFlags: readonly string[];
  readonly console?: ConsoleMode;
  readonly timeoutMs?: number;
  readonly killGraceMs: number;
  readonly env?: Readonly<Record<string, string>>;
}
