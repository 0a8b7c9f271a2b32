/**
 * FailureReconstructor: recovers the root-cause error from build output.
 *
 * Gradle prints task failures and their details on stdout and the
 * `FAILURE:` / `BUILD FAILED` summary on stderr, so the two captures are
 * joined stdout-first before searching backward from the summary.
 */

import { FAILURE_CONTEXT_LINES, FAILURE_MARKERS } from "./constants.js";

function isFailureMarker(line: string): boolean {
  return FAILURE_MARKERS.some((marker) => line.includes(marker));
}

function isTaskFailureLine(line: string): boolean {
  return line.includes("> Task ") && line.includes("FAILED");
}

/**
 * Builds a single error string from a failed run's captured output.
 * Never throws and never returns an empty string.
 */
export function reconstructFailure(stdout: string, stderr: string, defaultMessage: string): string {
  const combined = stdout && stderr ? `${stdout}\n${stderr}` : stdout || stderr;
  const trimmed = combined.trim();
  if (trimmed.length === 0) {
    return defaultMessage;
  }

  const lines = trimmed.split(/\r?\n/);

  let markerIdx = -1;
  for (let i = lines.length - 1; i >= 0; i--) {
    if (isFailureMarker(lines[i] ?? "")) {
      markerIdx = i;
      break;
    }
  }

  if (markerIdx === -1) {
    return lines.slice(-FAILURE_CONTEXT_LINES).join("\n");
  }

  // Walk the whole prefix: with --continue there may be several failed tasks
  let firstTaskIdx = -1;
  for (let i = markerIdx - 1; i >= 0; i--) {
    if (isTaskFailureLine(lines[i] ?? "")) {
      firstTaskIdx = i;
    }
  }

  const start = firstTaskIdx !== -1 ? firstTaskIdx : Math.max(0, markerIdx - FAILURE_CONTEXT_LINES);
  return lines.slice(start).join("\n");
}
