/**
 * ProgressExtractor: turns Gradle's console progress into numeric signals.
 *
 * `<============-> 93% EXECUTING [19s]` yields progress 93 of 100.
 */

import { getErrorMessage } from "@gradle-mcp/errors";
import {
  DEFAULT_MAX_PENDING_PROGRESS,
  LOG_PREFIX,
  PROGRESS_PATTERN,
  PROGRESS_TOTAL,
} from "./constants.js";
import type { ProgressSink } from "./types.js";

/**
 * Returns the first percentage on the line, or undefined when there is none
 * or it lies outside 0..100.
 */
export function parseProgress(line: string): number | undefined {
  const match = PROGRESS_PATTERN.exec(line);
  if (!match?.[1]) return undefined;
  const value = Number.parseInt(match[1], 10);
  return value <= PROGRESS_TOTAL ? value : undefined;
}

export interface ProgressExtractorOptions {
  readonly maxPending?: number;
}

export class ProgressExtractor {
  private readonly maxPending: number;
  private pending = 0;
  private droppedCount = 0;
  private emittedCount = 0;

  constructor(
    private readonly sink: ProgressSink,
    options: ProgressExtractorOptions = {},
  ) {
    this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING_PROGRESS;
  }

  /** Signals handed to the sink */
  get emitted(): number {
    return this.emittedCount;
  }

  /** Signals skipped because too many sink calls were still pending */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Feed one stdout line. Returns immediately; an async sink is not awaited.
   */
  observe(line: string): void {
    const progress = parseProgress(line);
    if (progress === undefined) return;

    if (this.pending >= this.maxPending) {
      this.droppedCount++;
      return;
    }

    this.emittedCount++;
    let result: void | Promise<void>;
    try {
      result = this.sink.report(progress, PROGRESS_TOTAL);
    } catch (error) {
      console.warn(`${LOG_PREFIX} Progress sink failed: ${getErrorMessage(error)}`);
      return;
    }

    if (result instanceof Promise) {
      this.pending++;
      void result.then(
        () => {
          this.pending--;
        },
        (error: unknown) => {
          this.pending--;
          console.warn(`${LOG_PREFIX} Progress sink failed: ${getErrorMessage(error)}`);
        },
      );
    }
  }
}
