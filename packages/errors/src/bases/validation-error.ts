import { GradleMcpError } from "../base.js";
import { type CodesForBase, type ErrorDomain, getCatalogEntry } from "../catalog.js";
import type { GradleMcpErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input, configuration, or request data.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<
  C extends ValidationCode = "VALIDATION_FAILED",
> extends GradleMcpError {
  override readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues (populated for schema failures) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: GradleMcpErrorOptions<C> & { issues?: readonly ValidationIssue[] });
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions:
      | string
      | (GradleMcpErrorOptions<C> & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
      this.code = "VALIDATION_FAILED" as C;
      this.issues = issues ?? [];
    } else {
      const opts = messageOrOptions;
      super(
        opts.message,
        opts.metadata,
        opts.traceId,
        opts.cause ? { cause: opts.cause } : undefined,
      );
      this.code = opts.code;
      this.issues = opts.issues ?? [];
    }
    const entry = getCatalogEntry(this.code);
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
