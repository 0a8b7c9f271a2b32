import { GradleMcpError } from "../base.js";
import { type CodesForBase, type ErrorDomain, getCatalogEntry } from "../catalog.js";
import type { GradleMcpErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs or unexpected conditions.
 * The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends GradleMcpError {
  override readonly _tag = "InternalError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: GradleMcpErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | GradleMcpErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
      this.code = "INTERNAL_ERROR" as C;
    } else {
      const opts = messageOrOptions;
      super(
        opts.message,
        opts.metadata,
        opts.traceId,
        opts.cause ? { cause: opts.cause } : undefined,
      );
      this.code = opts.code;
    }
    const entry = getCatalogEntry(this.code);
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
