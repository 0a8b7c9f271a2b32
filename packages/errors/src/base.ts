import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Wire-safe JSON shape of any GradleMcpError.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
}

/**
 * Root of the error hierarchy.
 *
 * Every concrete subclass pins `_tag` to one of the base error types and
 * resolves `code`, `domain` and `isExpected` from the catalog.
 */
export abstract class GradleMcpError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
    };
  }
}

export function isGradleMcpError(error: unknown): error is GradleMcpError {
  return error instanceof GradleMcpError;
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
