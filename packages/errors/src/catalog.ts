/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the workspace, mapped to its domain and to
 * the base error type that carries it.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "ConflictError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // GENERIC ERRORS - Default codes of the base types
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },

  // ============================================================================
  // GRADLE ERRORS - Wrapped build tool invocations
  // ============================================================================
  GRADLE_ARGUMENT_REJECTED: {
    domain: "gradle",
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Gradle argument rejected",
    description: "A caller-supplied argument is dangerous or not in the allow-list",
  },
  GRADLE_TASK_REJECTED: {
    domain: "gradle",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Gradle task rejected",
    description: "The task name or project path cannot be run through this operation",
  },
  GRADLE_SPAWN_FAILED: {
    domain: "gradle",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Gradle could not be started",
    description: "The wrapper process failed to start",
  },
  GRADLE_STREAM_READ_FAILED: {
    domain: "gradle",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Gradle output read failed",
    description: "An I/O error occurred while reading process output",
  },
  GRADLE_COMMAND_FAILED: {
    domain: "gradle",
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Gradle command failed",
    description: "A discovery command exited with a failing status",
  },
  GRADLE_WRAPPER_NOT_FOUND: {
    domain: "gradle",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Gradle wrapper not found",
    description: "No gradlew script exists at the configured location",
  },
  GRADLE_CONFIGURATION_INVALID: {
    domain: "gradle",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid Gradle configuration",
    description: "The Gradle configuration is invalid",
  },
  GRADLE_GATEWAY_REUSED: {
    domain: "gradle",
    baseType: "ConflictError" as const,
    isExpected: false,
    title: "Task gateway already executed",
    description: "A task gateway runs exactly one invocation",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}
