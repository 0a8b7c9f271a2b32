/**
 * @gradle-mcp/errors
 *
 * Shared error taxonomy for the Gradle MCP workspace.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, GradleMcpError, isError, isGradleMcpError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  getCatalogEntry,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError } from "./bases/internal-error.js";
export { ValidationError } from "./bases/validation-error.js";

export type {
  GradleMcpErrorOptions,
  InternalCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isGradleError,
  isInternalError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// GRADLE ERRORS
// ============================================================================

export {
  GradleArgumentRejectedError,
  GradleCommandFailedError,
  GradleError,
  GradleGatewayReusedError,
  GradleSpawnFailedError,
  GradleStreamReadError,
  GradleTaskRejectedError,
  GradleWrapperNotFoundError,
  type RejectedArgumentClassification,
} from "./gradle.js";
