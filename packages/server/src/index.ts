/**
 * @gradle-mcp/server
 *
 * MCP server for Gradle builds. The `gradle-mcp` binary serves it over stdio.
 */

export { type CliArgs, parseArgs } from "./args.js";
export {
  createRequestLogger,
  LOG_PREFIX,
  LOGGER_NAME,
  type LogSender,
  type RequestLogger,
  type ToolExtra,
} from "./logging.js";
export { errorResult, jsonResult } from "./results.js";
export {
  createGradleMcpServer,
  type GradleOperations,
  type GradleMcpServerOptions,
  progressSinkFor,
  SERVER_NAME,
  SERVER_VERSION,
} from "./server.js";
