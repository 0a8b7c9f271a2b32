/**
 * Request-scoped logging: MCP `notifications/message` toward the client and,
 * for warnings and errors, stderr. stdout carries the protocol stream and is
 * never written to.
 */

import { getErrorMessage } from "@gradle-mcp/errors";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type {
  LoggingLevel,
  ServerNotification,
  ServerRequest,
} from "@modelcontextprotocol/sdk/types.js";

export const LOG_PREFIX = "[gradle-mcp]";
export const LOGGER_NAME = "gradle";

export type ToolExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

/** The low-level server, which drops messages below the client's `logging/setLevel` */
export type LogSender = Pick<Server, "sendLoggingMessage">;

export interface RequestLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createRequestLogger(sender: LogSender, extra: ToolExtra): RequestLogger {
  let deliveryFailed = false;

  const send = (level: LoggingLevel, message: string) => {
    void sender
      .sendLoggingMessage({ level, logger: LOGGER_NAME, data: message }, extra.sessionId)
      .catch((error: unknown) => {
        // Report once; the client has most likely gone away
        if (!deliveryFailed) {
          deliveryFailed = true;
          console.warn(`${LOG_PREFIX} Failed to deliver log message: ${getErrorMessage(error)}`);
        }
      });
  };

  return {
    debug: (message) => send("debug", message),
    info: (message) => send("info", message),
    warn: (message) => {
      console.warn(`${LOG_PREFIX} ${message}`);
      send("warning", message);
    },
    error: (message) => {
      console.error(`${LOG_PREFIX} ${message}`);
      send("error", message);
    },
  };
}
