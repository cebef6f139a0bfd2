import type { Server } from "@modelcontextprotocol/sdk/server/index.js";

import { describeError } from "./errors.js";

/**
 * Diagnostic sink. stdout carries the stdio protocol, so nothing here may
 * write to it.
 */
export interface Logger {
  info(message: string): void;
  error(message: string, error?: unknown): void;
}

export const stderrLogger: Logger = {
  info(message) {
    console.error(message);
  },
  error(message, error) {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  },
};

/**
 * Logs to `base` and mirrors each line to the connected client as an MCP
 * log notification.
 */
export function createServerLogger(server: Server, base: Logger = stderrLogger): Logger {
  const notify = (level: "info" | "error", data: string) => {
    void server.sendLoggingMessage({ level, logger: "yt-dlp", data }).catch((err: unknown) => {
      base.error(`Failed to send log notification: ${describeError(err)}`);
    });
  };

  return {
    info(message) {
      base.info(message);
      notify("info", message);
    },
    error(message, error) {
      base.error(message, error);
      notify("error", error === undefined ? message : `${message}: ${describeError(error)}`);
    },
  };
}
