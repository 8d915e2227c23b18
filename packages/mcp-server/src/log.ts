/**
 * MCP logging notifications.
 *
 * stdout carries the protocol, so diagnostics go to the client as
 * `notifications/message`. Before a server is attached, messages are dropped.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';

const LOGGER = 'voxel-tracer';

let target: McpServer | null = null;

export function attachLogger(server: McpServer): void {
  target = server;
}

export function log(level: LoggingLevel, data: Record<string, unknown>): void {
  if (!target) return;
  target.server
    .sendLoggingMessage({ level, logger: LOGGER, data })
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[${LOGGER}] failed to send log message: ${message}\n`);
    });
}
