/**
 * Application logger.
 *
 * Handles transport-specific logging rules:
 * - STDIO: logs to stderr (stdout is reserved for the MCP protocol)
 * - HTTP: logs to stdout
 *
 * LOG_FORMAT=text (default) prints one human-readable line per entry,
 * LOG_FORMAT=json emits the raw pino records.
 */

import type { NextFunction, Request, Response } from 'express';
import { getBaseLogger } from './log-core.js';
import { NODE_ENV } from '../config.js';

export type ToolOperation = 'search' | 'store' | 'update' | 'delete' | 'retrieve' | 'link' | 'list' | 'embed';

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: NODE_ENV === 'development' ? error.stack : undefined
    };
  }
  return { value: String(error) };
}

class Logger {
  debug(message: string): void {
    getBaseLogger().debug(message);
  }

  info(message: string): void {
    getBaseLogger().info({ category: 'info' }, message);
  }

  warn(message: string): void {
    getBaseLogger().warn({ category: 'warning' }, message);
  }

  /**
   * Log error messages with full context. In text format the error message is
   * appended to the line so it survives the one-line rendering.
   */
  error(message: string, error?: unknown): void {
    if (error === undefined) {
      getBaseLogger().error({ category: 'error' }, message);
      return;
    }
    const detail = error instanceof Error ? error.message : String(error);
    getBaseLogger().error({ category: 'error', error: describeError(error) }, `${message} | ${detail}`);
  }

  /**
   * Format tool operations with concise, clean output
   */
  tool(toolName: string, operation: ToolOperation, details: string): void {
    getBaseLogger().info(
      { tool: toolName, operation: operation.toUpperCase(), details, category: 'tool_operation' },
      `[${toolName}] ${operation.toUpperCase()} ${details}`
    );
  }

  success(operation: string, details: string): void {
    getBaseLogger().info({ operation, details, category: 'success' }, `[${operation}] ${details}`);
  }

  requestTimeout(operation: string, timeoutMs: number): void {
    getBaseLogger().error(
      { operation, timeoutMs, category: 'timeout' },
      `${operation} timed out after ${timeoutMs}ms - client did not receive response`
    );
  }
}

export const logger = new Logger();

/**
 * Express access-log middleware: one line per finished request.
 */
export function httpLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const record = {
      http: { method: req.method, path: req.originalUrl, protocol: `HTTP/${req.httpVersion}` },
      status: res.statusCode,
      response_time_ms: Date.now() - start,
      client: { ip: req.ip ?? req.socket.remoteAddress ?? 'unknown' },
      user_agent: req.headers['user-agent'],
      request_id: req.headers['x-request-id']
    };
    const message = `${req.method} ${req.originalUrl} -> ${res.statusCode}`;
    if (res.statusCode >= 500) getBaseLogger().error(record, message);
    else if (res.statusCode >= 400) getBaseLogger().warn(record, message);
    else getBaseLogger().info(record, message);
  });
  next();
}
