/**
 * Request Logger Middleware for the Fluency Coach API
 *
 * Logs one line per request with method, path, status and response time:
 *
 * ```
 * [API] POST /api/coach/turns 201 - 1.84s
 * [API] GET /api/conversations/conv_1/stats 200 - 3ms
 * [API] POST /api/coach/turns 504 - 30.01s
 * ```
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.use('*', loggerMiddleware());
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  /** Prefix for log messages */
  prefix: string;
  /** Whether to include an ISO timestamp */
  includeTimestamp: boolean;
  /** Path prefixes that are not logged (e.g., health checks) */
  skipPaths: string[];
  /** Whether to colour method and status for terminal output */
  colorize: boolean;
  /** Where log lines go */
  log: (line: string) => void;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  log: (line) => console.log(line),
};

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  return colors.green;
}

function getMethodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return colors.cyan;
    case 'POST':
      return colors.green;
    case 'PUT':
      return colors.yellow;
    default:
      return colors.magenta;
  }
}

/**
 * Milliseconds under one second, seconds with two decimals above.
 */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const responseTime = formatResponseTime(Math.round(performance.now() - startTime));

    const method = c.req.method;
    const status = c.res.status;

    let logMessage = finalConfig.colorize
      ? [
          finalConfig.prefix,
          `${getMethodColor(method)}${method}${colors.reset}`,
          path,
          `${getStatusColor(status)}${status}${colors.reset}`,
          '-',
          `${colors.dim}${responseTime}${colors.reset}`,
        ].join(' ')
      : `${finalConfig.prefix} ${method} ${path} ${status} - ${responseTime}`;

    if (finalConfig.includeTimestamp) {
      logMessage = `[${new Date().toISOString()}] ${logMessage}`;
    }

    finalConfig.log(logMessage);
  };
}

export { DEFAULT_LOGGER_CONFIG };
