/**
 * Centralized configuration for the Workout Summary Server.
 *
 * This file extracts all configurable values from the codebase into a single location.
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Server: HTTP server settings (port, host, body limits)
 * - Request: Per-request processing limits
 * - CORS: Cross-origin resource sharing
 * - Logging: Log level and output format
 * - Report: Summary line formatting
 */

import type { LogLevel } from './utils/logger';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Safely parse an integer from an environment variable.
 * Throws a descriptive error if the value is not a valid number.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVEL_NAMES.some((level) => level === value);
}

function resolveLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  return isLogLevel(value) ? value : defaultValue;
}

/**
 * Parse a comma-separated list of CORS origins.
 * An unset value or '*' allows every origin.
 */
function parseOrigins(value: string | undefined): string | string[] {
  if (!value || value.trim() === '*') return '*';
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export const ServerConfig = {
  /**
   * Server port.
   * @env PORT
   * @default 3001
   */
  port: parseIntSafe(process.env.PORT, 3001, 'PORT'),

  /**
   * Server bind address.
   * Use '0.0.0.0' to listen on all interfaces.
   * @default '0.0.0.0'
   */
  host: '0.0.0.0',

  /**
   * Maximum request body size for JSON payloads.
   * @default '1mb'
   */
  bodyLimit: '1mb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * Server will force exit after this duration if shutdown doesn't complete.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// REQUEST CONFIGURATION
// =============================================================================

export const RequestConfig = {
  /**
   * Maximum request processing time in milliseconds.
   * Requests exceeding this will receive a 408 timeout response.
   * @default 30000 (30 seconds)
   */
  timeoutMs: 30_000,
} as const;

// =============================================================================
// CORS CONFIGURATION
// =============================================================================

export const CorsConfig = {
  /**
   * Allowed HTTP headers for CORS requests.
   * @default ['Content-Type']
   */
  allowedHeaders: ['Content-Type'] as string[],

  /**
   * Allowed HTTP methods for CORS requests.
   * @default ['GET', 'POST', 'OPTIONS']
   */
  allowedMethods: ['GET', 'POST', 'OPTIONS'] as string[],

  /**
   * Allowed origins.
   * @env CORS_ORIGINS (comma-separated; unset or '*' allows all origins)
   * @default '*'
   */
  origins: parseOrigins(process.env.CORS_ORIGINS),
} as const;

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LoggingConfig = {
  /**
   * Minimum level written by the logger. Unknown values fall back to the default.
   * @env LOG_LEVEL
   * @default 'info'
   */
  level: resolveLogLevel(process.env.LOG_LEVEL, 'info'),

  /**
   * JSON output in production, coloured output everywhere else.
   * @env NODE_ENV
   */
  isProduction: process.env.NODE_ENV === 'production',

  nodeEnv: process.env.NODE_ENV ?? 'development',
} as const;

// =============================================================================
// REPORT CONFIGURATION
// =============================================================================

export const ReportConfig = {
  /**
   * Decimal places for every number in a summary line.
   * @default 3
   */
  decimalPlaces: 3,
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
  MULTI_STATUS: 207,
  OK: 200,
  REQUEST_TIMEOUT: 408,
} as const;
