/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

/**
 * Error handling for the SQL query tool server
 *
 * Provides typed error classes with MCP protocol serialization support.
 * Follows JSON-RPC 2.0 error code conventions with application-specific extensions.
 */

// Error codes following JSON-RPC 2.0 specification + application-specific codes
export enum ErrorCode {
  // JSON-RPC 2.0 standard error codes (negative numbers)
  PARSE_ERROR = -32700,
  INVALID_REQUEST = -32600,
  METHOD_NOT_FOUND = -32601,
  INVALID_PARAMS = -32602,
  INTERNAL_ERROR = -32603,

  // Application-specific error codes (positive numbers)
  RESOURCE_NOT_FOUND = 1003,
  INVALID_CONFIG = 1004,
  CONNECTION_FAILED = 1005,
  QUERY_FAILED = 1006,
  QUERY_TIMEOUT = 1007
}

/**
 * MCP protocol error structure for JSON-RPC responses
 */
export interface McpError {
  readonly code: ErrorCode
  readonly message: string
  readonly data?: {
    readonly type: string
    readonly [key: string]: unknown
  }
}

/**
 * Base error class for all application errors
 *
 * Carries an error code, optional details and the underlying cause.
 */
export class BaseError extends Error {
  public readonly code: ErrorCode
  public readonly details?: Record<string, unknown> | undefined
  public readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.details = details
    this.cause = cause

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

export type DatabaseErrorKind = 'connectivity' | 'syntax' | 'constraint' | 'timeout' | 'unknown'

const DRIVER_CODE_KINDS: Readonly<Record<string, DatabaseErrorKind>> = {
  ER_PARSE_ERROR: 'syntax',
  ER_NO_SUCH_TABLE: 'syntax',
  ER_BAD_FIELD_ERROR: 'syntax',
  ER_BAD_TABLE_ERROR: 'syntax',
  ER_NON_UNIQ_ERROR: 'syntax',
  ER_DUP_ENTRY: 'constraint',
  ER_NO_REFERENCED_ROW_2: 'constraint',
  ER_ROW_IS_REFERENCED_2: 'constraint',
  ER_BAD_NULL_ERROR: 'constraint',
  ER_CHECK_CONSTRAINT_VIOLATED: 'constraint',
  ECONNREFUSED: 'connectivity',
  ENOTFOUND: 'connectivity',
  ECONNRESET: 'connectivity',
  ER_ACCESS_DENIED_ERROR: 'connectivity',
  ER_BAD_DB_ERROR: 'connectivity',
  PROTOCOL_CONNECTION_LOST: 'connectivity',
  ETIMEDOUT: 'timeout',
  PROTOCOL_SEQUENCE_TIMEOUT: 'timeout'
}

const KIND_CODES: Readonly<Record<DatabaseErrorKind, ErrorCode>> = {
  connectivity: ErrorCode.CONNECTION_FAILED,
  syntax: ErrorCode.QUERY_FAILED,
  constraint: ErrorCode.QUERY_FAILED,
  timeout: ErrorCode.QUERY_TIMEOUT,
  unknown: ErrorCode.QUERY_FAILED
}

/**
 * Database errors raised while opening a session or running a statement
 *
 * The message is the driver's own text; the kind is derived from the
 * MySQL error code when the driver reports one.
 */
export class DatabaseError extends BaseError {
  public readonly kind: DatabaseErrorKind

  constructor(
    message: string,
    kind: DatabaseErrorKind,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message, KIND_CODES[kind], details, cause)
    this.kind = kind
  }

  /**
   * Create DatabaseError from whatever the MySQL driver threw
   */
  static fromDriverError(error: unknown): DatabaseError {
    if (error instanceof DatabaseError) {
      return error
    }

    const cause = handleCaughtError(error)
    const driverCode = readStringProperty(error, 'code')
    const kind = classifyDriverCode(driverCode)

    const details: Record<string, unknown> = {}
    if (driverCode) details.driverCode = driverCode
    const errno = readNumberProperty(error, 'errno')
    if (errno !== undefined) details.errno = errno
    const sqlState = readStringProperty(error, 'sqlState')
    if (sqlState) details.sqlState = sqlState

    return new DatabaseError(
      cause.message,
      kind,
      Object.keys(details).length > 0 ? details : undefined,
      cause
    )
  }
}

/**
 * Map a MySQL driver error code onto the closed set of database error kinds
 */
export function classifyDriverCode(code: string | undefined): DatabaseErrorKind {
  if (!code) {
    return 'unknown'
  }
  return DRIVER_CODE_KINDS[code] ?? 'unknown'
}

function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined
  }
  const property: unknown = Reflect.get(value, key)
  return typeof property === 'string' ? property : undefined
}

function readNumberProperty(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined
  }
  const property: unknown = Reflect.get(value, key)
  return typeof property === 'number' ? property : undefined
}

/**
 * Tool-specific errors for MCP tool execution
 *
 * Handles parameter validation, execution failures, and tool-specific issues.
 */
export class ToolError extends BaseError {
  public readonly toolName: string

  constructor(
    message: string,
    code: ErrorCode,
    toolName: string,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message, code, details, cause)
    this.toolName = toolName
  }
}

/**
 * Configuration-related errors
 *
 * Handles environment variable validation, missing configuration, and setup issues.
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_CONFIG,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message, code, details, cause)
  }
}

/**
 * Input validation errors
 */
export class ValidationError extends BaseError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_PARAMS,
    details?: Record<string, unknown> | undefined,
    cause?: Error | undefined
  ) {
    super(message, code, details, cause)
  }
}

/**
 * Serialize an error for MCP protocol JSON-RPC response
 *
 * Converts any Error instance to MCP-compatible error format with
 * structured data for debugging and error handling.
 */
export function createMcpError(error: Error): McpError {
  if (error instanceof BaseError) {
    const data: { type: string; [key: string]: unknown } = {
      type: error.constructor.name
    }

    if (error instanceof ToolError) {
      data.toolName = error.toolName
    }

    if (error instanceof DatabaseError) {
      data.kind = error.kind
    }

    if (error.details) {
      data.details = error.details
    }

    if (error.cause) {
      data.cause = error.cause.message
    }

    return {
      code: error.code,
      message: error.message,
      data
    }
  }

  // Handle non-BaseError instances
  return {
    code: ErrorCode.INTERNAL_ERROR,
    message: error.message,
    data: {
      type: error.constructor.name
    }
  }
}

/**
 * Whether an error describes a condition that might clear up on its own
 * (lost connection, timeout). Nothing retries automatically; the flag is
 * reported so the calling agent can decide.
 */
export function isRetriableError(error: Error): boolean {
  if (error instanceof BaseError) {
    return error.code === ErrorCode.CONNECTION_FAILED ||
           error.code === ErrorCode.QUERY_TIMEOUT
  }
  return false
}

/**
 * Type-safe error handling for catch blocks
 */
export function handleCaughtError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  if (typeof error === 'string') {
    return new Error(error)
  }
  if (error === undefined || error === null) {
    return new Error('Unknown error occurred')
  }
  return new Error(stringifyThrown(error))
}

function stringifyThrown(value: unknown): string {
  if (typeof value !== 'object') {
    return String(value)
  }
  const message = readStringProperty(value, 'message')
  if (message) {
    return message
  }
  try {
    return JSON.stringify(value)
  } catch {
    return String(value)
  }
}

/**
 * Safe error message extraction
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error occurred'
}
