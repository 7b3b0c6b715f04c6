/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { test, expect, describe } from 'vitest'
import {
  BaseError,
  DatabaseError,
  ToolError,
  ConfigError,
  ValidationError,
  classifyDriverCode,
  createMcpError,
  getErrorMessage,
  handleCaughtError,
  isRetriableError,
  ErrorCode
} from './errors.js'

function mysqlError(message: string, code: string, errno: number): Error {
  return Object.assign(new Error(message), { code, errno, sqlState: '42S02' })
}

describe('Error Handling System', () => {
  describe('BaseError', () => {
    test('should create error with message and code', () => {
      const error = new BaseError('Test message', ErrorCode.INTERNAL_ERROR)

      expect(error.message).toBe('Test message')
      expect(error.code).toBe(ErrorCode.INTERNAL_ERROR)
      expect(error.name).toBe('BaseError')
      expect(error).toBeInstanceOf(Error)
    })

    test('should include stack trace', () => {
      const error = new BaseError('Test message', ErrorCode.INTERNAL_ERROR)

      expect(error.stack).toContain('BaseError')
    })

    test('should support optional details and cause', () => {
      const cause = new Error('Original error')
      const error = new BaseError('Test message', ErrorCode.INTERNAL_ERROR, { operation: 'test' }, cause)

      expect(error.details).toEqual({ operation: 'test' })
      expect(error.cause).toBe(cause)
    })
  })

  describe('DatabaseError', () => {
    test('should keep the driver message and classify syntax errors', () => {
      const driverError = mysqlError("Table 'employees.staff' doesn't exist", 'ER_NO_SUCH_TABLE', 1146)

      const error = DatabaseError.fromDriverError(driverError)

      expect(error.message).toBe("Table 'employees.staff' doesn't exist")
      expect(error.kind).toBe('syntax')
      expect(error.code).toBe(ErrorCode.QUERY_FAILED)
      expect(error.details).toEqual({ driverCode: 'ER_NO_SUCH_TABLE', errno: 1146, sqlState: '42S02' })
      expect(error.cause).toBe(driverError)
      expect(error.name).toBe('DatabaseError')
    })

    test('should classify connectivity failures', () => {
      const error = DatabaseError.fromDriverError(mysqlError('connect ECONNREFUSED 127.0.0.1:3306', 'ECONNREFUSED', -111))

      expect(error.kind).toBe('connectivity')
      expect(error.code).toBe(ErrorCode.CONNECTION_FAILED)
    })

    test('should classify timeouts', () => {
      const error = DatabaseError.fromDriverError(mysqlError('Query inactivity timeout', 'PROTOCOL_SEQUENCE_TIMEOUT', 0))

      expect(error.kind).toBe('timeout')
      expect(error.code).toBe(ErrorCode.QUERY_TIMEOUT)
    })

    test('should wrap thrown strings and unknown values', () => {
      const fromString = DatabaseError.fromDriverError('socket hang up')
      const fromObject = DatabaseError.fromDriverError({ reason: 'opaque' })

      expect(fromString.message).toBe('socket hang up')
      expect(fromString.kind).toBe('unknown')
      expect(fromString.details).toBeUndefined()
      expect(fromObject.message).toBe('{"reason":"opaque"}')
    })

    test('should return an existing DatabaseError unchanged', () => {
      const original = new DatabaseError('Duplicate entry', 'constraint')

      expect(DatabaseError.fromDriverError(original)).toBe(original)
    })
  })

  describe('classifyDriverCode', () => {
    test.each([
      ['ER_PARSE_ERROR', 'syntax'],
      ['ER_BAD_FIELD_ERROR', 'syntax'],
      ['ER_DUP_ENTRY', 'constraint'],
      ['ER_NO_REFERENCED_ROW_2', 'constraint'],
      ['ER_ACCESS_DENIED_ERROR', 'connectivity'],
      ['PROTOCOL_CONNECTION_LOST', 'connectivity'],
      ['ETIMEDOUT', 'timeout'],
      ['ER_SOMETHING_NEW', 'unknown']
    ])('%s maps to %s', (code, kind) => {
      expect(classifyDriverCode(code)).toBe(kind)
    })

    test('should treat a missing code as unknown', () => {
      expect(classifyDriverCode(undefined)).toBe('unknown')
    })
  })

  describe('ToolError', () => {
    test('should carry the tool name', () => {
      const error = new ToolError('Invalid parameters', ErrorCode.INVALID_PARAMS, 'query_executor')

      expect(error.toolName).toBe('query_executor')
      expect(error.code).toBe(ErrorCode.INVALID_PARAMS)
    })
  })

  describe('ConfigError and ValidationError', () => {
    test('should default their codes', () => {
      expect(new ConfigError('bad config').code).toBe(ErrorCode.INVALID_CONFIG)
      expect(new ValidationError('bad params').code).toBe(ErrorCode.INVALID_PARAMS)
    })
  })

  describe('createMcpError', () => {
    test('should serialize ToolError with tool name and details', () => {
      const error = new ToolError('Tool failed', ErrorCode.INVALID_PARAMS, 'query_executor', { field: 'query' })

      expect(createMcpError(error)).toEqual({
        code: ErrorCode.INVALID_PARAMS,
        message: 'Tool failed',
        data: {
          type: 'ToolError',
          toolName: 'query_executor',
          details: { field: 'query' }
        }
      })
    })

    test('should serialize DatabaseError with kind and cause', () => {
      const error = DatabaseError.fromDriverError(mysqlError('Unknown database', 'ER_BAD_DB_ERROR', 1049))

      expect(createMcpError(error)).toEqual({
        code: ErrorCode.CONNECTION_FAILED,
        message: 'Unknown database',
        data: {
          type: 'DatabaseError',
          kind: 'connectivity',
          details: { driverCode: 'ER_BAD_DB_ERROR', errno: 1049, sqlState: '42S02' },
          cause: 'Unknown database'
        }
      })
    })

    test('should map plain errors to INTERNAL_ERROR', () => {
      expect(createMcpError(new TypeError('boom'))).toEqual({
        code: ErrorCode.INTERNAL_ERROR,
        message: 'boom',
        data: { type: 'TypeError' }
      })
    })
  })

  describe('helpers', () => {
    test('isRetriableError flags connectivity and timeout failures only', () => {
      expect(isRetriableError(new DatabaseError('lost', 'connectivity'))).toBe(true)
      expect(isRetriableError(new DatabaseError('slow', 'timeout'))).toBe(true)
      expect(isRetriableError(new DatabaseError('typo', 'syntax'))).toBe(false)
      expect(isRetriableError(new Error('plain'))).toBe(false)
    })

    test('handleCaughtError and getErrorMessage normalize unknown values', () => {
      expect(handleCaughtError('text').message).toBe('text')
      expect(handleCaughtError(42).message).toBe('42')
      expect(handleCaughtError({ message: 'pool closed', code: 'POOL_CLOSED' }).message).toBe('pool closed')
      expect(handleCaughtError(null).message).toBe('Unknown error occurred')
      expect(getErrorMessage(new Error('message'))).toBe('message')
      expect(getErrorMessage(undefined)).toBe('Unknown error occurred')
    })
  })
})
