/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { describe, test, expect, beforeEach, vi } from 'vitest'
import { ToolRegistry, QueryExecutorTool, type ToolExecutionContext } from './tools/index.js'
import { QueryExecutor } from './query-executor.js'
import { ConnectionProvider } from './connection/index.js'
import { ToolError, ErrorCode } from './errors.js'
import { FakeDatabase, TEST_CONNECTION_CONFIG, driverError, okPacket } from './test/fake-session.js'

function createContext(database: FakeDatabase): ToolExecutionContext {
  return {
    queryExecutor: new QueryExecutor(new ConnectionProvider(TEST_CONNECTION_CONFIG, database.factory))
  }
}

describe('ToolRegistry', () => {
  let toolRegistry: ToolRegistry

  beforeEach(() => {
    toolRegistry = new ToolRegistry()
  })

  test('should register the query executor tool by default', () => {
    const tools = toolRegistry.listTools()

    expect(tools.map(tool => tool.name)).toEqual(['query_executor'])
  })

  test('should get tool by name', () => {
    expect(toolRegistry.getTool('query_executor')).toBeInstanceOf(QueryExecutorTool)
  })

  test('should return undefined for unknown tool', () => {
    expect(toolRegistry.getTool('unknown_tool')).toBeUndefined()
  })

  test('should throw error when executing unknown tool', async () => {
    const context = createContext(new FakeDatabase())

    await expect(
      toolRegistry.executeTool('unknown_tool', {}, context)
    ).rejects.toThrow("Tool 'unknown_tool' not found")
  })

  test('should delegate execution to the named tool', async () => {
    const database = new FakeDatabase().on(/^SELECT 1$/, () => [{ value: 1 }])
    const tool = toolRegistry.getTool('query_executor')
    expect(tool).toBeDefined()
    const spy = vi.spyOn(QueryExecutorTool.prototype, 'execute')

    await toolRegistry.executeTool('query_executor', { query: 'SELECT 1' }, createContext(database))

    expect(spy).toHaveBeenCalledTimes(1)
  })
})

describe('QueryExecutorTool', () => {
  let tool: QueryExecutorTool
  let database: FakeDatabase
  let context: ToolExecutionContext

  beforeEach(() => {
    tool = new QueryExecutorTool()
    database = new FakeDatabase()
      .on(/^SELECT name, age FROM employees LIMIT 1$/, () => [{ name: 'Alice', age: 30 }])
      .on(/^DELETE /, () => okPacket(0))
    context = createContext(database)
  })

  test('should have correct tool definition', () => {
    const definition = tool.definition

    expect(definition.name).toBe('query_executor')
    expect(definition.inputSchema.type).toBe('object')
    expect(definition.inputSchema.properties.query).toEqual({
      type: 'string',
      description: 'The SQL statement to execute (e.g., "SELECT name, age FROM employees LIMIT 10")'
    })
    expect(definition.inputSchema.required).toEqual(['query'])
    expect(definition.annotations?.readOnlyHint).toBe(false)
    expect(definition.annotations?.destructiveHint).toBe(true)
  })

  test('should return rows as the JSON envelope', async () => {
    const result = await tool.execute({ query: 'SELECT name, age FROM employees LIMIT 1' }, context)

    expect(result.isError).toBeUndefined()
    expect(result.content).toHaveLength(1)
    expect(result.content[0].type).toBe('text')
    expect(JSON.parse(result.content[0].text)).toEqual({
      query: 'SELECT name, age FROM employees LIMIT 1',
      results: [{ name: 'Alice', age: 30 }]
    })
  })

  test('should pretty-print the envelope', async () => {
    const result = await tool.execute({ query: 'DELETE FROM employees WHERE id = 9999' }, context)

    expect(result.content[0].text).toBe(
      '{\n  "query": "DELETE FROM employees WHERE id = 9999",\n  "message": "Query executed successfully."\n}'
    )
  })

  test('should flag error envelopes with isError', async () => {
    const result = await tool.execute({ query: 'SELCT * FROM employees' }, context)

    expect(result.isError).toBe(true)
    const envelope = JSON.parse(result.content[0].text)
    expect(envelope.query).toBe('SELCT * FROM employees')
    expect(envelope.error).toContain('You have an error in your SQL syntax')
  })

  test('should return a blank query as an error envelope', async () => {
    database.on(/^\s*$/, () => {
      throw driverError('Query was empty', 'ER_EMPTY_QUERY', 1065)
    })

    const result = await tool.execute({ query: '   ' }, context)

    expect(result.isError).toBe(true)
    expect(JSON.parse(result.content[0].text)).toEqual({ query: '   ', error: 'Query was empty' })
    expect(database.executed).toEqual(['   '])
  })

  test.each([
    [{}, 'Invalid parameters: query is required'],
    [{ query: 42 }, 'Invalid parameters: query must be a string'],
    [undefined, 'Invalid parameters: query is required']
  ])('should reject invalid parameters %j', async (params, message) => {
    const failure = tool.execute(params, context)

    await expect(failure).rejects.toBeInstanceOf(ToolError)
    await expect(failure).rejects.toMatchObject({
      message,
      code: ErrorCode.INVALID_PARAMS,
      toolName: 'query_executor'
    })
    expect(database.opened).toBe(0)
  })
})
