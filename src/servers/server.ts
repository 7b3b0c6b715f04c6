/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { z } from 'zod'
import type { ServerCapabilities, McpRequest, McpNotification, McpResponse } from '../types.js'
import { getConfig } from '../config.js'
import { createMcpError, ErrorCode, BaseError, ValidationError } from '../errors.js'
import { createChildLogger, generateCorrelationId } from '../logger.js'
import { ConnectionProvider, type SessionFactory } from '../connection/index.js'
import { QueryExecutor } from '../query-executor.js'
import { selectNormalizer } from '../query-normalizer.js'
import { ToolRegistry } from '../tools/index.js'
import { PromptRegistry } from '../prompts/index.js'

export const PROTOCOL_VERSION = '2024-11-05'

const ToolCallParamsSchema = z.object({
  name: z.string({ required_error: 'name is required' }),
  arguments: z.record(z.unknown()).optional()
})

const PromptGetParamsSchema = z.object({
  name: z.string({ required_error: 'name is required' }),
  arguments: z.record(z.string()).optional()
})

export interface SqlToolServerOptions {
  sessionFactory?: SessionFactory
}

export class SqlToolMcpServer {
  private readonly config = getConfig()
  private readonly logger = createChildLogger('mcp-server')
  private readonly queryExecutor: QueryExecutor
  private readonly toolRegistry: ToolRegistry
  private readonly promptRegistry: PromptRegistry
  private running = false

  constructor(options: SqlToolServerOptions = {}) {
    const databaseConfig = this.config.getDatabaseConfig()
    const provider = new ConnectionProvider(databaseConfig, options.sessionFactory)
    this.queryExecutor = new QueryExecutor(provider, {
      normalizer: selectNormalizer(this.config.getQueryConfig())
    })
    this.toolRegistry = new ToolRegistry()
    this.promptRegistry = new PromptRegistry(databaseConfig.database)
  }

  get name(): string {
    return this.config.getServerInfo().name
  }

  get version(): string {
    return this.config.getServerInfo().version
  }

  getCapabilities(): ServerCapabilities {
    return this.config.getCapabilities()
  }

  start(): void {
    this.logger.info({
      serverName: this.name,
      version: this.version,
      database: this.queryExecutor.getDatabaseName(),
      capabilities: this.getCapabilities()
    }, 'Starting SQL tool MCP server')

    this.running = true

    this.logger.info('SQL tool MCP server started successfully')
  }

  isRunning(): boolean {
    return this.running
  }

  async handleMessage(message: McpRequest | McpNotification): Promise<McpResponse | null> {
    const correlationId = generateCorrelationId()
    const isRequest = 'id' in message
    const messageLogger = isRequest
      ? this.logger.child({ correlationId, requestId: message.id })
      : this.logger.child({ correlationId })

    messageLogger.debug({
      method: message.method,
      isRequest
    }, `Handling MCP ${isRequest ? 'request' : 'notification'}`)

    // Notifications never get a response
    if (!isRequest) {
      if (message.method === 'notifications/initialized' || message.method === 'initialized') {
        messageLogger.debug('Processing initialized notification')
        return null
      }

      messageLogger.warn({ method: message.method }, 'Unknown notification method')
      return null
    }

    const request = message

    try {
      const result = await this.dispatch(request)
      return {
        jsonrpc: '2.0',
        id: request.id,
        result
      }
    } catch (error) {
      messageLogger.error({
        err: error,
        method: request.method
      }, 'MCP request failed')

      const mcpError = error instanceof Error
        ? createMcpError(error)
        : createMcpError(new BaseError('Unknown error occurred', ErrorCode.INTERNAL_ERROR))

      return {
        jsonrpc: '2.0',
        id: request.id,
        error: mcpError
      }
    }
  }

  private async dispatch(request: McpRequest): Promise<unknown> {
    switch (request.method) {
      case 'initialize':
        return {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: this.getCapabilities(),
          serverInfo: {
            name: this.name,
            version: this.version
          }
        }

      case 'ping':
        return {}

      case 'tools/list':
        return { tools: this.toolRegistry.listTools() }

      case 'tools/call': {
        const params = parseParams(ToolCallParamsSchema, request.params)
        return this.toolRegistry.executeTool(params.name, params.arguments ?? {}, {
          queryExecutor: this.queryExecutor
        })
      }

      case 'prompts/list':
        return { prompts: this.promptRegistry.listPrompts() }

      case 'prompts/get': {
        const params = parseParams(PromptGetParamsSchema, request.params)
        return this.promptRegistry.getPrompt(params.name, params.arguments ?? {})
      }

      default:
        throw new BaseError(`Unknown method: ${request.method}`, ErrorCode.METHOD_NOT_FOUND)
    }
  }

  async handleRequest(request: McpRequest): Promise<McpResponse> {
    const result = await this.handleMessage(request)
    if (result === null) {
      throw new BaseError('Request handler returned null - this should not happen for requests', ErrorCode.INTERNAL_ERROR)
    }
    return result
  }

  close(): void {
    this.logger.info('Shutting down SQL tool MCP server')
    this.running = false
    this.logger.info('SQL tool MCP server stopped')
  }
}

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const parsed = schema.safeParse(params ?? {})
  if (!parsed.success) {
    const issue = parsed.error.errors[0]
    const field = issue ? issue.path.join('.') : ''
    const message = issue ? issue.message : 'Invalid params'
    throw new ValidationError(
      field ? `Invalid params: ${field}: ${message}` : `Invalid params: ${message}`,
      ErrorCode.INVALID_PARAMS,
      { field }
    )
  }
  return parsed.data
}
