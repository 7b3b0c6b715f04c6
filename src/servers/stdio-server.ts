/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { SqlToolMcpServer, type SqlToolServerOptions } from './server.js'
import { createChildLogger } from '../logger.js'
import { ErrorCode } from '../errors.js'
import type { McpRequest, McpNotification } from '../types.js'

export interface StdioStreams {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
}

function isMcpMessage(value: unknown): value is McpRequest | McpNotification {
  return typeof value === 'object' && value !== null &&
    'method' in value && typeof value.method === 'string'
}

function readMessageId(value: unknown): number | string | null {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return null
  }
  const id = value.id
  return typeof id === 'number' || typeof id === 'string' ? id : null
}

class McpStdioServer {
  private readonly mcpServer: SqlToolMcpServer
  private readonly streams: StdioStreams
  private readonly logger = createChildLogger('stdio-server')

  constructor(options: SqlToolServerOptions = {}, streams: StdioStreams = { input: process.stdin, output: process.stdout }) {
    this.mcpServer = new SqlToolMcpServer(options)
    this.streams = streams
  }

  start(): void {
    this.mcpServer.start()

    this.streams.input.setEncoding('utf8')

    // Buffer for incomplete JSON messages
    let buffer = ''

    this.streams.input.on('data', (chunk: string) => {
      buffer += chunk

      // Process complete JSON-RPC messages (line-delimited)
      const lines = buffer.split('\n')
      buffer = lines.pop() ?? '' // Keep incomplete line in buffer

      this.logger.debug({ lines: lines.length, buffered: buffer.length }, 'Received stdin chunk')

      for (const line of lines) {
        if (line.trim()) {
          void this.handleStdioMessage(line.trim())
        }
      }
    })

    this.streams.input.on('error', (error) => {
      this.logger.error({ error }, 'stdin error')
      process.exit(1)
    })
  }

  stop(): void {
    this.mcpServer.close()
  }

  async handleStdioMessage(message: string): Promise<void> {
    let parsedMessage: unknown
    try {
      parsedMessage = JSON.parse(message)
    } catch (error) {
      this.logger.warn({ error }, 'Received malformed JSON-RPC message')
      this.writeError(null, ErrorCode.PARSE_ERROR, 'Parse error')
      return
    }

    if (!isMcpMessage(parsedMessage)) {
      this.logger.warn('Received JSON that is not a JSON-RPC message')
      this.writeError(readMessageId(parsedMessage), ErrorCode.INVALID_REQUEST, 'Invalid request')
      return
    }

    try {
      const response = await this.mcpServer.handleMessage(parsedMessage)
      if (response !== null) {
        this.streams.output.write(JSON.stringify(response) + '\n')
      }
    } catch (error) {
      this.logger.error({ error, method: parsedMessage.method }, 'Error handling message')
      const id = readMessageId(parsedMessage)
      if (id !== null) {
        this.streams.output.write(JSON.stringify({
          jsonrpc: '2.0',
          id,
          error: { code: ErrorCode.INTERNAL_ERROR, message: 'Internal error' }
        }) + '\n')
      }
    }
  }

  private writeError(id: number | string | null, code: ErrorCode, message: string): void {
    this.streams.output.write(JSON.stringify({
      jsonrpc: '2.0',
      id,
      error: { code, message }
    }) + '\n')
  }
}

export default McpStdioServer
