#!/usr/bin/env node
/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */
import type { IncomingMessage, ServerResponse } from 'http'
import { createServer } from 'http'
import { SqlToolMcpServer, type SqlToolServerOptions } from './server.js'
import { createChildLogger, createLogger, setDefaultLogger } from '../logger.js'
import { loadConfiguration } from '../config.js'
import { ErrorCode, getErrorMessage } from '../errors.js'
import type { McpRequest, McpNotification } from '../types.js'

function isMcpMessage(value: unknown): value is McpRequest | McpNotification {
  return typeof value === 'object' && value !== null &&
    'method' in value && typeof value.method === 'string'
}

class McpHttpServer {
  private readonly mcpServer: SqlToolMcpServer
  private readonly port: number
  private httpServer?: ReturnType<typeof createServer>
  private readonly logger = createChildLogger('http-server')

  constructor(port = 3000, options: SqlToolServerOptions = {}) {
    this.mcpServer = new SqlToolMcpServer(options)
    this.port = port
  }

  async start(): Promise<void> {
    this.mcpServer.start()

    const httpServer = createServer((req, res) => {
      void this.handleHttpRequest(req, res)
    })
    this.httpServer = httpServer

    return new Promise((resolve, reject) => {
      httpServer.once('error', reject)
      httpServer.listen(this.port, () => {
        this.logger.info({ port: this.port }, 'MCP HTTP server started')
        resolve()
      })
    })
  }

  async stop(): Promise<void> {
    this.mcpServer.close()
    return new Promise((resolve) => {
      if (this.httpServer) {
        this.httpServer.close(() => {
          this.logger.info('MCP HTTP server stopped')
          resolve()
        })
      } else {
        resolve()
      }
    })
  }

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Set CORS headers for browser testing
    res.setHeader('Access-Control-Allow-Origin', '*')
    res.setHeader('Access-Control-Allow-Methods', 'POST, OPTIONS')
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type')

    if (req.method === 'OPTIONS') {
      res.writeHead(200)
      res.end()
      return
    }

    if (req.method !== 'POST') {
      res.writeHead(405, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({ error: 'Method not allowed' }))
      return
    }

    let message: unknown
    try {
      message = JSON.parse(await this.readRequestBody(req))
    } catch (error) {
      this.logger.warn({ error }, 'Rejected unparseable request body')
      res.writeHead(400, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({
        jsonrpc: '2.0',
        id: null,
        error: { code: ErrorCode.PARSE_ERROR, message: 'Parse error' }
      }))
      return
    }

    if (!isMcpMessage(message)) {
      res.writeHead(400, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({
        jsonrpc: '2.0',
        id: null,
        error: { code: ErrorCode.INVALID_REQUEST, message: 'Invalid request' }
      }))
      return
    }

    try {
      this.logger.debug({ method: message.method }, 'Processing MCP message')

      const mcpResponse = await this.mcpServer.handleMessage(message)

      if (mcpResponse === null) {
        res.writeHead(202)
        res.end()
        return
      }

      res.writeHead(200, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify(mcpResponse))
    } catch (error) {
      this.logger.error({ error }, 'HTTP request processing failed')

      res.writeHead(500, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({
        jsonrpc: '2.0',
        id: null,
        error: {
          code: ErrorCode.INTERNAL_ERROR,
          message: 'Internal error',
          data: { message: getErrorMessage(error) }
        }
      }))
    }
  }

  private readRequestBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      let body = ''

      req.on('data', (chunk: Buffer) => {
        body += chunk.toString()
      })

      req.on('end', () => {
        resolve(body)
      })

      req.on('error', (error) => {
        reject(error)
      })
    })
  }
}

async function main() {
  const { logging } = loadConfiguration()
  setDefaultLogger(createLogger({ level: logging.level, structured: logging.structured }))
  const logger = createChildLogger('main')

  const port = parseInt(process.env.PORT ?? '3000')
  const server = new McpHttpServer(port)

  try {
    await server.start()
    logger.info({ url: `http://localhost:${port}` }, 'SQL tool MCP server accepting JSON-RPC on POST /')

    process.on('SIGINT', () => {
      logger.info('Shutting down...')
      void server.stop().then(() => process.exit(0))
    })

    process.on('SIGTERM', () => {
      logger.info('Shutting down...')
      void server.stop().then(() => process.exit(0))
    })
  } catch (error) {
    logger.error({ error }, 'Failed to start server')
    process.exit(1)
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void main().catch((error: unknown) => {
    process.stderr.write(`Unhandled error: ${getErrorMessage(error)}\n`)
    process.exit(1)
  })
}

export default McpHttpServer
