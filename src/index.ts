#!/usr/bin/env node
/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { McpStdioServer } from './servers/index.js'
import { loadConfiguration } from './config.js'
import { createChildLogger, createLogger, setDefaultLogger } from './logger.js'
import { getErrorMessage } from './errors.js'

function main() {
  const { logging } = loadConfiguration()
  // stdout carries the protocol; logs go to stderr unless MCP_LOG_FILE is set
  setDefaultLogger(createLogger({
    level: logging.level,
    structured: logging.structured,
    toStderr: true
  }))
  const logger = createChildLogger('main')

  const server = new McpStdioServer()
  server.start()

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully...')
    server.stop()
    process.exit(0)
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  // Keep the process alive
  process.stdin.resume()
}

if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    main()
  } catch (error) {
    process.stderr.write(`Failed to start server: ${getErrorMessage(error)}\n`)
    process.exit(1)
  }
}

export { SqlToolMcpServer, McpHttpServer, McpStdioServer, PROTOCOL_VERSION } from './servers/index.js'
export type { SqlToolServerOptions } from './servers/index.js'
export { ConnectionProvider, createMySqlSession, toQueryResult } from './connection/index.js'
export type { ConnectionConfig, DatabaseSession, QueryResult, Row, SessionFactory } from './connection/index.js'
export { QueryExecutor, SUCCESS_MESSAGE, isErrorEnvelope, type ResponseEnvelope, type QueryExecutorOptions } from './query-executor.js'
export { stripBackslashes, preserveQuery, composeNormalizers, selectNormalizer, type QueryNormalizer } from './query-normalizer.js'
export { QueryExecutorTool, ToolRegistry } from './tools/index.js'
