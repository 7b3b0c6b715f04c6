/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export { SqlToolMcpServer, PROTOCOL_VERSION, type SqlToolServerOptions } from './server.js'
export { default as McpHttpServer } from './http-server.js'
export { default as McpStdioServer } from './stdio-server.js'
