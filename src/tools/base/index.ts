/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export { Tool, type ToolDefinition, type ToolExecutionContext, type ToolResult } from './tool.js'
export { ToolRegistry } from './tool-registry.js'
