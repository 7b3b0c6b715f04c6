/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { QueryExecutor } from '../../query-executor.js'
import { createChildLogger } from '../../logger.js'

export interface ToolDefinition {
  name: string
  description: string
  inputSchema: {
    type: 'object'
    properties: Record<string, unknown>
    required?: string[]
  }
  annotations?: {
    title?: string
    readOnlyHint?: boolean
    destructiveHint?: boolean
    idempotentHint?: boolean
    openWorldHint?: boolean
  }
}

export interface ToolExecutionContext {
  queryExecutor: QueryExecutor
}

export interface ToolResult {
  content: Array<{
    type: 'text'
    text: string
  }>
  isError?: boolean
}

export abstract class Tool {
  abstract readonly definition: ToolDefinition
  protected readonly logger = createChildLogger('tool')

  abstract execute(params: unknown, context: ToolExecutionContext): Promise<ToolResult>
}
