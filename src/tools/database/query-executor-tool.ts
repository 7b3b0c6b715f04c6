/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { z } from 'zod'
import { Tool, type ToolDefinition, type ToolExecutionContext, type ToolResult } from '../base/tool.js'
import { ToolError, ErrorCode } from '../../errors.js'
import { isErrorEnvelope } from '../../query-executor.js'

const QueryExecutorParamsSchema = z.object({
  query: z.string({
    required_error: 'query is required',
    invalid_type_error: 'query must be a string'
  })
})

export class QueryExecutorTool extends Tool {
  readonly definition: ToolDefinition = {
    name: 'query_executor',
    description: 'Execute a SQL query against the configured MySQL database. ' +
      'Returns {query, results} with one object per row for statements that produce a result set, ' +
      '{query, message} for statements that do not, and {query, error} when execution fails.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'The SQL statement to execute (e.g., "SELECT name, age FROM employees LIMIT 10")'
        }
      },
      required: ['query']
    },
    annotations: {
      title: 'Execute SQL Query',
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: false,
      openWorldHint: false
    }
  }

  async execute(params: unknown, context: ToolExecutionContext): Promise<ToolResult> {
    const parsed = QueryExecutorParamsSchema.safeParse(params ?? {})
    if (!parsed.success) {
      const issue = parsed.error.errors[0]
      const message = issue ? issue.message : 'Invalid parameters'
      throw new ToolError(`Invalid parameters: ${message}`, ErrorCode.INVALID_PARAMS, this.definition.name)
    }

    const envelope = await context.queryExecutor.execute(parsed.data.query)
    const failed = isErrorEnvelope(envelope)

    if (failed) {
      this.logger.warn({ toolName: this.definition.name }, 'Query returned an error envelope')
    }

    return {
      content: [{
        type: 'text',
        text: JSON.stringify(envelope, null, 2)
      }],
      ...(failed ? { isError: true } : {})
    }
  }
}
