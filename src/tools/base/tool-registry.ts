/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { Tool, ToolDefinition, ToolExecutionContext, ToolResult } from './tool.js'
import { ToolError, ErrorCode } from '../../errors.js'
import { createChildLogger } from '../../logger.js'
import { QueryExecutorTool } from '../database/index.js'

export class ToolRegistry {
  private tools = new Map<string, Tool>()
  private readonly logger = createChildLogger('tool-registry')

  constructor() {
    this.registerTool(new QueryExecutorTool())
  }

  registerTool(tool: Tool): void {
    this.tools.set(tool.definition.name, tool)
    this.logger.debug({ toolName: tool.definition.name }, 'Registered tool')
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name)
  }

  listTools(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(tool => tool.definition)
  }

  async executeTool(name: string, params: unknown, context: ToolExecutionContext): Promise<ToolResult> {
    const tool = this.getTool(name)
    if (!tool) {
      throw new ToolError(`Tool '${name}' not found`, ErrorCode.METHOD_NOT_FOUND, name)
    }

    this.logger.info({ toolName: name }, 'Executing tool')
    const result = await tool.execute(params, context)
    this.logger.debug({ toolName: name, isError: result.isError === true }, 'Tool execution completed')

    return result
  }
}
