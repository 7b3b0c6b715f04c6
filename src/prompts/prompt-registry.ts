/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { BaseError, ErrorCode } from '../errors.js'
import type { PromptDefinition, PromptResult } from './prompt.js'
import { SQL_ASSISTANT_PROMPT, renderSqlAssistantPrompt } from './sql-assistant.js'

export class PromptRegistry {
  private readonly defaultDatabase: string

  constructor(defaultDatabase: string) {
    this.defaultDatabase = defaultDatabase
  }

  listPrompts(): PromptDefinition[] {
    return [SQL_ASSISTANT_PROMPT]
  }

  getPrompt(name: string, args: Record<string, string> = {}): PromptResult {
    if (name !== SQL_ASSISTANT_PROMPT.name) {
      throw new BaseError(`Prompt '${name}' not found`, ErrorCode.RESOURCE_NOT_FOUND, { promptName: name })
    }

    const database = args.database?.trim() || this.defaultDatabase
    return {
      description: SQL_ASSISTANT_PROMPT.description,
      messages: [{
        role: 'user',
        content: {
          type: 'text',
          text: renderSqlAssistantPrompt(database)
        }
      }]
    }
  }
}
