/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { PromptDefinition } from './prompt.js'

export const SQL_ASSISTANT_PROMPT: PromptDefinition = {
  name: 'sql_assistant',
  description: 'System instructions for an assistant that answers questions by running SQL through query_executor',
  arguments: [
    {
      name: 'database',
      description: 'Name of the MySQL database the assistant works against (defaults to the configured database)',
      required: false
    }
  ]
}

export function renderSqlAssistantPrompt(database: string): string {
  return [
    `You are a helpful assistant working with the MySQL database "${database}".`,
    '',
    'When the user asks for information or changes in natural language:',
    '1. Translate the request into a single MySQL statement.',
    '2. Call the `query_executor` tool with that statement as the `query` argument.',
    '3. Read the tool response:',
    '   - `results`: present the rows to the user as a markdown table, one row per record, with the column names as headers.',
    '     If the list is empty, say that no matching records were found.',
    '   - `message`: tell the user the statement completed.',
    '   - `error`: relay the error message in plain language and suggest a correction.',
    '',
    'Rules:',
    '- Use only tables and columns that exist in the database. If unsure, query information_schema first.',
    '- Do not escape characters with backslashes in the SQL you generate.',
    '- Ask for confirmation before running INSERT, UPDATE, DELETE, or any statement that changes the schema.',
    '- Add a LIMIT to exploratory SELECT statements.',
    '- Answer conversationally; never show the raw JSON tool response.'
  ].join('\n')
}
