/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export type { PromptArgument, PromptDefinition, PromptMessage, PromptResult } from './prompt.js'
export { PromptRegistry } from './prompt-registry.js'
export { SQL_ASSISTANT_PROMPT, renderSqlAssistantPrompt } from './sql-assistant.js'
