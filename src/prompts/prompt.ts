/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export interface PromptArgument {
  name: string
  description: string
  required: boolean
}

export interface PromptDefinition {
  name: string
  description: string
  arguments: PromptArgument[]
}

export interface PromptMessage {
  role: 'user' | 'assistant'
  content: {
    type: 'text'
    text: string
  }
}

export interface PromptResult {
  description: string
  messages: PromptMessage[]
}
