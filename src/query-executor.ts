/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { createChildLogger } from './logger.js'
import { DatabaseError, getErrorMessage, isRetriableError } from './errors.js'
import { stripBackslashes, type QueryNormalizer } from './query-normalizer.js'
import type { ConnectionProvider, Row } from './connection/index.js'

export const SUCCESS_MESSAGE = 'Query executed successfully.'

export type ResponseEnvelope =
  | { readonly query: string; readonly results: Row[] }
  | { readonly query: string; readonly message: string }
  | { readonly query: string; readonly error: string }

export function isErrorEnvelope(envelope: ResponseEnvelope): envelope is { readonly query: string; readonly error: string } {
  return 'error' in envelope
}

export interface QueryExecutorOptions {
  normalizer?: QueryNormalizer
}

export class QueryExecutor {
  private readonly provider: ConnectionProvider
  private readonly normalizer: QueryNormalizer
  private readonly logger = createChildLogger('query-executor')

  constructor(provider: ConnectionProvider, options: QueryExecutorOptions = {}) {
    this.provider = provider
    this.normalizer = options.normalizer ?? stripBackslashes
  }

  getDatabaseName(): string {
    return this.provider.getDatabaseName()
  }

  /**
   * Run one statement and shape the outcome. Never rejects: failures come
   * back as an envelope with an `error` key.
   */
  async execute(query: string): Promise<ResponseEnvelope> {
    let normalizedQuery = query

    try {
      normalizedQuery = this.normalizer(query)

      this.logger.info({
        query: sanitizeQueryForLogging(normalizedQuery),
        database: this.provider.getDatabaseName()
      }, 'Executing query')

      const result = await this.provider.executeQuery(normalizedQuery)

      if (result.returnsRows) {
        const rows = result.fetchAll()
        this.logger.info({ rowCount: rows.length }, 'Query returned rows')
        return { query, results: rows }
      }

      this.logger.info({ affectedRows: result.affectedRows }, 'Query executed without result set')
      return { query, message: SUCCESS_MESSAGE }
    } catch (error) {
      const failure = DatabaseError.fromDriverError(error)
      this.logger.error({
        err: failure,
        kind: failure.kind,
        retriable: isRetriableError(failure),
        query: sanitizeQueryForLogging(normalizedQuery)
      }, 'Query execution failed')

      return { query, error: getErrorMessage(failure) || 'Unknown error occurred' }
    }
  }
}

export function sanitizeQueryForLogging(query: string): string {
  return query.replace(/(['"])(?:(?!\1).)*\1/g, '$1[REDACTED]$1')
}
