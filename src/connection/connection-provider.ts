/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { createChildLogger } from '../logger.js'
import { DatabaseError } from '../errors.js'
import { createMySqlSession } from './mysql-session.js'
import type { ConnectionConfig, DatabaseSession, QueryResult, Row, SessionFactory } from './types.js'

export class ConnectionProvider {
  private readonly config: ConnectionConfig
  private readonly sessionFactory: SessionFactory
  private readonly logger = createChildLogger('connection-provider')

  constructor(config: ConnectionConfig, sessionFactory?: SessionFactory) {
    this.config = { ...config }
    // Injectable so tests can run without a MySQL server
    this.sessionFactory = sessionFactory ?? createMySqlSession

    this.logger.debug({
      databaseUrl: this.getDatabaseUrl(),
      connectTimeout: config.connectTimeout,
      queryTimeout: config.queryTimeout
    }, 'ConnectionProvider initialized')
  }

  getDatabaseName(): string {
    return this.config.database
  }

  getDatabaseUrl(maskPassword = true): string {
    const password = maskPassword ? '****' : this.config.password
    return `mysql://${this.config.user}:${password}@${this.config.host}:${this.config.port}/${this.config.database}`
  }

  /**
   * Open a session, hand it to `work`, and close it on every exit path.
   * A failure while closing is logged and never replaces the outcome of `work`.
   */
  async withSession<T>(work: (session: DatabaseSession) => Promise<T>): Promise<T> {
    let session: DatabaseSession
    try {
      session = await this.sessionFactory(this.config)
    } catch (error) {
      throw DatabaseError.fromDriverError(error)
    }
    this.logger.debug({ databaseUrl: this.getDatabaseUrl() }, 'Session opened')

    try {
      return await work(session)
    } finally {
      try {
        await session.close()
        this.logger.debug('Session closed')
      } catch (closeError) {
        this.logger.warn({ error: closeError }, 'Error while closing session, connection discarded anyway')
      }
    }
  }

  async executeQuery(queryText: string): Promise<QueryResult> {
    return this.withSession(async (session) => {
      try {
        const raw = await session.run(queryText)
        return toQueryResult(raw)
      } catch (error) {
        throw DatabaseError.fromDriverError(error)
      }
    })
  }
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readAffectedRows(packet: unknown): number {
  if (!isRow(packet)) {
    return 0
  }
  const affected = packet.affectedRows
  return typeof affected === 'number' ? affected : 0
}

/**
 * Shape a raw driver result. A plain array is a result set; an array whose
 * first entry is itself an array comes from a stored procedure call, where the
 * first result set is the one reported. Anything else is a status packet.
 */
export function toQueryResult(raw: unknown): QueryResult {
  if (Array.isArray(raw)) {
    const first: unknown = raw[0]
    const resultSet: unknown[] = Array.isArray(first) ? first : raw
    const rows = resultSet.filter(isRow).map(row => ({ ...row }))
    return {
      returnsRows: true,
      affectedRows: 0,
      fetchAll: () => rows.map(row => ({ ...row }))
    }
  }

  const affectedRows = readAffectedRows(raw)
  return {
    returnsRows: false,
    affectedRows,
    fetchAll: () => []
  }
}
