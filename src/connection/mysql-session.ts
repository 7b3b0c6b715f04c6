/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { createConnection, type ResultSetHeader, type RowDataPacket } from 'mysql2/promise'
import type { ConnectionConfig, DatabaseSession, SessionFactory } from './types.js'

export const createMySqlSession: SessionFactory = async (config: ConnectionConfig): Promise<DatabaseSession> => {
  const connection = await createConnection({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectTimeout: config.connectTimeout,
    // BIGINT and DECIMAL values past 2^53 come back as exact strings
    supportBigNumbers: true,
    bigNumberStrings: true
  })

  return {
    async run(sql: string): Promise<unknown> {
      const [result] = await connection.query<RowDataPacket[] | ResultSetHeader>({
        sql,
        timeout: config.queryTimeout
      })
      return result
    },
    close(): Promise<void> {
      return connection.end()
    }
  }
}
