/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export interface ConnectionConfig {
  readonly host: string
  readonly port: number
  readonly user: string
  readonly password: string
  readonly database: string
  readonly connectTimeout: number
  readonly queryTimeout?: number | undefined
}

export type Row = Record<string, unknown>

/**
 * One open session against the database. `run` resolves with whatever the
 * driver produced for the statement: an array of rows, an array of result
 * sets, or a status packet.
 */
export interface DatabaseSession {
  run(sql: string): Promise<unknown>
  close(): Promise<void>
}

export type SessionFactory = (config: ConnectionConfig) => Promise<DatabaseSession>

export interface QueryResult {
  readonly returnsRows: boolean
  readonly affectedRows: number
  fetchAll(): Row[]
}
