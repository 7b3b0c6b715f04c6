/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export * from './types.js'
export { ConnectionProvider, toQueryResult } from './connection-provider.js'
export { createMySqlSession } from './mysql-session.js'
