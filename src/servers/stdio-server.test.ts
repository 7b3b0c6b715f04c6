/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { PassThrough, Writable } from 'stream'
import McpStdioServer from './stdio-server.js'
import { getConfig } from '../config.js'
import { ErrorCode } from '../errors.js'
import { FakeDatabase } from '../test/fake-session.js'

class CapturingStream extends Writable {
  public chunks: string[] = []

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void) {
    this.chunks.push(chunk.toString())
    callback()
  }
}

describe('McpStdioServer', () => {
  let input: PassThrough
  let output: CapturingStream
  let written: string[]
  let server: McpStdioServer

  beforeEach(() => {
    process.env.MYSQL_DATABASE = 'employees'
    getConfig().reset()

    input = new PassThrough()
    output = new CapturingStream()
    written = output.chunks

    const database = new FakeDatabase().on(/^SELECT 1$/, () => [{ 1: 1 }])
    server = new McpStdioServer({ sessionFactory: database.factory }, { input, output })
  })

  afterEach(() => {
    server.stop()
    delete process.env.MYSQL_DATABASE
    getConfig().reset()
  })

  test('should write one JSON line per request', async () => {
    await server.handleStdioMessage('{"jsonrpc":"2.0","id":1,"method":"ping"}')

    expect(written).toEqual(['{"jsonrpc":"2.0","id":1,"result":{}}\n'])
  })

  test('should stay silent for notifications', async () => {
    await server.handleStdioMessage('{"jsonrpc":"2.0","method":"notifications/initialized"}')

    expect(written).toEqual([])
  })

  test('should answer malformed JSON with a parse error', async () => {
    await server.handleStdioMessage('{"jsonrpc":"2.0",')

    expect(JSON.parse(written[0])).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: ErrorCode.PARSE_ERROR, message: 'Parse error' }
    })
  })

  test('should answer JSON without a method as an invalid request', async () => {
    await server.handleStdioMessage('{"jsonrpc":"2.0","id":7}')

    expect(JSON.parse(written[0])).toEqual({
      jsonrpc: '2.0',
      id: 7,
      error: { code: ErrorCode.INVALID_REQUEST, message: 'Invalid request' }
    })
  })

  test('should split buffered stdin into line-delimited messages', async () => {
    server.start()

    input.write('{"jsonrpc":"2.0","id":1,"method":"ping"}\n{"jsonrpc":"2.0",')
    input.write('"id":2,"method":"ping"}\n')

    await vi.waitFor(() => expect(written).toHaveLength(2))
    expect(written.map(line => JSON.parse(line).id)).toEqual([1, 2])
  })
})
