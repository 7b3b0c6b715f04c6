/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import pino from 'pino'
import { createWriteStream } from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggerConfig {
  level?: LogLevel
  structured?: boolean
  stream?: NodeJS.WritableStream
  // Write to stderr (fd 2) instead of stdout when no stream or log file is set
  toStderr?: boolean
}

export type Logger = pino.Logger

/**
 * Open the file named by MCP_LOG_FILE for appending, if set.
 * Stdio mode owns stdout, so log lines must go somewhere else.
 */
function openLogFileStream(): NodeJS.WritableStream | undefined {
  const logFile = process.env.MCP_LOG_FILE
  if (!logFile) {
    return undefined
  }

  const fileStream = createWriteStream(logFile, { flags: 'a' })
  fileStream.on('error', (error) => {
    process.stderr.write(`Log file ${logFile} unavailable: ${error.message}\n`)
  })
  return fileStream
}

/**
 * Create a structured logger with Pino
 * Supports both structured JSON output and pretty-printed output for development
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const actualStream = config.stream ?? openLogFileStream()
  const pinoOptions = buildLoggerOptions(config, actualStream !== undefined)

  if (actualStream) {
    return pino(pinoOptions, actualStream)
  }

  if (config.toStderr && !pinoOptions.transport) {
    return pino(pinoOptions, pino.destination(2))
  }

  return pino(pinoOptions)
}

export function buildLoggerOptions(config: LoggerConfig, hasStream: boolean): pino.LoggerOptions {
  const { level = 'info', structured = true, toStderr = false } = config

  const pinoOptions: pino.LoggerOptions = {
    level,
    // Serialize Error objects properly
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err
    }
  }

  // Configure transport for pretty printing in development
  if (!structured && !hasStream) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: toStderr ? 2 : 1
      }
    }
  }

  return pinoOptions
}

let defaultLogger: Logger | null = null

/**
 * Get the default logger instance
 * Creates one with default configuration if none exists
 */
export function getLogger(): Logger {
  defaultLogger ??= createLogger()
  return defaultLogger
}

/**
 * Set the default logger instance
 * Loggers created afterwards via createChildLogger() write through it.
 */
export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger
}

/**
 * Generate a correlation ID for tracking requests across components
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`
}

/**
 * Create a child logger with bound correlation ID
 */
export function createChildLogger(correlationId?: string): Logger {
  const logger = getLogger()
  const id = correlationId || generateCorrelationId()

  return logger.child({ correlationId: id })
}
