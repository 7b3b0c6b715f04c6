/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import dotenv from 'dotenv'

// Load .env file at module initialization
// Configuration precedence: environment variables > .env file > schema defaults
dotenv.config()

type EnvironmentValueParser<T> = (value: string | undefined) => T | undefined

const parseStringValue: EnvironmentValueParser<string> = (value) => value ?? undefined

const parseSimpleBooleanValue: EnvironmentValueParser<boolean> = (value) => {
  return value ? value.toLowerCase() === 'true' : undefined
}

const parseStrictBooleanValue: EnvironmentValueParser<boolean> = (value) => {
  if (!value) return undefined
  const normalized = value.toLowerCase()
  return normalized === 'true' ? true : normalized === 'false' ? false : undefined
}

const parseNumericValue: EnvironmentValueParser<number> = (value) => {
  if (!value) return undefined
  const trimmed = value.trim()
  const parsed = parseInt(trimmed)
  return !isNaN(parsed) && parsed >= 0 ? parsed : undefined
}

const parseListChangedFlag = (value: string | undefined): { listChanged: boolean } | undefined => {
  const flag = parseStrictBooleanValue(value)
  return flag === undefined ? undefined : { listChanged: flag }
}

export class EnvironmentConfigurationSource {
  private static getEnvironmentVariable(key: string): string | undefined {
    return process.env[key]
  }

  static extractServerIdentity() {
    return {
      name: parseStringValue(this.getEnvironmentVariable('SERVER_NAME')),
      version: parseStringValue(this.getEnvironmentVariable('SERVER_VERSION'))
    }
  }

  static extractServerCapabilities() {
    return {
      tools: parseListChangedFlag(this.getEnvironmentVariable('CAPABILITIES_TOOLS')),
      prompts: parseListChangedFlag(this.getEnvironmentVariable('CAPABILITIES_PROMPTS'))
    }
  }

  static extractDatabaseConnection() {
    return {
      host: parseStringValue(this.getEnvironmentVariable('MYSQL_HOST')),
      port: parseNumericValue(this.getEnvironmentVariable('MYSQL_PORT')),
      user: parseStringValue(this.getEnvironmentVariable('MYSQL_USER')),
      password: parseStringValue(this.getEnvironmentVariable('MYSQL_PASSWORD')),
      database: parseStringValue(this.getEnvironmentVariable('MYSQL_DATABASE')),
      connectTimeout: parseNumericValue(this.getEnvironmentVariable('MYSQL_CONNECT_TIMEOUT')),
      queryTimeout: parseNumericValue(this.getEnvironmentVariable('MYSQL_QUERY_TIMEOUT'))
    }
  }

  static extractQueryHandling() {
    return {
      stripBackslashes: parseStrictBooleanValue(this.getEnvironmentVariable('QUERY_STRIP_BACKSLASHES'))
    }
  }

  static extractObservabilitySettings() {
    return {
      level: parseStringValue(this.getEnvironmentVariable('LOG_LEVEL')),
      structured: parseSimpleBooleanValue(this.getEnvironmentVariable('LOG_STRUCTURED'))
    }
  }
}
