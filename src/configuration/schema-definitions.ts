/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { z } from 'zod'

export const DatabaseConnectionSchema = z.object({
  host: z.string().min(1, 'MYSQL_HOST cannot be empty').default('127.0.0.1'),
  port: z.number().int().min(1, 'MYSQL_PORT must be >= 1').max(65535, 'MYSQL_PORT must be <= 65535').default(3306),
  user: z.string().min(1, 'MYSQL_USER cannot be empty').default('root'),
  password: z.string().default(''),
  database: z.string({ required_error: 'MYSQL_DATABASE is required' }).min(1, 'MYSQL_DATABASE is required').refine(val => val.trim().length > 0, 'MYSQL_DATABASE cannot be empty or whitespace'),
  connectTimeout: z.number().min(0, 'MYSQL_CONNECT_TIMEOUT must be non-negative').default(10000),
  queryTimeout: z.number().min(1, 'MYSQL_QUERY_TIMEOUT must be positive').optional()
})

export const QueryHandlingSchema = z.object({
  stripBackslashes: z.boolean().default(true)
})

export const ObservabilityConfigurationSchema = z.object({
  level: z.string().toLowerCase().pipe(z.enum(['debug', 'info', 'warn', 'error'])).default('info'),
  structured: z.boolean().default(true)
})

export const ServerCapabilitiesSchema = z.object({
  tools: z.object({
    listChanged: z.boolean().default(true)
  }).default({ listChanged: true }),
  prompts: z.object({
    listChanged: z.boolean().default(true)
  }).default({ listChanged: true })
})

export const ApplicationConfigurationSchema = z.object({
  name: z.string().default('sql-query-tool-server'),
  version: z.string().default('0.1.0'),
  capabilities: ServerCapabilitiesSchema,
  database: DatabaseConnectionSchema,
  query: QueryHandlingSchema,
  logging: ObservabilityConfigurationSchema
})

export type ApplicationConfiguration = z.infer<typeof ApplicationConfigurationSchema>
export type DatabaseConnectionConfig = z.infer<typeof DatabaseConnectionSchema>
export type QueryHandlingConfig = z.infer<typeof QueryHandlingSchema>
export type ObservabilityConfiguration = z.infer<typeof ObservabilityConfigurationSchema>
